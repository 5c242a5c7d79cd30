import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { WeightedTree } from '../src/types';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function fixturePath(name: string): string {
  return join(__dirname, '../fixtures', name);
}

/** Two well-separated pairs: sums 4, 20, 20. */
export const TWO_PAIRS: number[][] = [
  [0, 2, 10, 10],
  [2, 0, 10, 10],
  [10, 10, 0, 2],
  [10, 10, 2, 0],
];

// A(1) and B(2) on u, C(4) on v, D(1) and E(5) on w; u-v 3, v-w 2
export const CATERPILLAR: WeightedTree = {
  leaves: ['A', 'B', 'C', 'D', 'E'],
  edges: [
    { from: 'A', to: 'u', weight: 1 },
    { from: 'B', to: 'u', weight: 2 },
    { from: 'u', to: 'v', weight: 3 },
    { from: 'C', to: 'v', weight: 4 },
    { from: 'v', to: 'w', weight: 2 },
    { from: 'D', to: 'w', weight: 1 },
    { from: 'E', to: 'w', weight: 5 },
  ],
};

export const CATERPILLAR_MATRIX: number[][] = [
  [0, 3, 8, 7, 11],
  [3, 0, 9, 8, 12],
  [8, 9, 0, 7, 11],
  [7, 8, 7, 0, 6],
  [11, 12, 11, 6, 0],
];

export function uniformMatrix(n: number, value: number): number[][] {
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 0 : value)),
  );
}

export function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  const result: T[][] = [];
  items.forEach((item, i) => {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const perm of permutations(rest)) {
      result.push([item, ...perm]);
    }
  });
  return result;
}
