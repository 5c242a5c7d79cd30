import seedrandom from 'seedrandom';
import { treeDistances } from './distance';
import type { WeightedEdge, WeightedTree } from './types';

function randomWeight(rng: seedrandom.PRNG): number {
  return 1 + Math.floor(rng() * 9);
}

/**
 * Grow a random unrooted tree with `leafCount` leaves named `L0..`. Each new
 * leaf subdivides a randomly chosen edge. Weights are integers in [1, 9], so
 * path sums are exact.
 */
export function randomTree(leafCount: number, seed = 1): WeightedTree {
  if (!Number.isInteger(leafCount) || leafCount < 2) {
    throw new Error(`A tree needs at least 2 leaves: ${leafCount}`);
  }
  const rng = seedrandom(String(seed));
  const leaves = Array.from({ length: leafCount }, (_, i) => `L${i}`);

  if (leafCount === 2) {
    return { leaves, edges: [{ from: 'L0', to: 'L1', weight: randomWeight(rng) }] };
  }

  const edges: WeightedEdge[] = [
    { from: 'v0', to: 'L0', weight: randomWeight(rng) },
    { from: 'v0', to: 'L1', weight: randomWeight(rng) },
    { from: 'v0', to: 'L2', weight: randomWeight(rng) },
  ];
  for (let k = 3; k < leafCount; k++) {
    const idx = Math.floor(rng() * edges.length);
    const [split] = edges.splice(idx, 1);
    const inner = `v${k - 2}`;
    edges.push(
      { from: split.from, to: inner, weight: randomWeight(rng) },
      { from: inner, to: split.to, weight: randomWeight(rng) },
      { from: inner, to: leaves[k], weight: randomWeight(rng) },
    );
  }
  return { leaves, edges };
}

export interface LabeledMatrix {
  labels: string[];
  matrix: number[][];
}

/** Distance matrix of a seeded random tree; additive by construction. */
export function randomTreeMatrix(leafCount: number, seed = 1): LabeledMatrix {
  const tree = randomTree(leafCount, seed);
  return { labels: tree.leaves, matrix: treeDistances(tree) };
}
