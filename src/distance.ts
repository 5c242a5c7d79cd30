import type { DistanceMatrix, WeightedTree } from './types';

interface Neighbor {
  node: string;
  weight: number;
}

function buildAdjacency(tree: WeightedTree): Map<string, Neighbor[]> {
  const adjacency = new Map<string, Neighbor[]>();
  const link = (a: string, b: string, weight: number) => {
    const list = adjacency.get(a) ?? [];
    list.push({ node: b, weight });
    adjacency.set(a, list);
  };

  for (const leaf of tree.leaves) {
    if (!adjacency.has(leaf)) adjacency.set(leaf, []);
  }
  for (const edge of tree.edges) {
    if (!Number.isFinite(edge.weight) || edge.weight < 0) {
      throw new Error(
        `Edge ${edge.from}-${edge.to} must have a non-negative weight: ${edge.weight}`,
      );
    }
    if (edge.from === edge.to) {
      throw new Error(`Edge ${edge.from}-${edge.to} is a self-loop`);
    }
    link(edge.from, edge.to, edge.weight);
    link(edge.to, edge.from, edge.weight);
  }

  if (tree.edges.length !== adjacency.size - 1) {
    throw new Error(
      `A tree on ${adjacency.size} nodes needs ${adjacency.size - 1} edges, got ${tree.edges.length}`,
    );
  }
  return adjacency;
}

/** Path length from `source` to every node reachable from it. */
function pathLengthsFrom(
  source: string,
  adjacency: Map<string, Neighbor[]>,
): Map<string, number> {
  const lengths = new Map<string, number>([[source, 0]]);
  const stack = [source];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    const base = lengths.get(node) ?? 0;
    for (const next of adjacency.get(node) ?? []) {
      if (lengths.has(next.node)) continue;
      lengths.set(next.node, base + next.weight);
      stack.push(next.node);
    }
  }
  return lengths;
}

/**
 * Leaf-to-leaf path lengths of a weighted tree. Any such matrix is additive.
 * Only the upper triangle (j > i) is computed and mirrored to the lower
 * triangle.
 */
export function treeDistances(tree: WeightedTree): number[][] {
  const adjacency = buildAdjacency(tree);
  const n = tree.leaves.length;
  const matrix: number[][] = Array.from({ length: n }, () => Array(n).fill(0));

  for (let i = 0; i < n; i++) {
    const lengths = pathLengthsFrom(tree.leaves[i], adjacency);
    if (i === 0 && lengths.size !== adjacency.size) {
      throw new Error('Tree is not connected');
    }
    for (let j = i + 1; j < n; j++) {
      const dist = lengths.get(tree.leaves[j]);
      if (dist === undefined) {
        throw new Error(
          `Leaf "${tree.leaves[j]}" is not reachable from "${tree.leaves[i]}"`,
        );
      }
      matrix[i][j] = dist;
      matrix[j][i] = dist; // mirror to lower triangle
    }
  }

  return matrix;
}

/** Copy of `matrix` with entries (i, j) and (j, i) shifted by `delta`. */
export function perturbEntry(
  matrix: DistanceMatrix,
  i: number,
  j: number,
  delta: number,
): number[][] {
  const n = matrix.length;
  if (i < 0 || j < 0 || i >= n || j >= n || i === j) {
    throw new Error(`Cannot perturb entry [${i}][${j}] of a ${n}x${n} matrix`);
  }
  const copy = matrix.map((row) => [...row]);
  copy[i][j] += delta;
  copy[j][i] = copy[i][j];
  return copy;
}
