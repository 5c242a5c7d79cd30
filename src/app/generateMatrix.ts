import { perturbEntry } from '../distance';
import { randomTreeMatrix, type LabeledMatrix } from '../synthetic';

export interface GenerateMatrixOptions {
  leaves: number;
  seed?: number;
  /** Added to the entry between the first and last leaf */
  perturb?: number;
}

/**
 * Build a matrix document from a seeded random tree, optionally pushed off
 * additivity by perturbing one entry.
 */
export function generateMatrix(opts: GenerateMatrixOptions): LabeledMatrix {
  const { labels, matrix } = randomTreeMatrix(opts.leaves, opts.seed);
  if (opts.perturb === undefined || opts.perturb === 0) {
    return { labels, matrix };
  }
  if (!Number.isFinite(opts.perturb)) {
    throw new RangeError(`Perturbation must be a finite number: ${opts.perturb}`);
  }
  return {
    labels,
    matrix: perturbEntry(matrix, 0, matrix.length - 1, opts.perturb),
  };
}
