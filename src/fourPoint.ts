import { NegativeToleranceError } from './errors';
import { pairingSumList } from './quartet';
import { DEFAULT_TOLERANCE, type DistanceMatrix } from './types';

export function assertTolerance(tolerance: number): void {
  if (Number.isNaN(tolerance) || tolerance < 0) {
    throw new NegativeToleranceError(tolerance);
  }
}

/**
 * Compare two pairing sums by squared difference: `(a - b) ** 2 < tolerance`.
 * This is not `|a - b| < tolerance`; with the default 1e-2 sums up to 0.1
 * apart still agree. A tolerance of 0 means exact equality.
 */
export function sumsAgree(a: number, b: number, tolerance: number): boolean {
  if (tolerance === 0) {
    return a === b;
  }
  return (a - b) ** 2 < tolerance;
}

/**
 * Counts the sums that agree with the maximum (the maximum included) and
 * passes when at least two do, so no sort is needed.
 */
export function largestSumsAgree(
  sums: readonly number[],
  tolerance: number,
): boolean {
  const sMax = Math.max(...sums);
  const agreeing = sums.filter((s) => sumsAgree(sMax, s, tolerance)).length;
  return agreeing >= 2;
}

/**
 * The four-point condition: the two largest of the three pairing sums of a
 * quartet must be equal within `tolerance`.
 */
export function satisfiesFourPointCondition(
  distances: DistanceMatrix,
  quartet: readonly number[],
  tolerance = DEFAULT_TOLERANCE,
): boolean {
  assertTolerance(tolerance);
  const sums = pairingSumList(distances, quartet).map((p) => p.sum);
  return largestSumsAgree(sums, tolerance);
}
