import { assertTolerance, largestSumsAgree, satisfiesFourPointCondition } from './fourPoint';
import { pairingSumList } from './quartet';
import {
  DEFAULT_TOLERANCE,
  type AdditivityReport,
  type DistanceMatrix,
  type Quartet,
  type QuartetViolation,
} from './types';

/** Every 4-combination of `0..n-1` in lexicographic order. */
export function* quartets(n: number): Generator<Quartet> {
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      for (let k = j + 1; k < n; k++) {
        for (let l = k + 1; l < n; l++) {
          yield [i, j, k, l];
        }
      }
    }
  }
}

export function quartetCount(n: number): number {
  if (n < 4) return 0;
  return (n * (n - 1) * (n - 2) * (n - 3)) / 24;
}

/**
 * Is the distance matrix additive? Checks the four-point condition on every
 * quartet of indices and stops at the first failure.
 *
 * Fewer than four items means there are no quartets to check, so the matrix
 * is reported additive.
 */
export function isAdditive(
  distances: DistanceMatrix,
  tolerance = DEFAULT_TOLERANCE,
): boolean {
  assertTolerance(tolerance);
  const n = distances.length;
  if (n < 4) {
    return true;
  }
  for (const q of quartets(n)) {
    if (!satisfiesFourPointCondition(distances, q, tolerance)) {
      return false;
    }
  }
  return true;
}

/**
 * Evaluate every quartet and collect the ones that break the four-point
 * condition, worst first. The gap is how far the largest sum sits above the
 * second largest.
 */
export function findViolations(
  distances: DistanceMatrix,
  tolerance = DEFAULT_TOLERANCE,
): QuartetViolation[] {
  assertTolerance(tolerance);
  const violations: QuartetViolation[] = [];
  for (const quartet of quartets(distances.length)) {
    const sums = pairingSumList(distances, quartet);
    if (largestSumsAgree(sums.map((s) => s.sum), tolerance)) {
      continue;
    }
    sums.sort((a, b) => b.sum - a.sum);
    violations.push({ quartet, sums, gap: sums[0].sum - sums[1].sum });
  }
  violations.sort((a, b) => b.gap - a.gap);
  return violations;
}

export interface CheckAdditivityOptions {
  tolerance?: number;
  /** Maximum number of violations kept in the report */
  limit?: number;
}

export function checkAdditivity(
  distances: DistanceMatrix,
  opts: CheckAdditivityOptions = {},
): AdditivityReport {
  const tolerance = opts.tolerance ?? DEFAULT_TOLERANCE;
  const limit = opts.limit ?? Infinity;
  if (Number.isNaN(limit) || limit < 0) {
    throw new RangeError(`Violation limit must be non-negative: ${limit}`);
  }
  const all = findViolations(distances, tolerance);
  return {
    size: distances.length,
    tolerance,
    additive: all.length === 0,
    quartetsChecked: quartetCount(distances.length),
    violationCount: all.length,
    violations: all.slice(0, limit),
  };
}
