import { InvalidQuartetError } from './errors';
import type {
  DistanceMatrix,
  IndexPair,
  Pairing,
  PairingKey,
  PairingSum,
  Quartet,
} from './types';

// Positions within the quartet: (01|23), (02|13), (03|12)
const PAIRING_POSITIONS = [
  [0, 1, 2, 3],
  [0, 2, 1, 3],
  [0, 3, 1, 2],
] as const;

/**
 * Check that `quartet` holds exactly four distinct integer indices into
 * `distances`.
 */
export function assertQuartet(
  distances: DistanceMatrix,
  quartet: readonly number[],
): asserts quartet is Quartet {
  if (quartet.length !== 4) {
    throw new InvalidQuartetError(
      quartet,
      `expected 4 indices, got ${quartet.length}`,
    );
  }
  const n = distances.length;
  for (const idx of quartet) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= n) {
      throw new InvalidQuartetError(
        quartet,
        `index ${idx} is out of range for a ${n}x${n} matrix`,
      );
    }
  }
  if (new Set(quartet).size !== 4) {
    throw new InvalidQuartetError(quartet, 'indices must be distinct');
  }
}

function distanceAt(distances: DistanceMatrix, i: number, j: number): number {
  const value = distances[i]?.[j];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Missing or non-finite distance at [${i}][${j}]`);
  }
  return value;
}

function sortPair([a, b]: IndexPair): IndexPair {
  return a < b ? [a, b] : [b, a];
}

export function pairingKey(pairing: Pairing): PairingKey {
  const first = sortPair(pairing[0]);
  const second = sortPair(pairing[1]);
  const [p, q] = first[0] < second[0] ? [first, second] : [second, first];
  return `${p[0]}-${p[1]}|${q[0]}-${q[1]}`;
}

/** The three pairings of a quartet, in (01|23), (02|13), (03|12) order. */
export function quartetPairings(quartet: Quartet): Pairing[] {
  return PAIRING_POSITIONS.map(([a, b, c, d]): Pairing => [
    [quartet[a], quartet[b]],
    [quartet[c], quartet[d]],
  ]);
}

/**
 * Compute the three pairwise sums used by the four-point condition, with the
 * pairs that produced them.
 */
export function pairingSumList(
  distances: DistanceMatrix,
  quartet: readonly number[],
): PairingSum[] {
  assertQuartet(distances, quartet);
  return quartetPairings(quartet).map((pairs) => {
    const [[i, j], [k, l]] = pairs;
    const key = pairingKey(pairs);
    const sum = distanceAt(distances, i, j) + distanceAt(distances, k, l);
    if (!Number.isFinite(sum)) {
      throw new RangeError(`Pairing sum ${key} is not finite`);
    }
    return { key, pairs, sum };
  });
}

/** Map each pairing of the quartet to `D[x][y] + D[z][w]`. */
export function pairingSums(
  distances: DistanceMatrix,
  quartet: readonly number[],
): ReadonlyMap<PairingKey, number> {
  return new Map(
    pairingSumList(distances, quartet).map((p) => [p.key, p.sum] as const),
  );
}
