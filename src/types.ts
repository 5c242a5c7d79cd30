export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

export const DEFAULT_TOLERANCE = 1e-2;

export type Quartet = readonly [number, number, number, number];

export type IndexPair = readonly [number, number];

/** One of the three ways to split a quartet into two disjoint pairs. */
export type Pairing = readonly [IndexPair, IndexPair];

/** Order-insensitive identity of a pairing, e.g. `"0-1|2-3"`. */
export type PairingKey = string;

export interface PairingSum {
  key: PairingKey;
  pairs: Pairing;
  sum: number;
}

export interface QuartetViolation {
  quartet: Quartet;
  /** Largest first */
  sums: PairingSum[];
  /** Difference between the two largest sums */
  gap: number;
}

export interface AdditivityReport {
  size: number;
  tolerance: number;
  additive: boolean;
  quartetsChecked: number;
  violationCount: number;
  /** Worst first, at most the requested limit */
  violations: QuartetViolation[];
}

export interface MatrixConfig {
  tolerance?: number;
  symmetryTolerance?: number;
  runId?: string;
  runNote?: string;
}

export interface MatrixInput {
  config: MatrixConfig;
  labels?: string[];
  matrix: number[][];
}

export interface WeightedEdge {
  from: string;
  to: string;
  weight: number;
}

export interface WeightedTree {
  leaves: string[];
  edges: WeightedEdge[];
}
