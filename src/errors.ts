export class InvalidQuartetError extends Error {
  readonly quartet: readonly number[];

  constructor(quartet: readonly number[], reason: string) {
    super(`Invalid quartet [${quartet.join(', ')}]: ${reason}`);
    this.name = 'InvalidQuartetError';
    this.quartet = quartet;
  }
}

export class NegativeToleranceError extends RangeError {
  readonly tolerance: number;

  constructor(tolerance: number) {
    super(`Tolerance must be a non-negative number: ${tolerance}`);
    this.name = 'NegativeToleranceError';
    this.tolerance = tolerance;
  }
}

/** Raised while loading a matrix; `issues` lists every problem found. */
export class MatrixInputError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid distance matrix: ${issues.join('; ')}`);
    this.name = 'MatrixInputError';
    this.issues = issues;
  }
}
