import { describe, it, expect } from 'vitest';
import {
  checkAdditivity,
  findViolations,
  isAdditive,
  quartetCount,
  quartets,
} from '../src/additivity';
import { perturbEntry, treeDistances } from '../src/distance';
import { NegativeToleranceError } from '../src/errors';
import { CATERPILLAR, CATERPILLAR_MATRIX, TWO_PAIRS, uniformMatrix } from './helpers';

describe('quartets', () => {
  it('enumerates 4-combinations in lexicographic order', () => {
    expect([...quartets(5)]).toEqual([
      [0, 1, 2, 3],
      [0, 1, 2, 4],
      [0, 1, 3, 4],
      [0, 2, 3, 4],
      [1, 2, 3, 4],
    ]);
  });

  it('yields nothing below four items', () => {
    expect([...quartets(3)]).toEqual([]);
  });

  it('counts C(n, 4)', () => {
    expect(quartetCount(3)).toBe(0);
    expect(quartetCount(4)).toBe(1);
    expect(quartetCount(6)).toBe(15);
    expect(quartetCount(10)).toBe(210);
    expect([...quartets(10)]).toHaveLength(210);
  });
});

describe('isAdditive', () => {
  it('is vacuously true below four items', () => {
    expect(isAdditive([])).toBe(true);
    expect(isAdditive([[0]])).toBe(true);
    expect(
      isAdditive([
        [0, 1, 100],
        [1, 0, 1],
        [100, 1, 0],
      ]),
    ).toBe(true);
  });

  it('accepts a star tree metric', () => {
    const star = treeDistances({
      leaves: ['A', 'B', 'C', 'D', 'E'],
      edges: [1, 2, 3, 4, 5].map((weight, i) => ({
        from: 'c',
        to: String.fromCharCode(65 + i),
        weight,
      })),
    });
    expect(isAdditive(star)).toBe(true);
    expect(isAdditive(star, 0)).toBe(true);
  });

  it('accepts a caterpillar tree metric for any non-negative tolerance', () => {
    const matrix = treeDistances(CATERPILLAR);
    expect(isAdditive(matrix)).toBe(true);
    expect(isAdditive(matrix, 0)).toBe(true);
    expect(isAdditive(matrix, 5)).toBe(true);
  });

  it('rejects a tree metric with one entry shifted by +10', () => {
    const perturbed = perturbEntry(CATERPILLAR_MATRIX, 0, 4, 10);
    expect(isAdditive(perturbed, 1e-2)).toBe(false);
  });

  it('accepts the 5-item all-ones matrix', () => {
    expect(isAdditive(uniformMatrix(5, 1))).toBe(true);
  });

  it('accepts two well-separated pairs', () => {
    expect(isAdditive(TWO_PAIRS)).toBe(true);
  });

  it('validates the tolerance even when there are no quartets', () => {
    expect(() => isAdditive([[0]], -0.5)).toThrow(NegativeToleranceError);
    expect(() => isAdditive(CATERPILLAR_MATRIX, -0.5)).toThrow(NegativeToleranceError);
  });
});

describe('findViolations', () => {
  it('returns nothing for an additive matrix', () => {
    expect(findViolations(CATERPILLAR_MATRIX)).toEqual([]);
  });

  it('lists every quartet that contains the shifted pair', () => {
    const perturbed = perturbEntry(CATERPILLAR_MATRIX, 0, 4, 10);
    const violations = findViolations(perturbed);
    expect(violations.map((v) => v.quartet)).toEqual([
      [0, 1, 2, 4],
      [0, 1, 3, 4],
      [0, 2, 3, 4],
    ]);
    expect(violations.map((v) => v.gap)).toEqual([10, 10, 10]);
    expect(violations[0].sums).toEqual([
      { key: '0-4|1-2', pairs: [[0, 4], [1, 2]], sum: 30 },
      { key: '0-2|1-4', pairs: [[0, 2], [1, 4]], sum: 20 },
      { key: '0-1|2-4', pairs: [[0, 1], [2, 4]], sum: 14 },
    ]);
  });

  it('orders violations by gap, largest first', () => {
    const perturbed = perturbEntry(
      perturbEntry(CATERPILLAR_MATRIX, 0, 4, 10),
      1,
      2,
      30,
    );
    const violations = findViolations(perturbed);
    for (let i = 1; i < violations.length; i++) {
      expect(violations[i - 1].gap).toBeGreaterThanOrEqual(violations[i].gap);
    }
    expect(violations[0].gap).toBeGreaterThan(10);
  });
});

describe('checkAdditivity', () => {
  it('summarizes an additive matrix', () => {
    expect(checkAdditivity(CATERPILLAR_MATRIX)).toEqual({
      size: 5,
      tolerance: 1e-2,
      additive: true,
      quartetsChecked: 5,
      violationCount: 0,
      violations: [],
    });
  });

  it('limits the reported violations but counts them all', () => {
    const perturbed = perturbEntry(CATERPILLAR_MATRIX, 0, 4, 10);
    const report = checkAdditivity(perturbed, { tolerance: 0.5, limit: 1 });
    expect(report.additive).toBe(false);
    expect(report.tolerance).toBe(0.5);
    expect(report.violationCount).toBe(3);
    expect(report.violations).toHaveLength(1);
    expect(report.violations[0].quartet).toEqual([0, 1, 2, 4]);
  });

  it('agrees with isAdditive', () => {
    const perturbed = perturbEntry(CATERPILLAR_MATRIX, 0, 4, 10);
    for (const m of [CATERPILLAR_MATRIX, perturbed, TWO_PAIRS, uniformMatrix(3, 2)]) {
      expect(checkAdditivity(m).additive).toBe(isAdditive(m));
    }
  });

  it('rejects a negative limit', () => {
    expect(() => checkAdditivity(TWO_PAIRS, { limit: -1 })).toThrow(RangeError);
  });
});
