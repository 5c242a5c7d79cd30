import { readFileSync } from 'node:fs';
import Ajv from 'ajv';
import { MatrixInputError } from '../errors';
import type { MatrixConfig, MatrixInput } from '../types';

export const DEFAULT_SYMMETRY_TOLERANCE = 1e-9;

type MatrixDocument =
  | number[][]
  | { config?: MatrixConfig; labels?: string[]; matrix: number[][] };

const schema = JSON.parse(
  readFileSync(
    new URL('../../schemas/matrix.schema.json', import.meta.url),
    'utf8',
  ),
);

const ajv = new Ajv({ strict: false, allErrors: true });
const validateDocument = ajv.compile<MatrixDocument>(schema);

function matrixIssues(
  matrix: number[][],
  symmetryTolerance: number,
  labels?: string[],
): string[] {
  const issues: string[] = [];
  const n = matrix.length;
  let ragged = false;

  matrix.forEach((row, i) => {
    if (row.length !== n) {
      ragged = true;
      issues.push(`row ${i} has ${row.length} entries, expected ${n}`);
    }
    row.forEach((value, j) => {
      if (!Number.isFinite(value)) {
        issues.push(`non-finite distance at [${i}][${j}]`);
      } else if (value < 0) {
        issues.push(`negative distance at [${i}][${j}]: ${value}`);
      }
    });
  });

  if (labels) {
    if (labels.length !== n) {
      issues.push(`${labels.length} labels for ${n} rows`);
    }
    const seen = new Set<string>();
    for (const label of labels) {
      if (seen.has(label)) issues.push(`duplicate label: ${label}`);
      seen.add(label);
    }
  }

  // Symmetry only means something once every row is complete
  if (ragged) {
    return issues;
  }
  for (let i = 0; i < n; i++) {
    if (matrix[i][i] !== 0) {
      console.warn(`Diagonal entry [${i}][${i}] is ${matrix[i][i]}, expected 0`);
    }
    for (let j = i + 1; j < n; j++) {
      const a = matrix[i][j];
      const b = matrix[j][i];
      if (Math.abs(a - b) > symmetryTolerance) {
        issues.push(`asymmetric entries [${i}][${j}]=${a} and [${j}][${i}]=${b}`);
      }
    }
  }
  return issues;
}

/**
 * Validate a matrix document: either a bare array of rows or an object with
 * `matrix`, optional `labels` and optional `config`. The matrix must be
 * square, symmetric within `symmetryTolerance`, finite and non-negative.
 */
export function parseMatrixInput(json: unknown): MatrixInput {
  if (!validateDocument(json)) {
    const details = (validateDocument.errors ?? []).map((error) =>
      `${error.instancePath || '(root)'} ${error.message ?? ''}`.trim(),
    );
    throw new MatrixInputError(details.length ? details : ['unknown schema error']);
  }

  const input: MatrixInput = Array.isArray(json)
    ? { config: {}, matrix: json }
    : {
        config: json.config ?? {},
        matrix: json.matrix,
        ...(json.labels ? { labels: json.labels } : {}),
      };

  const symmetryTolerance =
    input.config.symmetryTolerance ?? DEFAULT_SYMMETRY_TOLERANCE;
  const issues = matrixIssues(input.matrix, symmetryTolerance, input.labels);
  if (issues.length > 0) {
    throw new MatrixInputError(issues);
  }
  return input;
}

function isNumericCell(cell: string): boolean {
  return cell !== '' && Number.isFinite(Number(cell));
}

/**
 * Parse a CSV matrix. A first row whose first cell is not a number is a
 * header of labels; when that cell is empty, every following row starts
 * with its own label.
 */
export function parseCsvMatrix(csv: string): MatrixInput {
  const lines = csv
    .trim()
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0)
    .map((l) => l.split(',').map((c) => c.trim()));
  if (lines.length === 0) {
    return parseMatrixInput([]);
  }

  let labels: string[] | undefined;
  let labelColumn = false;
  if (!isNumericCell(lines[0][0])) {
    const header = lines.shift() ?? [];
    labelColumn = header[0] === '';
    labels = labelColumn ? header.slice(1) : header;
  }

  const issues: string[] = [];
  const matrix = lines.map((cells, r) => {
    const values = labelColumn ? cells.slice(1) : cells;
    return values.map((cell, c) => {
      if (!isNumericCell(cell)) {
        issues.push(`row ${r} column ${c} is not a number: "${cell}"`);
      }
      return Number(cell);
    });
  });
  if (issues.length > 0) {
    throw new MatrixInputError(issues);
  }

  return parseMatrixInput(labels ? { labels, matrix } : matrix);
}
