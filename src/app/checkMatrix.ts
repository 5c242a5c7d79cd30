import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { checkAdditivity } from '../additivity';
import { MatrixInputError } from '../errors';
import { emitReport, type EmitResult } from '../io/emit';
import { parseCsvMatrix, parseMatrixInput } from '../io/parse';
import { DEFAULT_TOLERANCE, type AdditivityReport, type MatrixInput } from '../types';

export const DEFAULT_VIOLATION_LIMIT = 10;

export interface CheckMatrixOptions {
  matrixPath: string;
  tolerance?: number;
  limit?: number;
  markdown?: boolean;
  quiet?: boolean;
}

export interface CheckMatrixResult extends EmitResult {
  report: AdditivityReport;
  labels?: string[];
}

export function loadMatrix(path: string): MatrixInput {
  const raw = readFileSync(path, 'utf8');
  if (extname(path).toLowerCase() === '.csv') {
    return parseCsvMatrix(raw);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new MatrixInputError([
      `${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  return parseMatrixInput(json);
}

export function checkMatrix(opts: CheckMatrixOptions): CheckMatrixResult {
  const input = loadMatrix(opts.matrixPath);
  const tolerance =
    opts.tolerance ?? input.config.tolerance ?? DEFAULT_TOLERANCE;
  const report = checkAdditivity(input.matrix, {
    tolerance,
    limit: opts.limit ?? DEFAULT_VIOLATION_LIMIT,
  });

  const runTimestamp = new Date().toISOString();
  const emit = emitReport(report, runTimestamp, {
    labels: input.labels,
    runId: input.config.runId,
    runNote: input.config.runNote,
    markdown: opts.markdown,
  });

  if (!opts.quiet) {
    const summaryParts = [
      `Matrix ${report.size}x${report.size}`,
      `quartets=${report.quartetsChecked}`,
      `tolerance=${report.tolerance}`,
      `additive=${report.additive ? 'yes' : 'no'}`,
      `violations=${report.violationCount}`,
    ];
    console.log(summaryParts.join(' | '));
  }
  return { ...emit, report, labels: input.labels };
}
