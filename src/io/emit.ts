import type { AdditivityReport, Quartet } from '../types';

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
  labels?: readonly string[];
  runId?: string;
  runNote?: string;
}

export interface ViolationDocument {
  quartet: Quartet;
  labels?: string[];
  gap: number;
  sums: { key: string; sum: number }[];
}

export interface ReportDocument {
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  size: number;
  tolerance: number;
  additive: boolean;
  quartetsChecked: number;
  violationCount: number;
  violations: ViolationDocument[];
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  document: ReportDocument;
  runId?: string;
  markdown?: string;
}

export function toReportDocument(
  report: AdditivityReport,
  runTimestamp: string,
  opts: EmitOptions = {},
): ReportDocument {
  const { labels } = opts;
  return {
    runTimestamp,
    runId: opts.runId,
    runNote: opts.runNote,
    size: report.size,
    tolerance: report.tolerance,
    additive: report.additive,
    quartetsChecked: report.quartetsChecked,
    violationCount: report.violationCount,
    violations: report.violations.map((v) => ({
      quartet: v.quartet,
      labels: labels ? v.quartet.map((i) => labels[i]) : undefined,
      gap: v.gap,
      sums: v.sums.map((s) => ({ key: s.key, sum: s.sum })),
    })),
  };
}

function quartetName(v: ViolationDocument): string {
  return (v.labels ?? v.quartet.map(String)).join(', ');
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function toMarkdown(doc: ReportDocument): string {
  const lines: string[] = [
    '# Additivity Report',
    '',
    '| Items | Quartets | Tolerance | Additive | Violations |',
    '| -----:| --------:| ---------:|:--------:| ----------:|',
    `| ${doc.size} | ${doc.quartetsChecked} | ${doc.tolerance} | ${
      doc.additive ? 'yes' : 'no'
    } | ${doc.violationCount} |`,
    '',
  ];
  if (doc.violations.length === 0) {
    return lines.join('\n');
  }

  lines.push(
    '## Violations',
    '',
    '| Quartet | Gap | Sums |',
    '| ------- | ---:| ---- |',
  );
  for (const v of doc.violations) {
    // Pipes inside a table cell must be escaped, even within code spans
    const sums = v.sums
      .map((s) => `\`${escapeCell(s.key)}\` ${s.sum.toFixed(3)}`)
      .join('; ');
    lines.push(`| ${escapeCell(quartetName(v))} | ${v.gap.toFixed(3)} | ${sums} |`);
  }
  if (doc.violationCount > doc.violations.length) {
    lines.push(
      '',
      `_${doc.violationCount - doc.violations.length} more not shown_`,
    );
  }
  lines.push('');
  return lines.join('\n');
}

/** Serialize an additivity report to JSON and optional Markdown summary. */
export function emitReport(
  report: AdditivityReport,
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const document = toReportDocument(report, runTimestamp, opts);
  const json = JSON.stringify(document, null, 2);
  const result: EmitResult = { json, runTimestamp, document };
  if (opts.runId) result.runId = opts.runId;
  if (opts.markdown) {
    result.markdown = toMarkdown(document);
  }
  return result;
}

export { toMarkdown as emitMarkdown, quartetName };
