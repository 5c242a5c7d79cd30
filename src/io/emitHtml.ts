import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import { quartetName, type ReportDocument } from './emit';

const defaultTemplate = readFileSync(
  new URL('./templates/report.mustache', import.meta.url),
  'utf8',
);
const defaultPartials = {
  violation: readFileSync(
    new URL('./templates/violation.mustache', import.meta.url),
    'utf8',
  ),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
}

interface ViewModel {
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  statusClass: string;
  statusText: string;
  size: number;
  quartetsChecked: number;
  tolerance: number;
  violationCount: number;
  hasViolations: boolean;
  violations: {
    name: string;
    gap: string;
    sums: { key: string; sum: string }[];
  }[];
}

export function emitHtml(
  doc: ReportDocument,
  opts: EmitHtmlOptions = {},
): string {
  const view: ViewModel = {
    runTimestamp: doc.runTimestamp,
    runId: doc.runId,
    runNote: doc.runNote,
    statusClass: doc.additive ? 'additive' : 'not-additive',
    statusText: doc.additive ? 'Matrix is additive' : 'Matrix is not additive',
    size: doc.size,
    quartetsChecked: doc.quartetsChecked,
    tolerance: doc.tolerance,
    violationCount: doc.violationCount,
    hasViolations: doc.violations.length > 0,
    violations: doc.violations.map((v) => ({
      name: quartetName(v),
      gap: v.gap.toFixed(3),
      sums: v.sums.map((s) => ({ key: s.key, sum: s.sum.toFixed(3) })),
    })),
  };
  const template = opts.template ?? defaultTemplate;
  const partials = { ...defaultPartials, ...opts.partials };
  return Mustache.render(template, view, partials);
}

export default emitHtml;
