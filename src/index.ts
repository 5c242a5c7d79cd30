import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { checkMatrix } from './app/checkMatrix';
import { generateMatrix } from './app/generateMatrix';
import { emitHtml } from './io/emitHtml';

interface CheckCliOptions {
  matrix: string;
  tolerance?: number;
  limit?: number;
  out?: string;
  markdown?: string | boolean;
  html?: string | boolean;
  quiet?: boolean;
}

interface GenerateCliOptions {
  leaves: number;
  seed?: number;
  perturb?: number;
  out?: string;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`Expected an integer: ${value}`);
  }
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError(`Expected a finite number: ${value}`);
  }
  return n;
}

function writeOutput(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  console.log(`Wrote ${path}`);
}

export const program = new Command();

program
  .name('fourpoint')
  .description('Check distance matrices for additivity with the four-point condition')
  .version('0.1.0')
  .showHelpAfterError();

program
  .command('check', { isDefault: true })
  .description('Test every quartet of a distance matrix')
  .requiredOption('--matrix <file>', 'Path to matrix JSON or CSV file')
  .option('--tolerance <eps>', 'Squared-difference tolerance for equal sums', parseFloat)
  .option('--limit <n>', 'Maximum violations to report', parseInteger)
  .option('--out <file>', 'Write report JSON to this path (overwrite)')
  .option('--markdown [file]', 'Write Markdown report to this path (or stdout)')
  .option('--html [file]', 'Write HTML report to this path (or stdout)')
  .option('--quiet', 'Suppress the summary line')
  .action((opts: CheckCliOptions) => {
    const result = checkMatrix({
      matrixPath: opts.matrix,
      tolerance: opts.tolerance,
      limit: opts.limit,
      markdown: opts.markdown !== undefined,
      quiet: opts.quiet,
    });

    if (opts.out) {
      writeOutput(opts.out, result.json);
    }

    if (opts.markdown !== undefined && result.markdown !== undefined) {
      if (typeof opts.markdown === 'string') {
        writeOutput(opts.markdown, result.markdown);
      } else {
        console.log(result.markdown);
      }
    }

    if (opts.html !== undefined) {
      const html = emitHtml(result.document);
      if (typeof opts.html === 'string') {
        writeOutput(opts.html, html);
      } else {
        console.log(html);
      }
    }

    console.log(result.json);
  });

program
  .command('generate')
  .description('Generate the distance matrix of a seeded random tree')
  .requiredOption('--leaves <n>', 'Number of leaves', parseInteger)
  .option('--seed <seed>', 'Random seed', parseNumber)
  .option('--perturb <delta>', 'Add delta to the first-to-last leaf distance', parseNumber)
  .option('--out <file>', 'Write matrix JSON to this path (overwrite)')
  .action((opts: GenerateCliOptions) => {
    const doc = generateMatrix({
      leaves: opts.leaves,
      seed: opts.seed,
      perturb: opts.perturb,
    });
    const json = JSON.stringify(doc, null, 2);
    if (opts.out) {
      writeOutput(opts.out, json);
    } else {
      console.log(json);
    }
  });

export function run(argv: readonly string[] = process.argv): Command {
  program.parse(argv);
  return program;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run();
}
