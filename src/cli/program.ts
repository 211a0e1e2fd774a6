/**
 * Command-line surface for the accident summaries.
 * Results go to `out`, failures to `fail`; logging stays with the app's logger.
 */

import { Command, InvalidArgumentError } from 'commander';

import { formatSummaryMatrix } from '../modules/accidents/index.js';

import type { App } from '../app/build-app.js';

export interface ProgramDeps {
  app: App;
  out: (text: string) => void;
  fail: (message: string) => void;
  writeFile: (filePath: string, contents: string) => void;
  defaultPlotOutput: string;
}

interface SummarizeOptions {
  json?: boolean;
}

interface PlotOptions {
  out?: string;
  width?: number;
  height?: number;
}

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

export const createProgram = (deps: ProgramDeps): Command => {
  const program = new Command();

  program
    .name('fars')
    .description('Summaries and state maps from yearly FARS accident files');

  program
    .command('filename')
    .description('Print the accident file name for a year')
    .argument('<year>', 'reporting year')
    .action((year: string) => {
      const result = deps.app.resolveFilename(year);
      if (result.isErr()) {
        deps.fail(result.error.message);
        return;
      }
      deps.out(result.value);
    });

  program
    .command('summarize')
    .description('Count accidents per month for each year')
    .argument('<years...>', 'reporting years')
    .option('--json', 'print the summary matrix as JSON')
    .action((years: string[], options: SummarizeOptions) => {
      const matrix = deps.app.summarizeYears(years);
      deps.out(options.json === true ? JSON.stringify(matrix) : formatSummaryMatrix(matrix));
    });

  program
    .command('plot')
    .description('Render the accidents of one state and year as an SVG map')
    .argument('<state>', 'state code')
    .argument('<year>', 'reporting year')
    .option('-o, --out <file>', 'SVG output file')
    .option('--width <n>', 'image width in pixels', parsePositiveInt)
    .option('--height <n>', 'image height in pixels', parsePositiveInt)
    .action((state: string, year: string, options: PlotOptions) => {
      const result = deps.app.plotState(
        { stateCode: state, year },
        {
          ...(options.width !== undefined && { width: options.width }),
          ...(options.height !== undefined && { height: options.height }),
        }
      );

      if (result.isErr()) {
        deps.fail(result.error.message);
        return;
      }

      const { outcome, svg } = result.value;
      if (outcome.status === 'empty' || svg === null) {
        return;
      }

      const target = options.out ?? deps.defaultPlotOutput;
      deps.writeFile(target, svg);
      deps.out(`Wrote ${String(outcome.pointCount)} accident(s) to ${target}`);
    });

  return program;
};
