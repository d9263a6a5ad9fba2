/**
 * Command definition for the sales-report CLI.
 *
 * Kept apart from the entry point so tests can drive it with their own
 * output sinks and `exitOverride()`.
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { createLogger, setLogLevel } from '../utils/logger.js';
import { loadConfig, type ReportConfig } from '../utils/config.js';
import { generateReport } from '../report/sales-report.js';
import { createDateRange } from '../filters/date-filter.js';
import { availableFormats } from '../export/formatter-factory.js';
import { REPORT_FORMATS } from '../export/types.js';
import { DELIMITERS } from '../import/types.js';
import { SalesReportError } from '../sales/errors.js';

const logger = createLogger('cli');

export interface CliOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

const processOutput: CliOutput = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

const cliOptionsSchema = z
  .object({
    format: z.enum(REPORT_FORMATS),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
    skipValidation: z.boolean().default(false),
    delimiter: z.enum(DELIMITERS),
    verbose: z.boolean().default(false),
  })
  .refine((options) => (options.startDate === undefined) === (options.endDate === undefined), {
    message: '--start-date and --end-date must be given together',
  });

export function createProgram(
  output: CliOutput = processOutput,
  config: ReportConfig = loadConfig(),
): Command {
  const program: Command = new Command();

  program
    .name('sales-report')
    .description('Sales report from a CSV file: totals per product, grand total and best seller')
    .version('0.1.0')
    .configureOutput({ writeOut: output.writeOut, writeErr: output.writeErr })
    .argument('<csv-file>', 'path to the sales CSV file')
    .addOption(
      new Option('--format <format>', 'output format')
        .choices(availableFormats())
        .default(config.defaultFormat),
    )
    .option('--start-date <date>', 'first sale date to include (YYYY-MM-DD)')
    .option('--end-date <date>', 'last sale date to include (YYYY-MM-DD)')
    .option('--skip-validation', 'accept rows without constraint checks', false)
    .addOption(
      new Option('--delimiter <delimiter>', 'field delimiter')
        .choices([...DELIMITERS])
        .default(config.delimiter),
    )
    .option('--verbose', 'log debug output to stderr', false)
    .action((csvFile: string, rawOptions: unknown) => {
      const parsed = cliOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        program.error(`error: ${parsed.error.issues[0].message}`, {
          exitCode: 1,
          code: 'sales-report.invalidOptions',
        });
      }
      const { format, startDate, endDate, skipValidation, delimiter, verbose } = parsed.data;

      setLogLevel(verbose ? 'debug' : config.logLevel);

      try {
        const dateRange =
          startDate !== undefined && endDate !== undefined
            ? createDateRange(startDate, endDate)
            : undefined;

        const report = generateReport({
          filePath: csvFile,
          format,
          dateRange,
          skipValidation,
          delimiter,
        });
        output.writeOut(`${report.output}\n`);
      } catch (err) {
        if (!(err instanceof SalesReportError)) throw err;
        logger.error({ code: err.code }, err.message);
        program.error(`error: ${err.message}`, { exitCode: 1, code: `sales-report.${err.code}` });
      }
    });

  return program;
}
