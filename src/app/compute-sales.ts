/**
 * compute-sales application
 *
 * Wires configuration, logging and the shell adapters around the sales
 * report use case, and maps the outcome to a process exit code.
 */

import { performance } from 'node:perf_hooks';

import { createConfig, parseEnv } from '../infra/config/index.js';
import { createLogger, type Logger } from '../infra/logger/index.js';
import {
  createFsDocumentLoader,
  createGridTableFormatter,
  parseArgs,
  runSalesReport,
  USAGE,
  withTeeSink,
  type Clock,
} from '../modules/sales-report/index.js';

export interface ComputeSalesOptions {
  env: NodeJS.ProcessEnv;
  /** Defaults to a logger built from the environment configuration */
  logger?: Logger;
  /** Console writer for report lines; defaults to console.log */
  writeLine?: (line: string) => void;
  /** Console writer for usage and fatal messages; defaults to console.error */
  writeError?: (line: string) => void;
  clock?: Clock;
}

const systemClock: Clock = { now: () => performance.now() };

/**
 * Runs the tool for the given arguments (without the node and script entries).
 *
 * @returns 0 when the report was produced, 1 otherwise
 */
export const computeSales = (argv: readonly string[], options: ComputeSalesOptions): number => {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  const writeError =
    options.writeError ??
    ((line: string) => {
      console.error(line);
    });

  const argsResult = parseArgs(argv);
  if (argsResult.isErr()) {
    writeError(argsResult.error.message);
    writeError(USAGE);
    return 1;
  }

  const config = createConfig(parseEnv(options.env));
  const logger =
    options.logger ?? createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const args = argsResult.value;
  const resultsPath = args.outputPath ?? config.report.resultsPath;

  const runResult = withTeeSink(
    {
      filePath: resultsPath,
      ...(options.writeLine !== undefined && { writeLine: options.writeLine }),
    },
    (sink) =>
      runSalesReport(
        {
          loader: createFsDocumentLoader(),
          sink,
          formatter: createGridTableFormatter(),
          clock,
          logger,
        },
        {
          cataloguePath: args.cataloguePath,
          salesPaths: args.salesPaths,
          mode: args.mode ?? config.report.mode,
          currencySymbol: config.report.currencySymbol,
          startedAt,
        }
      )
  );

  if (runResult.isErr()) {
    logger.error({ error: runResult.error }, 'Output file unavailable');
    writeError(runResult.error.message);
    return 1;
  }

  const reportResult = runResult.value;
  if (reportResult.isErr()) {
    return 1;
  }

  logger.info(
    { resultsPath, processedCount: reportResult.value.totals.length },
    'Report written'
  );
  return 0;
};
