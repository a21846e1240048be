/**
 * Run Sales Report Use Case
 *
 * Loads the catalogue once, then prices each sales record in the order given,
 * streaming every report line to the sink as soon as it is known.
 */

import { err, ok, type Result } from 'neverthrow';

import { aggregateCosts } from './aggregate-costs.js';
import {
  buildCatalogueHeader,
  buildFileHeader,
  buildFileSection,
  buildFooter,
  buildSummarySection,
  sumTotals,
  type ReportStyle,
} from './build-report.js';
import { buildCatalogueIndex } from '../catalogue-index.js';
import {
  createCatalogueLoadFailedError,
  createInvalidDocumentError,
  type CatalogueLoadFailedError,
  type LoadError,
} from '../errors.js';
import { formatLoadFailure } from '../format.js';

import type { Clock, DocumentLoader, ReportSink, TableFormatter } from '../ports.js';
import type { FileOutcome, FileTotal, ReportMode } from '../types.js';
import type { Decimal } from 'decimal.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunSalesReportDeps {
  loader: DocumentLoader;
  sink: ReportSink;
  formatter: TableFormatter;
  clock: Clock;
  logger: Logger;
}

export interface RunSalesReportInput {
  cataloguePath: string;
  /** Sales record paths, processed in this order */
  salesPaths: readonly string[];
  mode: ReportMode;
  currencySymbol: string;
  /**
   * Clock reading taken when the run began.
   * Defaults to the clock reading at the start of this call.
   */
  startedAt?: number;
}

export interface RunSalesReportResult {
  totals: FileTotal[];
  /** Sales record paths that could not be loaded */
  failedPaths: string[];
  grandTotal: Decimal;
  warningCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const loadRows = (loader: DocumentLoader, path: string): Result<unknown[], LoadError> =>
  loader.load(path).andThen((document): Result<unknown[], LoadError> => {
    if (!Array.isArray(document)) {
      return err(createInvalidDocumentError(path));
    }
    const rows: unknown[] = document;
    return ok(rows);
  });

/**
 * Produces the whole report.
 *
 * A sales record that fails to load is reported and skipped. A catalogue that
 * fails to load ends the run before any sales record is read.
 */
export const runSalesReport = (
  deps: RunSalesReportDeps,
  input: RunSalesReportInput
): Result<RunSalesReportResult, CatalogueLoadFailedError> => {
  const { loader, sink, formatter, clock, logger } = deps;
  const { cataloguePath, salesPaths, mode, currencySymbol } = input;
  const startedAt = input.startedAt ?? clock.now();
  const style: ReportStyle = { formatter, currencySymbol };

  const log = logger.child({ usecase: 'runSalesReport' });
  const emitAll = (lines: readonly string[]): void => {
    for (const line of lines) {
      sink.emit(line);
    }
  };

  log.info({ cataloguePath, fileCount: salesPaths.length, mode }, 'Starting sales report');

  const catalogueResult = loadRows(loader, cataloguePath);
  if (catalogueResult.isErr()) {
    const failure = createCatalogueLoadFailedError(catalogueResult.error);
    log.error({ error: catalogueResult.error }, 'Failed to load price catalogue');
    emitAll([formatLoadFailure(catalogueResult.error), failure.message]);
    return err(failure);
  }

  const { index, warnings: catalogueWarnings } = buildCatalogueIndex(catalogueResult.value);
  emitAll(buildCatalogueHeader(cataloguePath, index.size, catalogueWarnings));

  const totals: FileTotal[] = [];
  const failedPaths: string[] = [];
  const outcomes: FileOutcome[] = [];
  let warningCount = catalogueWarnings.length;

  for (const path of salesPaths) {
    const salesResult = loadRows(loader, path);
    if (salesResult.isErr()) {
      log.warn({ path, error: salesResult.error }, 'Skipping sales record');
      failedPaths.push(path);
      outcomes.push({ status: 'failed', label: path });
      emitAll([formatLoadFailure(salesResult.error), '']);
      continue;
    }

    const aggregation = aggregateCosts(index, salesResult.value);
    warningCount += aggregation.warnings.length;
    totals.push({ label: path, totalCost: aggregation.totalCost });
    outcomes.push({ status: 'priced', label: path, totalCost: aggregation.totalCost });

    log.debug(
      {
        path,
        lineCount: aggregation.lines.length,
        warningCount: aggregation.warnings.length,
      },
      'Priced sales record'
    );

    if (mode === 'detailed') {
      emitAll(
        buildFileSection(style, { label: path, aggregation, elapsedMs: clock.now() - startedAt })
      );
    } else {
      emitAll(buildFileHeader(path, aggregation.warnings));
    }
  }

  if (mode === 'summary') {
    emitAll(['', ...buildSummarySection(style, outcomes)]);
  }

  emitAll(
    buildFooter(style, {
      totals,
      fileCount: salesPaths.length,
      elapsedMs: clock.now() - startedAt,
    })
  );

  const grandTotal = sumTotals(totals);

  log.info(
    {
      processedCount: totals.length,
      failedCount: failedPaths.length,
      warningCount,
      grandTotal: grandTotal.toFixed(2),
    },
    'Sales report completed'
  );

  return ok({ totals, failedPaths, grandTotal, warningCount });
};
