// Shell adapters
export { createFsDocumentLoader } from './shell/loader/fs-document-loader.js';
export {
  createTeeSink,
  withTeeSink,
  type TeeSinkOptions,
  type FileReportSink,
} from './shell/sink/tee-sink.js';
export { createGridTableFormatter, formatGridTable } from './shell/table/grid-table.js';
export {
  parseArgs,
  USAGE,
  INCORRECT_USAGE_MESSAGE,
  type CliOptions,
} from './shell/cli/parse-args.js';

// Core
export {
  buildCatalogueIndex,
  parseCatalogueEntries,
  parseCatalogueRow,
  type CatalogueIndex,
} from './core/catalogue-index.js';
export type { Clock, DocumentLoader, ReportSink, TableColumn, TableFormatter } from './core/ports.js';

// Use cases
export { normalizeSale, parseSaleEntry } from './core/usecases/normalize-sale.js';
export { aggregateCosts } from './core/usecases/aggregate-costs.js';
export {
  buildCatalogueHeader,
  buildFileHeader,
  buildFileSection,
  buildSummarySection,
  buildFooter,
  type ReportStyle,
} from './core/usecases/build-report.js';
export {
  runSalesReport,
  type RunSalesReportDeps,
  type RunSalesReportInput,
  type RunSalesReportResult,
} from './core/usecases/run-sales-report.js';

// Types
export type {
  Aggregation,
  CatalogueEntry,
  CatalogueMatch,
  FileOutcome,
  FileTotal,
  LineResult,
  ReportMode,
  SaleEntry,
  SalesWarning,
} from './core/types.js';

// Errors
export type {
  LoadError,
  UsageError,
  CatalogueLoadFailedError,
  OutputUnavailableError,
} from './core/errors.js';
