/**
 * Report Builder
 *
 * Turns aggregation results into report lines. Tables are rendered through
 * the TableFormatter port; nothing here writes anywhere.
 */

import { Decimal } from 'decimal.js';

import { formatElapsed, formatMoney, formatQuantity, formatWarning } from '../format.js';

import type { TableColumn, TableFormatter } from '../ports.js';
import type { Aggregation, FileOutcome, FileTotal, SalesWarning } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ReportStyle {
  formatter: TableFormatter;
  currencySymbol: string;
}

export interface FileSectionInput {
  label: string;
  aggregation: Aggregation;
  /** Milliseconds since the run began */
  elapsedMs: number;
}

export interface FooterInput {
  totals: FileTotal[];
  fileCount: number;
  elapsedMs: number;
}

const LINE_COLUMNS: readonly TableColumn[] = [
  { header: 'Product', align: 'left' },
  { header: 'Quantity', align: 'right' },
  { header: 'Unit Price', align: 'right' },
  { header: 'Subtotal', align: 'right' },
];

const SUMMARY_COLUMNS: readonly TableColumn[] = [
  { header: 'Sales Record', align: 'left' },
  { header: 'Total Cost', align: 'right' },
];

// ─────────────────────────────────────────────────────────────────────────────
// Sections
// ─────────────────────────────────────────────────────────────────────────────

export const buildCatalogueHeader = (
  path: string,
  productCount: number,
  warnings: readonly SalesWarning[]
): string[] => [
  `Price catalogue: ${path} (${String(productCount)} product(s))`,
  ...warnings.map(formatWarning),
  '',
];

/**
 * Label and warnings of one sales record, without the line table.
 * Summary mode emits only this part per file.
 */
export const buildFileHeader = (label: string, warnings: readonly SalesWarning[]): string[] => [
  `Sales record: ${label}`,
  ...warnings.map(formatWarning),
];

/**
 * Full per-file section: label, warnings, line table, total and elapsed time.
 */
export const buildFileSection = (style: ReportStyle, input: FileSectionInput): string[] => {
  const { label, aggregation, elapsedMs } = input;
  const { formatter, currencySymbol } = style;

  const table =
    aggregation.lines.length === 0
      ? ['No matched sales.']
      : formatter.format(
          LINE_COLUMNS,
          aggregation.lines.map((line) => [
            line.product,
            formatQuantity(line.quantity),
            formatMoney(line.unitPrice, currencySymbol),
            formatMoney(line.subtotal, currencySymbol),
          ])
        );

  return [
    ...buildFileHeader(label, aggregation.warnings),
    ...table,
    `Total cost of sales: ${formatMoney(aggregation.totalCost, currencySymbol)}`,
    formatElapsed(elapsedMs),
    '',
  ];
};

const LOAD_FAILED = 'load failed';

/**
 * One table mapping each sales record argument to its total, or to
 * `load failed` when it could not be read.
 */
export const buildSummarySection = (
  style: ReportStyle,
  outcomes: readonly FileOutcome[]
): string[] => {
  if (outcomes.length === 0) {
    return ['No sales records processed.', ''];
  }

  return [
    'Summary',
    ...style.formatter.format(
      SUMMARY_COLUMNS,
      outcomes.map((outcome) => [
        outcome.label,
        outcome.status === 'priced'
          ? formatMoney(outcome.totalCost, style.currencySymbol)
          : LOAD_FAILED,
      ])
    ),
    '',
  ];
};

export const sumTotals = (totals: readonly FileTotal[]): Decimal =>
  totals.reduce((sum, total) => sum.add(total.totalCost), new Decimal(0));

export const buildFooter = (style: ReportStyle, input: FooterInput): string[] => {
  const grandTotal = formatMoney(sumTotals(input.totals), style.currencySymbol);
  const processed = `${String(input.totals.length)} of ${String(input.fileCount)} file(s) processed`;

  return [`Grand total of sales: ${grandTotal} (${processed})`, formatElapsed(input.elapsedMs)];
};
