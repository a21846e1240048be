/**
 * Grid table output - bordered, fixed-width text table.
 */

import type { ColumnAlign, TableColumn, TableFormatter } from '../../core/ports.js';

const pad = (value: string, width: number, align: ColumnAlign): string =>
  align === 'right' ? value.padStart(width) : value.padEnd(width);

const rule = (widths: readonly number[], fill: string): string =>
  `+${widths.map((width) => fill.repeat(width + 2)).join('+')}+`;

/**
 * Format rows as a grid:
 *
 * ```
 * +---------+----------+
 * | Product | Quantity |
 * +=========+==========+
 * | Widget  |        3 |
 * +---------+----------+
 * ```
 */
export const formatGridTable = (
  columns: readonly TableColumn[],
  rows: readonly (readonly string[])[]
): string[] => {
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...rows.map((row) => (row[i] ?? '').length))
  );

  const renderRow = (cells: readonly string[]): string => {
    const padded = columns.map((column, i) => pad(cells[i] ?? '', widths[i] ?? 0, column.align));
    return `| ${padded.join(' | ')} |`;
  };

  return [
    rule(widths, '-'),
    renderRow(columns.map((column) => column.header)),
    rule(widths, '='),
    ...rows.map(renderRow),
    rule(widths, '-'),
  ];
};

export const createGridTableFormatter = (): TableFormatter => ({
  format: formatGridTable,
});
