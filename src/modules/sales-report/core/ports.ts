import type { LoadError } from './errors.js';
import type { Result } from 'neverthrow';

/**
 * Reads a file and returns its parsed JSON document.
 */
export interface DocumentLoader {
  load(path: string): Result<unknown, LoadError>;
}

/**
 * Destination for report lines. Every line emitted is written to all targets
 * the sink was built with (console and output file for the CLI).
 */
export interface ReportSink {
  emit(line: string): void;
}

export type ColumnAlign = 'left' | 'right';

export interface TableColumn {
  header: string;
  align: ColumnAlign;
}

/**
 * Renders rows of cell text under the given columns.
 * Returns the rendered lines without trailing newlines.
 */
export interface TableFormatter {
  format(columns: readonly TableColumn[], rows: readonly (readonly string[])[]): string[];
}

/**
 * Monotonic time source in milliseconds.
 */
export interface Clock {
  now(): number;
}
