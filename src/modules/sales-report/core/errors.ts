/**
 * Sales Report Module - Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Load Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface DocumentNotFoundError {
  readonly type: 'NotFound';
  readonly message: string;
  readonly path: string;
}

export interface DocumentReadError {
  readonly type: 'ReadError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

export interface DocumentParseError {
  readonly type: 'ParseError';
  readonly message: string;
  readonly path: string;
}

/**
 * The file parsed, but is not a JSON array of entries.
 */
export interface InvalidDocumentError {
  readonly type: 'InvalidDocument';
  readonly message: string;
  readonly path: string;
}

export type LoadError =
  | DocumentNotFoundError
  | DocumentReadError
  | DocumentParseError
  | InvalidDocumentError;

// ─────────────────────────────────────────────────────────────────────────────
// Run Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface CatalogueLoadFailedError {
  readonly type: 'CatalogueLoadFailed';
  readonly message: string;
  readonly cause: LoadError;
}

export interface OutputUnavailableError {
  readonly type: 'OutputUnavailable';
  readonly message: string;
  readonly path: string;
}

export interface UsageError {
  readonly type: 'UsageError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidDocumentError = (path: string): InvalidDocumentError => ({
  type: 'InvalidDocument',
  message: 'expected a JSON array of entries',
  path,
});

export const createCatalogueLoadFailedError = (cause: LoadError): CatalogueLoadFailedError => ({
  type: 'CatalogueLoadFailed',
  message: 'Error: Failed to load the price catalogue.',
  cause,
});

export const createOutputUnavailableError = (
  path: string,
  reason: string
): OutputUnavailableError => ({
  type: 'OutputUnavailable',
  message: `Cannot open output file ${path}: ${reason}`,
  path,
});

export const createUsageError = (message: string): UsageError => ({
  type: 'UsageError',
  message,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path || '/'}: ${error.message}`);
