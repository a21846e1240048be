import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from './errors.js';
import {
  CatalogueEntrySchema,
  type CatalogueEntry,
  type CatalogueMatch,
  type MalformedCatalogueEntryWarning,
} from './types.js';

const validator = TypeCompiler.Compile(CatalogueEntrySchema);

/**
 * Read-only product title → price lookup, shared by every sales file of a run.
 */
export interface CatalogueIndex {
  /** Number of distinct titles with a usable price */
  readonly size: number;
  lookup(title: string): CatalogueMatch | undefined;
}

export interface BuildCatalogueIndexResult {
  index: CatalogueIndex;
  warnings: MalformedCatalogueEntryWarning[];
}

/**
 * Reads one catalogue row. Rows without a string title or with a non-numeric
 * price are rejected.
 */
export const parseCatalogueRow = (
  row: unknown,
  index: number
): Result<CatalogueEntry, MalformedCatalogueEntryWarning> => {
  if (!validator.Check(row)) {
    return err({
      type: 'MalformedCatalogueEntry',
      index,
      details: formatSchemaErrors(validator.Errors(row)),
    });
  }

  return ok({ title: row.title, price: new Decimal(row.price ?? 0) });
};

/**
 * Converts raw catalogue rows to entries, skipping malformed rows.
 */
export const parseCatalogueEntries = (
  rows: readonly unknown[]
): { entries: CatalogueEntry[]; warnings: MalformedCatalogueEntryWarning[] } => {
  const entries: CatalogueEntry[] = [];
  const warnings: MalformedCatalogueEntryWarning[] = [];

  rows.forEach((row, index) => {
    parseCatalogueRow(row, index).match(
      (entry) => entries.push(entry),
      (warning) => warnings.push(warning)
    );
  });

  return { entries, warnings };
};

const titleOf = (row: unknown): string | undefined =>
  typeof row === 'object' && row !== null && 'title' in row && typeof row.title === 'string'
    ? row.title
    : undefined;

/**
 * Builds the lookup from catalogue rows.
 *
 * When several rows share a title, the first one wins and later ones are
 * never consulted. A malformed row that still carries a string title claims
 * it too, leaving that title unmatchable.
 */
export const buildCatalogueIndex = (rows: readonly unknown[]): BuildCatalogueIndexResult => {
  // null marks a title claimed by a malformed row
  const prices = new Map<string, Decimal | null>();
  const warnings: MalformedCatalogueEntryWarning[] = [];
  let size = 0;

  rows.forEach((row, position) => {
    const parsed = parseCatalogueRow(row, position);

    if (parsed.isErr()) {
      warnings.push(parsed.error);
      const title = titleOf(row);
      if (title !== undefined && !prices.has(title)) {
        prices.set(title, null);
      }
      return;
    }

    const entry = parsed.value;
    if (!prices.has(entry.title)) {
      prices.set(entry.title, entry.price);
      size += 1;
    }
  });

  const index: CatalogueIndex = {
    size,
    lookup(title: string): CatalogueMatch | undefined {
      const originalPrice = prices.get(title);
      if (originalPrice === undefined || originalPrice === null) {
        return undefined;
      }
      return { unitPrice: originalPrice.abs(), originalPrice };
    },
  };

  return { index, warnings };
};
