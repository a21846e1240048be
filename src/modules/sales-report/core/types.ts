import { Type } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source document shapes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One row of the price catalogue export.
 * Extra fields are ignored; a missing price reads as 0.
 */
export const CatalogueEntrySchema = Type.Object({
  title: Type.String(),
  price: Type.Optional(Type.Number()),
});

/**
 * One row of a sales record export.
 */
export const SaleEntrySchema = Type.Object({
  Product: Type.String(),
  Quantity: Type.Number(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Domain types
// ─────────────────────────────────────────────────────────────────────────────

export interface CatalogueEntry {
  title: string;
  price: Decimal;
}

export interface SaleEntry {
  product: string;
  quantity: Decimal;
}

export interface CatalogueMatch {
  /** Absolute value of the catalogue price */
  unitPrice: Decimal;
  /** Price as it appears in the catalogue */
  originalPrice: Decimal;
}

export interface LineResult {
  product: string;
  quantity: Decimal;
  unitPrice: Decimal;
  subtotal: Decimal;
}

export interface FileTotal {
  label: string;
  totalCost: Decimal;
}

/**
 * What became of one sales record argument, in argument order.
 */
export type FileOutcome =
  | { readonly status: 'priced'; readonly label: string; readonly totalCost: Decimal }
  | { readonly status: 'failed'; readonly label: string };

export interface Aggregation {
  totalCost: Decimal;
  lines: LineResult[];
  warnings: SalesWarning[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Warnings
// ─────────────────────────────────────────────────────────────────────────────

export interface NegativeQuantityWarning {
  readonly type: 'NegativeQuantity';
  readonly product: string;
  readonly quantity: Decimal;
}

export interface NegativePriceWarning {
  readonly type: 'NegativePrice';
  readonly product: string;
  readonly price: Decimal;
}

export interface ProductNotFoundWarning {
  readonly type: 'ProductNotFound';
  readonly product: string;
}

export interface MalformedSaleWarning {
  readonly type: 'MalformedSale';
  /** Zero-based position of the entry in the sales record */
  readonly index: number;
  readonly details: string[];
}

export interface MalformedCatalogueEntryWarning {
  readonly type: 'MalformedCatalogueEntry';
  readonly index: number;
  readonly details: string[];
}

/**
 * Non-fatal data problems found while building the index or aggregating.
 */
export type SalesWarning =
  | NegativeQuantityWarning
  | NegativePriceWarning
  | ProductNotFoundWarning
  | MalformedSaleWarning
  | MalformedCatalogueEntryWarning;

// ─────────────────────────────────────────────────────────────────────────────
// Report options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * detailed: one line table per sales record.
 * summary: one table of per-record totals at the end.
 */
export type ReportMode = 'detailed' | 'summary';
