/**
 * Aggregate Costs Use Case
 *
 * Joins one sales record against the catalogue and sums the line subtotals.
 */

import { Decimal } from 'decimal.js';

import { normalizeSale, parseSaleEntry } from './normalize-sale.js';

import type { CatalogueIndex } from '../catalogue-index.js';
import type { Aggregation, LineResult, SalesWarning } from '../types.js';

/**
 * Computes the total cost of a sales record.
 *
 * Flow, per row and in input order:
 * 1. Reject rows without a product name or quantity (MalformedSale)
 * 2. Flip a negative quantity (NegativeQuantity)
 * 3. Look the product up; unmatched rows are skipped (ProductNotFound)
 * 4. Flip a negative price (NegativePrice), once per lookup
 * 5. Add unitPrice × quantity to the total
 *
 * Rows naming the same product are priced independently, never merged.
 */
export const aggregateCosts = (index: CatalogueIndex, rows: readonly unknown[]): Aggregation => {
  const lines: LineResult[] = [];
  const warnings: SalesWarning[] = [];
  let totalCost = new Decimal(0);

  rows.forEach((row, position) => {
    const parsed = parseSaleEntry(row, position);
    if (parsed.isErr()) {
      warnings.push(parsed.error);
      return;
    }

    const normalized = normalizeSale(parsed.value);
    warnings.push(...normalized.warnings);
    const { product, quantity } = normalized.sale;

    const match = index.lookup(product);
    if (match === undefined) {
      warnings.push({ type: 'ProductNotFound', product });
      return;
    }

    if (match.originalPrice.isNegative() && !match.originalPrice.isZero()) {
      warnings.push({ type: 'NegativePrice', product, price: match.originalPrice });
    }

    const subtotal = match.unitPrice.mul(quantity);
    totalCost = totalCost.add(subtotal);
    lines.push({ product, quantity, unitPrice: match.unitPrice, subtotal });
  });

  return { totalCost, lines, warnings };
};
