import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors } from '../errors.js';
import {
  SaleEntrySchema,
  type MalformedSaleWarning,
  type NegativeQuantityWarning,
  type SaleEntry,
} from '../types.js';

const validator = TypeCompiler.Compile(SaleEntrySchema);

export interface NormalizedSale {
  sale: SaleEntry;
  warnings: NegativeQuantityWarning[];
}

/**
 * Reads one sales record row. Rows without a string `Product` or a numeric
 * `Quantity` are rejected rather than defaulted.
 */
export const parseSaleEntry = (
  row: unknown,
  index: number
): Result<SaleEntry, MalformedSaleWarning> => {
  if (!validator.Check(row)) {
    return err({
      type: 'MalformedSale',
      index,
      details: formatSchemaErrors(validator.Errors(row)),
    });
  }

  return ok({ product: row.Product, quantity: new Decimal(row.Quantity) });
};

/**
 * Flips a negative quantity to its absolute value.
 *
 * A negative quantity is a sign error in the export, not a return. The
 * warning carries the quantity as recorded.
 */
export const normalizeSale = (sale: SaleEntry): NormalizedSale => {
  if (!sale.quantity.isNegative() || sale.quantity.isZero()) {
    return { sale, warnings: [] };
  }

  return {
    sale: { product: sale.product, quantity: sale.quantity.abs() },
    warnings: [{ type: 'NegativeQuantity', product: sale.product, quantity: sale.quantity }],
  };
};
