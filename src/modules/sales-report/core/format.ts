import type { LoadError } from './errors.js';
import type { SalesWarning } from './types.js';
import type { Decimal } from 'decimal.js';

export const formatMoney = (amount: Decimal, currencySymbol: string): string =>
  `${currencySymbol}${amount.toFixed(2)}`;

export const formatQuantity = (quantity: Decimal): string => quantity.toString();

export const formatElapsed = (elapsedMs: number): string =>
  `Execution time: ${(elapsedMs / 1000).toFixed(6)} seconds`;

export const formatLoadFailure = (error: LoadError): string =>
  `Error loading ${error.path}: ${error.message}`;

const entryDetails = (details: string[]): string =>
  details.length > 0 ? ` (${details.join('; ')})` : '';

export const formatWarning = (warning: SalesWarning): string => {
  switch (warning.type) {
    case 'NegativeQuantity':
      return `Warning: Negative quantity ${warning.quantity.toString()} for product '${warning.product}'; using its absolute value.`;
    case 'NegativePrice':
      return `Warning: Negative price ${warning.price.toString()} for product '${warning.product}'; using its absolute value.`;
    case 'ProductNotFound':
      return `Warning: Product '${warning.product}' not found in the price catalogue; sale skipped.`;
    case 'MalformedSale':
      return `Warning: Sale entry #${String(warning.index + 1)} is malformed${entryDetails(warning.details)}; sale skipped.`;
    case 'MalformedCatalogueEntry':
      return `Warning: Catalogue entry #${String(warning.index + 1)} is malformed${entryDetails(warning.details)}; entry skipped.`;
  }
};
