#!/usr/bin/env node
/**
 * Usage:
 *   compute-sales priceCatalogue.json salesRecord.json [salesRecord2.json ...]
 *   compute-sales --summary --output totals.txt catalogue.json a.json b.json
 */

import { computeSales } from './app/compute-sales.js';
import { errorMessage } from './common/types/errors.js';

try {
  process.exitCode = computeSales(process.argv.slice(2), { env: process.env });
} catch (error: unknown) {
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
}
