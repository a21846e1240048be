import { describe, expect, it } from 'vitest';

import { aggregateCosts } from '@/modules/sales-report/index.js';

import { catalogueRow, makeIndex, saleRow } from '../../fixtures/builders.js';

import type { Aggregation } from '@/modules/sales-report/index.js';

const snapshotOf = (aggregation: Aggregation) => ({
  total: aggregation.totalCost.toFixed(2),
  lines: aggregation.lines.map((line) => [
    line.product,
    line.quantity.toString(),
    line.unitPrice.toString(),
    line.subtotal.toString(),
  ]),
});

describe('aggregateCosts', () => {
  const catalogue = [
    catalogueRow('Widget', 10),
    catalogueRow('Gadget', 2.5),
    catalogueRow('Bolt', 0.1),
  ];

  it('prices a single matched sale', () => {
    const result = aggregateCosts(makeIndex([catalogueRow('Widget', 10)]), [saleRow('Widget', 3)]);

    expect(result.totalCost.toFixed(2)).toBe('30.00');
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0]?.subtotal.toNumber()).toBe(30);
    expect(result.warnings).toEqual([]);
  });

  it('sums price × quantity over every sale', () => {
    const sales = [saleRow('Widget', 2), saleRow('Gadget', 4), saleRow('Bolt', 3)];

    const result = aggregateCosts(makeIndex(catalogue), sales);

    // 10*2 + 2.5*4 + 0.1*3
    expect(result.totalCost.toString()).toBe('30.3');
    expect(result.warnings).toEqual([]);
  });

  it('keeps decimal sums exact', () => {
    const result = aggregateCosts(makeIndex([catalogueRow('Bolt', 0.1), catalogueRow('Nut', 0.2)]), [
      saleRow('Bolt', 1),
      saleRow('Nut', 1),
    ]);

    expect(result.totalCost.toString()).toBe('0.3');
  });

  it('flips negative price and quantity with a warning for each', () => {
    const result = aggregateCosts(makeIndex([catalogueRow('Gadget', -5)]), [saleRow('Gadget', -2)]);

    expect(result.totalCost.toFixed(2)).toBe('10.00');
    expect(result.warnings.map((warning) => warning.type)).toEqual([
      'NegativeQuantity',
      'NegativePrice',
    ]);
    expect(result.lines[0]?.quantity.toNumber()).toBe(2);
    expect(result.lines[0]?.unitPrice.toNumber()).toBe(5);
  });

  it('warns on a negative price once per lookup', () => {
    const result = aggregateCosts(makeIndex([catalogueRow('Gadget', -5)]), [
      saleRow('Gadget', 1),
      saleRow('Gadget', 1),
    ]);

    expect(result.warnings.filter((warning) => warning.type === 'NegativePrice')).toHaveLength(2);
    expect(result.totalCost.toNumber()).toBe(10);
  });

  it('skips an unmatched product with exactly one warning', () => {
    const result = aggregateCosts(makeIndex([catalogueRow('Widget', 10)]), [saleRow('Gizmo', 1)]);

    expect(result.totalCost.toFixed(2)).toBe('0.00');
    expect(result.lines).toEqual([]);
    expect(result.warnings).toEqual([{ type: 'ProductNotFound', product: 'Gizmo' }]);
  });

  it('unmatched sales do not change the total of matched ones', () => {
    const matched = [saleRow('Widget', 2), saleRow('Gadget', 2)];
    const withUnmatched = [saleRow('Widget', 2), saleRow('Gizmo', 50), saleRow('Gadget', 2)];

    const base = aggregateCosts(makeIndex(catalogue), matched);
    const result = aggregateCosts(makeIndex(catalogue), withUnmatched);

    expect(result.totalCost.equals(base.totalCost)).toBe(true);
    expect(result.warnings).toHaveLength(1);
  });

  it('names the original product in the negative quantity warning of an unmatched sale', () => {
    const result = aggregateCosts(makeIndex(catalogue), [saleRow('Gizmo', -4)]);

    expect(result.warnings.map((warning) => warning.type)).toEqual([
      'NegativeQuantity',
      'ProductNotFound',
    ]);
    expect(result.warnings[0]).toMatchObject({ type: 'NegativeQuantity', product: 'Gizmo' });
  });

  it('keeps input order and does not merge repeated products', () => {
    const sales = [saleRow('Gadget', 1), saleRow('Widget', 1), saleRow('Gadget', 3)];

    const result = aggregateCosts(makeIndex(catalogue), sales);

    expect(snapshotOf(result).lines).toEqual([
      ['Gadget', '1', '2.5', '2.5'],
      ['Widget', '1', '10', '10'],
      ['Gadget', '3', '2.5', '7.5'],
    ]);
  });

  it('is idempotent', () => {
    const index = makeIndex(catalogue);
    const sales = [saleRow('Widget', 3), saleRow('Bolt', 7), saleRow('Gizmo', 1)];

    expect(snapshotOf(aggregateCosts(index, sales))).toEqual(
      snapshotOf(aggregateCosts(index, sales))
    );
  });

  it('gives the same result when every quantity is negated', () => {
    const sales = [saleRow('Widget', 3), saleRow('Gadget', 4), saleRow('Bolt', 9)];
    const negated = sales.map((sale) => saleRow(sale.Product, -sale.Quantity));

    const index = makeIndex(catalogue);

    expect(snapshotOf(aggregateCosts(index, negated))).toEqual(
      snapshotOf(aggregateCosts(index, sales))
    );
  });

  it('gives the same result when every price is negated', () => {
    const sales = [saleRow('Widget', 3), saleRow('Gadget', 4), saleRow('Bolt', 9)];
    const negatedCatalogue = catalogue.map((row) => catalogueRow(row.title, -(row.price ?? 0)));

    expect(snapshotOf(aggregateCosts(makeIndex(negatedCatalogue), sales))).toEqual(
      snapshotOf(aggregateCosts(makeIndex(catalogue), sales))
    );
  });

  it('skips malformed sales with a warning and keeps going', () => {
    const result = aggregateCosts(makeIndex(catalogue), [
      { Product: 'Widget' },
      saleRow('Widget', 1),
      { Quantity: 3 },
    ]);

    expect(result.totalCost.toNumber()).toBe(10);
    expect(result.lines).toHaveLength(1);
    expect(result.warnings.map((warning) => warning.type)).toEqual([
      'MalformedSale',
      'MalformedSale',
    ]);
  });

  it('returns a zero total for an empty sales record', () => {
    const result = aggregateCosts(makeIndex(catalogue), []);

    expect(result.totalCost.isZero()).toBe(true);
    expect(result.lines).toEqual([]);
    expect(result.warnings).toEqual([]);
  });
});
