import { describe, it, expect } from 'vitest';
import { PRODUCT_CATALOG } from '../../../../src/config/productCatalog';
import {
  filterLineItems,
  groupLineItems,
  productionSummary,
  productionTotal,
  summarizeLineItems,
} from '../../../../src/services/packingSlips/grouping';
import { ORDER_A, ORDER_B, makeItem } from '../../../fixtures/lineItems';

const totalQuantity = (items: ReadonlyArray<{ quantity: number }>) => items.reduce((sum, i) => sum + i.quantity, 0);

describe('groupLineItems', () => {
  it('merges duplicates by summing quantity and keeps the first-seen fields', () => {
    const a = makeItem({ quantity: 1 });
    const again = makeItem({ quantity: 2, sourceDocument: 'slip-2.pdf' });
    const other = makeItem({ customization: { Washcloth: 'KL' } });

    const grouped = groupLineItems([a, again, other]);

    expect(grouped).toHaveLength(2);
    expect(grouped[0]).toMatchObject({ quantity: 3, sourceDocument: 'slip-1.pdf' });
    expect(grouped[1]).toBe(other);
  });

  it('ignores the order customization keys were read in', () => {
    const a = makeItem({ customization: { Washcloth: 'JD', 'Hand Towel': 'AB' } });
    const b = makeItem({ customization: { 'Hand Towel': 'AB', Washcloth: 'JD' } });

    expect(groupLineItems([a, b])).toHaveLength(1);
  });

  it('keeps items of different orders or thread colours apart', () => {
    const items = [makeItem(), makeItem({ orderId: ORDER_B }), makeItem({ threadColorRaw: 'Gold' })];
    expect(groupLineItems(items)).toHaveLength(3);
  });

  it('is idempotent and conserves quantity', () => {
    const items = [makeItem({ quantity: 2 }), makeItem({ quantity: 5 }), makeItem({ sku: 'HT-2Pcs-White' })];
    const grouped = groupLineItems(items);

    expect(groupLineItems(grouped)).toEqual(grouped);
    expect(totalQuantity(grouped)).toBe(totalQuantity(items));
  });
});

describe('summarizeLineItems', () => {
  it('totals quantity by product type, colour and thread colour', () => {
    const items = [
      makeItem({ quantity: 2 }),
      makeItem({
        sku: 'HT-2Pcs-Navy',
        productType: '2-Piece Hand Towel Set',
        color: 'Navy',
        threadColorRaw: 'Gold',
        threadColorLocalized: 'Dorado (Gold)',
        quantity: 3,
      }),
      makeItem({ orderId: ORDER_B, quantity: 1 }),
    ];

    expect(summarizeLineItems(items)).toEqual({
      totalOrders: 2,
      totalQuantity: 6,
      lineCount: 3,
      byProductType: [
        { label: '2-Piece Hand Towel Set', quantity: 3 },
        { label: '3-Piece Towel Set', quantity: 3 },
      ],
      byColor: [
        { label: 'Navy', quantity: 3 },
        { label: 'White', quantity: 3 },
      ],
      byThreadColor: [
        { threadColorRaw: 'Gold', threadColorLocalized: 'Dorado (Gold)', quantity: 3 },
        { threadColorRaw: 'Navy', threadColorLocalized: 'Azul Marino (Navy)', quantity: 3 },
      ],
    });
  });

  it('does not depend on item order', () => {
    const items = [makeItem({ quantity: 2 }), makeItem({ color: 'Navy' }), makeItem({ orderId: ORDER_B })];
    expect(summarizeLineItems([...items].reverse())).toEqual(summarizeLineItems(items));
  });
});

describe('productionSummary', () => {
  it('counts sets per towel colour, a 6-piece set as two', () => {
    const items = [
      makeItem({ sku: 'Set-6Pcs-White', quantity: 2 }),
      makeItem({ sku: 'Set-3Pcs-White', quantity: 1 }),
      makeItem({ sku: 'HT-2Pcs-Navy', color: 'Navy', quantity: 3 }),
      makeItem({ sku: 'BS-1Pcs-White', quantity: 1 }),
      makeItem({ sku: 'XX-1-Red', color: 'Red', quantity: 4 }),
    ];

    const rows = productionSummary(items, PRODUCT_CATALOG);

    expect(rows).toEqual([
      { color: 'Navy', '3/6-Pcs Sets': 0, 'Hand Towel Sets': 3, 'Bath Towel Sets': 0, 'Bath Sheets (1 Pc)': 0 },
      { color: 'White', '3/6-Pcs Sets': 5, 'Hand Towel Sets': 0, 'Bath Towel Sets': 0, 'Bath Sheets (1 Pc)': 1 },
    ]);
    expect(rows.map(productionTotal)).toEqual([3, 6]);
  });
});

describe('filterLineItems', () => {
  const items = [
    makeItem(),
    makeItem({ orderId: ORDER_B, buyerName: 'Sam Lee', sku: 'HT-2Pcs-Navy', color: 'Navy' }),
  ];

  it('filters by colour, SKU and order id', () => {
    expect(filterLineItems(items, { colors: ['Navy'] })).toEqual([items[1]]);
    expect(filterLineItems(items, { skus: ['Set-3Pcs-White'] })).toEqual([items[0]]);
    expect(filterLineItems(items, { orderIds: [ORDER_A, ORDER_B] })).toEqual(items);
  });

  it('matches a buyer substring case-insensitively', () => {
    expect(filterLineItems(items, { buyer: '  LEE ' })).toEqual([items[1]]);
  });

  it('treats empty criteria as no filter', () => {
    expect(filterLineItems(items, { colors: [], buyer: '' })).toEqual(items);
  });
});
