import { PRODUCTION_CATEGORIES } from '../../config/productCatalog';
import type { ProductCatalog, ProductionCategory } from '../../config/productCatalog';
import { decodeSku } from './skuDecoder';
import type { LineItem } from './types';

export type QuantityRow = { label: string; quantity: number };

export type ThreadColorRow = {
  threadColorRaw: string;
  threadColorLocalized: string;
  quantity: number;
};

export type LineItemSummary = {
  totalOrders: number;
  totalQuantity: number;
  lineCount: number;
  byProductType: QuantityRow[];
  byColor: QuantityRow[];
  byThreadColor: ThreadColorRow[];
};

export type ProductionRow = { color: string } & Record<ProductionCategory, number>;

export type LineItemFilter = {
  colors?: string[];
  skus?: string[];
  orderIds?: string[];
  /** Case-insensitive substring of the buyer name. */
  buyer?: string;
};

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function customizationPairs(item: LineItem): Array<[string, string]> {
  return Object.entries(item.customization).sort(([a], [b]) => compareStrings(a, b));
}

/** Items with equal keys are the same physical product ordered twice on one order. */
export function duplicateKey(item: LineItem): string {
  return JSON.stringify([item.orderId, item.sku, item.font, item.threadColorRaw, customizationPairs(item)]);
}

/**
 * Merges duplicates by summing quantity; the merged record keeps the
 * first-seen item's fields and position. Grouping a grouped list is a no-op.
 */
export function groupLineItems(items: readonly LineItem[]): LineItem[] {
  const grouped = new Map<string, LineItem>();
  for (const item of items) {
    const key = duplicateKey(item);
    const existing = grouped.get(key);
    grouped.set(key, existing ? Object.freeze({ ...existing, quantity: existing.quantity + item.quantity }) : item);
  }
  return Array.from(grouped.values());
}

function sumBy(items: readonly LineItem[], keyOf: (item: LineItem) => string): Map<string, number> {
  const totals = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    totals.set(key, (totals.get(key) ?? 0) + item.quantity);
  }
  return totals;
}

function toRows(totals: Map<string, number>): QuantityRow[] {
  return Array.from(totals.entries())
    .map(([label, quantity]) => ({ label, quantity }))
    .sort((a, b) => compareStrings(a.label, b.label));
}

export function summarizeLineItems(items: readonly LineItem[]): LineItemSummary {
  const threadTotals = new Map<string, ThreadColorRow>();
  for (const item of items) {
    const key = JSON.stringify([item.threadColorRaw, item.threadColorLocalized]);
    const row = threadTotals.get(key);
    if (row) {
      row.quantity += item.quantity;
    } else {
      threadTotals.set(key, {
        threadColorRaw: item.threadColorRaw,
        threadColorLocalized: item.threadColorLocalized,
        quantity: item.quantity,
      });
    }
  }

  return {
    totalOrders: new Set(items.map((i) => i.orderId)).size,
    totalQuantity: items.reduce((sum, i) => sum + i.quantity, 0),
    lineCount: items.length,
    byProductType: toRows(sumBy(items, (i) => i.productType)),
    byColor: toRows(sumBy(items, (i) => i.color)),
    byThreadColor: Array.from(threadTotals.values()).sort(
      (a, b) =>
        compareStrings(a.threadColorRaw, b.threadColorRaw) ||
        compareStrings(a.threadColorLocalized, b.threadColorLocalized)
    ),
  };
}

function emptyProductionRow(color: string): ProductionRow {
  return {
    color,
    '3/6-Pcs Sets': 0,
    'Hand Towel Sets': 0,
    'Bath Towel Sets': 0,
    'Bath Sheets (1 Pc)': 0,
  };
}

/**
 * Sets to produce per towel colour. Unknown SKUs have no production bucket
 * and are left out.
 */
export function productionSummary(items: readonly LineItem[], catalog: ProductCatalog): ProductionRow[] {
  const rows = new Map<string, ProductionRow>();
  for (const item of items) {
    const product = decodeSku(item.sku, catalog).product;
    if (!product) continue;
    const row = rows.get(item.color) ?? emptyProductionRow(item.color);
    row[product.production.category] += item.quantity * product.production.setsPerUnit;
    rows.set(item.color, row);
  }
  return Array.from(rows.values()).sort((a, b) => compareStrings(a.color, b.color));
}

export function productionTotal(row: ProductionRow): number {
  return PRODUCTION_CATEGORIES.reduce((sum, category) => sum + row[category], 0);
}

export function filterLineItems(items: readonly LineItem[], filter: LineItemFilter): LineItem[] {
  const buyer = filter.buyer?.trim().toLowerCase();
  return items.filter((item) => {
    if (filter.colors?.length && !filter.colors.includes(item.color)) return false;
    if (filter.skus?.length && !filter.skus.includes(item.sku)) return false;
    if (filter.orderIds?.length && !filter.orderIds.includes(item.orderId)) return false;
    if (buyer && !(item.buyerName ?? '').toLowerCase().includes(buyer)) return false;
    return true;
  });
}
