import { PRODUCTION_CATEGORIES } from '../../config/productCatalog';
import type { ProductCatalog } from '../../config/productCatalog';
import { productionTotal } from '../packingSlips/grouping';
import type { ProductionRow } from '../packingSlips/grouping';
import { orderedCustomization } from '../packingSlips/skuDecoder';
import type { LineItem } from '../packingSlips/types';

export const LINE_ITEM_COLUMNS = [
  'Order ID',
  'Buyer Name',
  'SKU',
  'Product Type',
  'Color',
  'Font',
  'Thread Color',
  'Thread Color (Raw)',
  'Customization',
  'Quantity',
  'Gift Message',
  'Source Document',
] as const;

export type LineItemColumn = (typeof LINE_ITEM_COLUMNS)[number];
export type LineItemRow = Record<LineItemColumn, string | number>;

export const CUSTOMIZATION_SEPARATOR = ' | ';

export const PRODUCTION_COLUMNS = ['Color', ...PRODUCTION_CATEGORIES, 'Total'] as const;

/** "Washcloth: JD | Hand Towel: AB" in the product's canonical piece order. */
export function flattenCustomization(item: LineItem, catalog: ProductCatalog): string {
  return orderedCustomization(item.customization, item.sku, catalog)
    .map(({ piece, value }) => `${piece}: ${value}`)
    .join(CUSTOMIZATION_SEPARATOR);
}

export function toLineItemRow(item: LineItem, catalog: ProductCatalog): LineItemRow {
  return {
    'Order ID': item.orderId,
    'Buyer Name': item.buyerName ?? '',
    SKU: item.sku,
    'Product Type': item.productType,
    Color: item.color,
    Font: item.font,
    'Thread Color': item.threadColorLocalized,
    'Thread Color (Raw)': item.threadColorRaw,
    Customization: flattenCustomization(item, catalog),
    Quantity: item.quantity,
    'Gift Message': item.giftMessage ?? '',
    'Source Document': item.sourceDocument,
  };
}

const NEEDS_QUOTING_RE = /[",\r\n]/;

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTING_RE.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180: CRLF between records and after the last one. */
export function toCsv(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
  return [header, ...rows].map((row) => row.map(escapeCsvField).join(',')).join('\r\n') + '\r\n';
}

export function lineItemsToCsv(items: readonly LineItem[], catalog: ProductCatalog): string {
  const rows = items.map((item) => {
    const row = toLineItemRow(item, catalog);
    return LINE_ITEM_COLUMNS.map((column) => row[column]);
  });
  return toCsv(LINE_ITEM_COLUMNS, rows);
}

export function productionSummaryToCsv(rows: readonly ProductionRow[]): string {
  return toCsv(
    PRODUCTION_COLUMNS,
    rows.map((row) => [row.color, ...PRODUCTION_CATEGORIES.map((category) => row[category]), productionTotal(row)])
  );
}
