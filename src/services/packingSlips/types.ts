import z from 'zod';
import type { ProductCatalog } from '../../config/productCatalog';
import type { ThreadColorDictionary } from '../../config/threadColors';

export const ORDER_ID_RE = /^\d{3}-\d{7}-\d{7}$/;

/**
 * One page of extracted text: a text blob, a list of lines, or null when the
 * extractor could not read that page.
 */
export type PageText = string | readonly string[] | null;

export const LineItemSchema = z.object({
  orderId: z.string().regex(ORDER_ID_RE),
  orderDate: z.string().min(1).optional(),
  shippingService: z.string().min(1).optional(),
  buyerName: z.string().min(1).optional(),
  sku: z.string().min(1),
  productType: z.string().min(1),
  color: z.string(),
  font: z.string(),
  threadColorRaw: z.string(),
  threadColorLocalized: z.string(),
  quantity: z.number().int().min(1),
  customization: z.record(z.string()),
  giftMessage: z.string().min(1).optional(),
  sourceDocument: z.string(),
});

export type LineItem = Readonly<z.infer<typeof LineItemSchema>>;

/**
 * Builds a frozen LineItem, or returns null when the fields break an invariant
 * (bad order id, non-positive quantity, missing SKU). Never half-built.
 */
export function createLineItem(fields: z.input<typeof LineItemSchema>): LineItem | null {
  const parsed = LineItemSchema.safeParse(fields);
  if (!parsed.success) return null;
  return Object.freeze({
    ...parsed.data,
    customization: Object.freeze({ ...parsed.data.customization }),
  });
}

/** Order-level fields shared by every item of one order block. */
export type OrderContext = {
  orderId: string;
  orderDate?: string;
  shippingService?: string;
  buyerName?: string;
  /** Gift message found in the block header, before the first item. */
  giftMessage?: string;
};

export type OrderBlock = {
  orderId: string;
  /** Index of the anchor line in the document line sequence. */
  startLine: number;
  lines: readonly string[];
};

export type ItemChunk = {
  sku: string;
  /** Chunk bounds inside the enclosing block's lines: [start, end). start is the SKU anchor line. */
  start: number;
  end: number;
  lines: readonly string[];
};

/** Static lookup tables, loaded once and passed by reference into the pipeline. */
export type ParserTables = {
  catalog: ProductCatalog;
  threadColors: ThreadColorDictionary;
};
