import { segmentItems, segmentOrders } from './blockSegmenter';
import {
  FIELD_SPECS,
  extractCustomization,
  extractField,
  extractQuantity,
  stripColorSwatch,
} from './fieldExtractors';
import { decodeSku } from './skuDecoder';
import { localizeThreadColor } from './threadColors';
import { createLineItem } from './types';
import type { ItemChunk, LineItem, OrderBlock, OrderContext, ParserTables } from './types';

export type AssembledDocument = {
  items: LineItem[];
  orderBlocks: number;
  itemChunks: number;
  /** Chunks that could not become a valid LineItem. */
  droppedChunks: number;
};

/**
 * Order-level fields, read once per block and handed to every item by value.
 * The gift message here only comes from the block header (before the first
 * item) so one item's note never lands on its siblings.
 */
export function readOrderContext(block: OrderBlock, chunks: readonly ItemChunk[]): OrderContext {
  const headerEnd = chunks[0]?.start ?? block.lines.length;
  const header = block.lines.slice(0, headerEnd);

  return {
    orderId: block.orderId,
    orderDate: extractField(block.lines, FIELD_SPECS.orderDate)?.value,
    shippingService: extractField(block.lines, FIELD_SPECS.shippingService)?.value,
    buyerName: extractField(block.lines, FIELD_SPECS.buyerName)?.value,
    giftMessage: extractField(header, FIELD_SPECS.giftMessage)?.value,
  };
}

export function assembleItem(params: {
  chunk: ItemChunk;
  block: OrderBlock;
  context: OrderContext;
  tables: ParserTables;
  sourceDocument: string;
  /** Quantity never scans back past this block line (the previous item's anchor). */
  quantityLowerBound?: number;
}): LineItem | null {
  const { chunk, block, context, tables, sourceDocument } = params;

  const decoded = decodeSku(chunk.sku, tables.catalog);
  const threadColorRaw = stripColorSwatch(extractField(chunk.lines, FIELD_SPECS.threadColor)?.value ?? '');
  const pieceNames = decoded.known ? decoded.pieces : tables.catalog.fallbackPieceNames;

  return createLineItem({
    orderId: context.orderId,
    orderDate: context.orderDate,
    shippingService: context.shippingService,
    buyerName: context.buyerName,
    sku: chunk.sku,
    productType: decoded.productType,
    color: decoded.color,
    font: extractField(chunk.lines, FIELD_SPECS.font)?.value ?? '',
    threadColorRaw,
    threadColorLocalized: localizeThreadColor(threadColorRaw, tables.threadColors).display,
    quantity: extractQuantity(block.lines, chunk, params.quantityLowerBound ?? 0),
    customization: extractCustomization(chunk.lines, pieceNames),
    giftMessage: extractField(chunk.lines, FIELD_SPECS.giftMessage)?.value ?? context.giftMessage,
    sourceDocument,
  });
}

/** All line items of one normalised document, in document order. */
export function assembleDocument(
  lines: readonly string[],
  sourceDocument: string,
  tables: ParserTables
): AssembledDocument {
  const result: AssembledDocument = { items: [], orderBlocks: 0, itemChunks: 0, droppedChunks: 0 };

  for (const block of segmentOrders(lines)) {
    result.orderBlocks += 1;
    const chunks = segmentItems(block);
    const context = readOrderContext(block, chunks);

    chunks.forEach((chunk, i) => {
      result.itemChunks += 1;
      const previous = i > 0 ? chunks[i - 1] : undefined;
      const item = assembleItem({
        chunk,
        block,
        context,
        tables,
        sourceDocument,
        quantityLowerBound: previous ? previous.start + 1 : 0,
      });
      if (item) {
        result.items.push(item);
      } else {
        result.droppedChunks += 1;
      }
    });
  }

  return result;
}
