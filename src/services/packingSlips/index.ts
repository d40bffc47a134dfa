import { PRODUCT_CATALOG } from '../../config/productCatalog';
import { THREAD_COLOR_ES } from '../../config/threadColors';
import type { ParserTables } from './types';

export const DEFAULT_PARSER_TABLES: ParserTables = Object.freeze({
  catalog: PRODUCT_CATALOG,
  threadColors: THREAD_COLOR_ES,
});

export * from './types';
export { cleanText, normalizeDocumentLines, splitPageLines } from './textNormalizer';
export {
  FIELD_SPECS,
  extractCustomization,
  extractField,
  extractQuantity,
  matchLabel,
  matchOrderAnchor,
  readSkuAnchor,
  stripColorSwatch,
} from './fieldExtractors';
export type { FieldMatch, FieldName, FieldSpec } from './fieldExtractors';
export { decodeSku, normalizeSkuColor, orderedCustomization } from './skuDecoder';
export type { CustomizationEntry, DecodedSku } from './skuDecoder';
export { localizeThreadColor } from './threadColors';
export type { LocalizedThreadColor } from './threadColors';
export { segmentItems, segmentOrders } from './blockSegmenter';
export { assembleDocument, assembleItem, readOrderContext } from './recordAssembler';
export type { AssembledDocument } from './recordAssembler';
export {
  duplicateKey,
  filterLineItems,
  groupLineItems,
  productionSummary,
  productionTotal,
  summarizeLineItems,
} from './grouping';
export type { LineItemFilter, LineItemSummary, ProductionRow, QuantityRow, ThreadColorRow } from './grouping';
