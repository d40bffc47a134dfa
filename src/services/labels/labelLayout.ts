import type { ProductCatalog } from '../../config/productCatalog';
import { decodeSku, orderedCustomization } from '../packingSlips/skuDecoder';
import type { LineItem } from '../packingSlips/types';
import { truncate, wrapText } from '../../utils/textWrap';

/**
 * Label layout requests.
 *
 * The renderer (PDF, thermal printer driver, browser canvas) is not ours: we
 * hand it a canvas size and a list of positioned text elements. Coordinates
 * are PostScript points measured from the top-left corner; `y` is the
 * baseline of the line.
 */

export const POINTS_PER_INCH = 72;

export function inches(n: number): number {
  return round2(n * POINTS_PER_INCH);
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export type LabelKind = 'manufacturing' | 'gift';

export type TextStyle = {
  font: 'Helvetica' | 'Helvetica-Bold' | 'Helvetica-Oblique';
  size: number;
  /** Hex RGB. */
  color: string;
};

export type LabelField =
  | 'buyer'
  | 'orderId'
  | 'product'
  | 'quantity'
  | 'threadColor'
  | 'font'
  | 'customization'
  | 'giftNote'
  | 'giftMessage'
  | 'footer';

export type LabelElement = {
  field: LabelField;
  text: string;
  x: number;
  y: number;
  maxWidth: number;
  align: 'left' | 'center' | 'right';
  style: TextStyle;
};

export type LabelLayout = {
  kind: LabelKind;
  orderId: string;
  sku: string;
  width: number;
  height: number;
  orientation: 'landscape' | 'portrait';
  elements: LabelElement[];
};

const BLACK = '#000000';
const GREY = '#666666';

export const STYLES = {
  headline: { font: 'Helvetica-Bold', size: 20, color: BLACK },
  info: { font: 'Helvetica', size: 11, color: BLACK },
  emphasis: { font: 'Helvetica-Bold', size: 11, color: BLACK },
  footer: { font: 'Helvetica', size: 8, color: GREY },
  giftMessage: { font: 'Helvetica-Oblique', size: 16, color: BLACK },
  giftFooter: { font: 'Helvetica', size: 9, color: BLACK },
} satisfies Record<string, TextStyle>;

export const MANUFACTURING_LABEL = {
  width: inches(6),
  height: inches(4),
  marginLeft: inches(0.35),
  marginRight: inches(0.35),
  marginTop: inches(0.5),
  marginBottom: inches(0.25),
} as const;

export const GIFT_LABEL = {
  width: inches(4),
  height: inches(6),
  lineStep: inches(0.3),
  footerOffset: inches(0.4),
} as const;

export const MAX_CUSTOMIZATION_LINES = 6;
const CUSTOMIZATION_WRAP_CHARS = 64;
const GIFT_WRAP_CHARS = 28;
const BUYER_MAX_CHARS = 60;
const HEADLINE_GAP = 24;
const LINE_HEIGHT = 16;
const BLOCK_GAP = 6;

export const NO_CUSTOMIZATION_TEXT = '• (No customization text)';

/** Bulleted customization lines; continuation lines are indented under the bullet text. */
export function customizationLines(item: LineItem, catalog: ProductCatalog): string[] {
  const entries = orderedCustomization(item.customization, item.sku, catalog);
  if (entries.length === 0) return [NO_CUSTOMIZATION_TEXT];

  return entries.flatMap(({ piece, size, value }) => {
    const text = `${piece}${size ? ` (${size})` : ''}: ${value}`;
    return wrapText(text, CUSTOMIZATION_WRAP_CHARS).map((line, i) => (i === 0 ? `• ${line}` : `  ${line}`));
  });
}

export function buildManufacturingLabel(item: LineItem, catalog: ProductCatalog): LabelLayout {
  const { width, height, marginLeft, marginRight, marginTop, marginBottom } = MANUFACTURING_LABEL;
  const left = marginLeft;
  const right = round2(width - marginRight);
  const maxWidth = round2(right - left);
  const decoded = decodeSku(item.sku, catalog);
  const elements: LabelElement[] = [];

  let y = marginTop;
  const line = (field: LabelField, text: string, style: TextStyle = STYLES.info) => {
    elements.push({ field, text, x: left, y, maxWidth, align: 'left', style });
    y += LINE_HEIGHT;
  };

  if (item.buyerName) {
    elements.push({
      field: 'buyer',
      text: truncate(item.buyerName, BUYER_MAX_CHARS),
      x: left,
      y,
      maxWidth,
      align: 'left',
      style: STYLES.headline,
    });
  }
  // Keep the info block in place whether or not a headline was printed.
  y += HEADLINE_GAP;

  line('orderId', `Order ID: ${item.orderId}`);
  line('product', `Product: ${item.productType}${item.color ? ` – ${item.color}` : ''}`);
  line('quantity', `Quantity: ${item.quantity} ${decoded.unitWord}`);
  if (item.threadColorLocalized) line('threadColor', `Thread Color: ${item.threadColorLocalized}`, STYLES.emphasis);
  if (item.font) line('font', `Font: ${item.font}`);

  y += BLOCK_GAP;
  for (const text of customizationLines(item, catalog).slice(0, MAX_CUSTOMIZATION_LINES)) {
    line('customization', text);
  }

  if (item.giftMessage) {
    y += BLOCK_GAP;
    line('giftNote', 'Gift Note: YES', STYLES.emphasis);
  }

  elements.push({
    field: 'footer',
    text: `Source: ${item.sourceDocument}`,
    x: right,
    y: round2(height - marginBottom),
    maxWidth,
    align: 'right',
    style: STYLES.footer,
  });

  return {
    kind: 'manufacturing',
    orderId: item.orderId,
    sku: item.sku,
    width,
    height,
    orientation: 'landscape',
    elements,
  };
}

/** Gift card for an item with a gift message; null when there is none. */
export function buildGiftLabel(item: LineItem): LabelLayout | null {
  if (!item.giftMessage) return null;

  const { width, height, lineStep, footerOffset } = GIFT_LABEL;
  const centerX = round2(width / 2);
  const maxWidth = round2(width - 2 * inches(0.25));
  const lines = wrapText(item.giftMessage, GIFT_WRAP_CHARS);
  // Vertically centre the block around the middle of the card.
  const startY = round2(height / 2 - lines.length * inches(0.18));

  const elements: LabelElement[] = lines.map((text, i) => ({
    field: 'giftMessage',
    text,
    x: centerX,
    y: round2(startY + i * lineStep),
    maxWidth,
    align: 'center',
    style: STYLES.giftMessage,
  }));

  elements.push({
    field: 'footer',
    text: item.buyerName ? `${item.buyerName} — ${item.orderId}` : item.orderId,
    x: centerX,
    y: round2(height - footerOffset),
    maxWidth,
    align: 'center',
    style: STYLES.giftFooter,
  });

  return {
    kind: 'gift',
    orderId: item.orderId,
    sku: item.sku,
    width,
    height,
    orientation: 'portrait',
    elements,
  };
}

export function buildLabels(items: readonly LineItem[], kind: LabelKind, catalog: ProductCatalog): LabelLayout[] {
  if (kind === 'manufacturing') return items.map((item) => buildManufacturingLabel(item, catalog));
  return items.flatMap((item) => {
    const label = buildGiftLabel(item);
    return label ? [label] : [];
  });
}
