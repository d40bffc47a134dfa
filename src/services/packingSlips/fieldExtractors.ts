/**
 * Anchor-prefix field extractors for packing-slip text.
 *
 * Every field is described declaratively (accepted labels in priority order,
 * whether the value may sit on the following line, and how far to look) and
 * read by one generic matcher. A line carries field F when, after leading
 * whitespace, it starts with one of F's labels (case-insensitive); the value
 * is whatever follows the first colon.
 *
 * Some layouts put a label alone on a line and its value below it
 * ("Ship To:" / "Jane Doe"). The order fields use lookahead: the next non-empty,
 * non-label line within the window supplies the value.
 */

import { cleanText } from './textNormalizer';

export type FieldName =
  | 'orderDate'
  | 'shippingService'
  | 'buyerName'
  | 'sku'
  | 'font'
  | 'threadColor'
  | 'giftMessage';

export type FieldSpec = {
  /** Accepted label prefixes; earlier labels win over later ones. */
  labels: readonly string[];
  lookahead: boolean;
  window: number;
  /** The colon must follow the label directly ("Embroidery Font Color:" is not "Embroidery Font"). */
  requireColon: boolean;
};

export type FieldMatch = {
  value: string;
  label: string;
  lineIndex: number;
};

export const LOOKAHEAD_WINDOW = 6;
export const QUANTITY_LOOKBACK_WINDOW = 15;

export const FIELD_SPECS: Readonly<Record<FieldName, FieldSpec>> = Object.freeze({
  orderDate: { labels: ['Order Date'], lookahead: true, window: LOOKAHEAD_WINDOW, requireColon: false },
  shippingService: { labels: ['Shipping Service'], lookahead: true, window: LOOKAHEAD_WINDOW, requireColon: false },
  buyerName: { labels: ['Buyer Name', 'Ship To'], lookahead: true, window: LOOKAHEAD_WINDOW, requireColon: false },
  sku: { labels: ['SKU'], lookahead: false, window: 0, requireColon: false },
  font: { labels: ['Choose Your Font', 'Embroidery Font'], lookahead: false, window: 0, requireColon: true },
  threadColor: { labels: ['Font Color', 'Thread Color'], lookahead: false, window: 0, requireColon: true },
  giftMessage: { labels: ['Gift Message', 'Gift Bag', 'Gift Card'], lookahead: false, window: 0, requireColon: false },
});

const ORDER_ID_LABEL = 'Order ID';
const ORDER_ANCHOR_RE = /\bOrder ID\b\s*[:#]?\s*(\d{3}-\d{7}-\d{7})(?!\d)/i;

// A label must end at a word boundary: "SKU:" and "SKU " match, "SKUs" does not.
const LABEL_BOUNDARY_RE = /^[\s:#.\-]/;
const LABEL_COLON_RE = /^\s*:/;

const ALL_LABELS: readonly string[] = [
  ORDER_ID_LABEL,
  ...Object.values(FIELD_SPECS).flatMap((spec) => spec.labels),
];

export function matchLabel(line: string, labels: readonly string[]): { label: string; rest: string } | null {
  const text = line.replace(/^\s+/, '');
  const lower = text.toLowerCase();
  for (const label of labels) {
    if (!lower.startsWith(label.toLowerCase())) continue;
    const rest = text.slice(label.length);
    if (rest && !LABEL_BOUNDARY_RE.test(rest)) continue;
    return { label, rest };
  }
  return null;
}

/** Text after the first colon, trimmed; null when there is no colon at all. */
export function valueAfterColon(text: string): string | null {
  const idx = text.indexOf(':');
  if (idx === -1) return null;
  return cleanText(text.slice(idx + 1));
}

export function isLabelLine(line: string): boolean {
  return matchLabel(line, ALL_LABELS) !== null || matchOrderAnchor(line) !== null;
}

function lookaheadValue(lines: readonly string[], anchorIndex: number, window: number): string | null {
  const last = Math.min(lines.length - 1, anchorIndex + window);
  for (let i = anchorIndex + 1; i <= last; i++) {
    const candidate = cleanText(lines[i] ?? '');
    if (!candidate) continue;
    if (isLabelLine(candidate)) return null;
    return candidate;
  }
  return null;
}

/**
 * First value for the field, trying labels in priority order. An alternate
 * label is only consulted when no line carries the primary one.
 */
export function extractField(lines: readonly string[], spec: FieldSpec): FieldMatch | null {
  for (const label of spec.labels) {
    for (let i = 0; i < lines.length; i++) {
      const m = matchLabel(lines[i] ?? '', [label]);
      if (!m || (spec.requireColon && !LABEL_COLON_RE.test(m.rest))) continue;

      const inline = valueAfterColon(m.rest);
      if (inline) return { value: inline, label, lineIndex: i };

      const bareLabel = inline === '' || m.rest.trim() === '';
      if (spec.lookahead && bareLabel) {
        const next = lookaheadValue(lines, i, spec.window);
        if (next) return { value: next, label, lineIndex: i };
      }
    }
  }
  return null;
}

export function matchOrderAnchor(line: string): string | null {
  const m = line.match(ORDER_ANCHOR_RE);
  return m?.[1] ?? null;
}

/**
 * The SKU captured on a SKU anchor line: null when the line is not a SKU
 * anchor, '' when the anchor carries no value.
 */
export function readSkuAnchor(line: string): string | null {
  const m = matchLabel(line, FIELD_SPECS.sku.labels);
  if (!m) return null;
  return valueAfterColon(m.rest) ?? '';
}

// ─── Quantity ────────────────────────────────────────────────────────────────

const QUANTITY_LINE_RE = /\bQuantity\b\s*:?\s*(\d+)\b/i;
const STANDALONE_INT_RE = /^(\d+)$/;
const LEADING_QTY_RE = /^(\d+)\s+(?:Personalized|Monogrammed|Set of|Hand Towel|Bath Towel|Bath Sheet)\b/i;

function toQuantity(raw: string | undefined): number | null {
  if (!raw) return null;
  const n = Number.parseInt(raw, 10);
  return Number.isSafeInteger(n) && n >= 1 ? n : null;
}

function firstQuantity(lines: readonly string[], re: RegExp): number | null {
  for (const line of lines) {
    const q = toQuantity(line.match(re)?.[1]);
    if (q !== null) return q;
  }
  return null;
}

/**
 * True when the block prints "Quantity N" directly above its first SKU
 * anchor, so each item's count sits above its anchor rather than below.
 */
function quantitiesPrecedeAnchors(blockLines: readonly string[]): boolean {
  const firstAnchor = blockLines.findIndex((line) => Boolean(readSkuAnchor(line)));
  for (let i = firstAnchor - 1; i >= 0; i--) {
    const line = cleanText(blockLines[i] ?? '');
    if (!line) continue;
    return QUANTITY_LINE_RE.test(line);
  }
  return false;
}

/**
 * Resolves an item's quantity.
 *
 * 1. a "Quantity N" line inside the item chunk;
 * 2. scanning backward from the SKU anchor (at most 15 lines, never past
 *    `lowerBound`): a "Quantity N" line, then a line holding only an
 *    integer, then a line that opens with an integer and a product word
 *    ("2 Personalized Towel Set ...");
 * 3. 1.
 *
 * In blocks that print quantities above their anchors, a "Quantity N" line
 * found by the backward scan wins over one inside the chunk, which belongs
 * to the next item.
 */
export function extractQuantity(
  blockLines: readonly string[],
  chunk: { start: number; end: number },
  lowerBound = 0
): number {
  const from = Math.max(lowerBound, chunk.start - QUANTITY_LOOKBACK_WINDOW);
  const before = blockLines.slice(from, chunk.start).reverse();

  if (quantitiesPrecedeAnchors(blockLines)) {
    const above = firstQuantity(before, QUANTITY_LINE_RE);
    if (above !== null) return above;
  }

  const inChunk = firstQuantity(blockLines.slice(chunk.start, chunk.end), QUANTITY_LINE_RE);
  if (inChunk !== null) return inChunk;

  for (const re of [QUANTITY_LINE_RE, STANDALONE_INT_RE, LEADING_QTY_RE]) {
    const q = firstQuantity(before, re);
    if (q !== null) return q;
  }
  return 1;
}

// ─── Customization ───────────────────────────────────────────────────────────

const BOILERPLATE_VALUE_RE = /^(?:item subtotal|promotion|tax|grand total|shipping total)/i;

/**
 * Reads "Piece Name: value" lines for the allowed piece names only. A piece
 * repeated inside one chunk keeps its last value.
 */
export function extractCustomization(lines: readonly string[], pieceNames: readonly string[]): Record<string, string> {
  const customization: Record<string, string> = {};
  // Longest first so "Oversized Bath Sheet" is tried before any shorter name.
  const names = [...pieceNames].sort((a, b) => b.length - a.length);

  for (const line of lines) {
    const m = matchLabel(line, names);
    if (!m || !LABEL_COLON_RE.test(m.rest)) continue;
    const value = valueAfterColon(m.rest);
    if (!value || BOILERPLATE_VALUE_RE.test(value)) continue;
    customization[m.label] = value;
  }
  return customization;
}

const COLOR_SWATCH_RE = /\(\s*#[0-9a-f]{3,8}\s*\)/gi;

/** "Navy (#123456)" → "Navy" */
export function stripColorSwatch(text: string): string {
  return cleanText(text.replace(COLOR_SWATCH_RE, ' '));
}
