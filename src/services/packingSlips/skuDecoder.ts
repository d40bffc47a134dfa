import type { ProductCatalog, ProductDefinition } from '../../config/productCatalog';
import { cleanText } from './textNormalizer';

export type DecodedSku = {
  /** Canonical catalog prefix, or the raw leading segment(s) for unknown SKUs. */
  prefix: string;
  productType: string;
  color: string;
  pieces: readonly string[];
  pieceSizes: Readonly<Record<string, string>>;
  unitWord: string;
  known: boolean;
  product: ProductDefinition | null;
};

const SKU_SEPARATOR_RE = /[-–]/;
const PCS_TOKEN_RE = /^(\d+)\s*pcs$/i;
const COLOR_WORD_RE = /^[A-Za-z][A-Za-z']*$/;

// Order-total text that leaks into the SKU line when the slip layout runs columns together.
const COLOR_STOP_WORDS = new Set([
  'item',
  'tax',
  'promotion',
  'total',
  'subtotal',
  'shipping',
  'grand',
  'qty',
  'quantity',
  'asin',
]);

const DEFAULT_UNIT_WORD = 'Qty';

function normalizeCountToken(token: string): string {
  const t = token.trim();
  const m = t.match(PCS_TOKEN_RE);
  return m ? `${m[1]}Pcs` : t;
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Colour words from the part of the SKU after the prefix.
 * "Mid Blue" | "MidBlue" | "mid_blue" → "Mid Blue"; stops at the first token
 * that cannot be part of a colour name ("White Item subtotal $29.99" → "White").
 */
export function normalizeSkuColor(remainder: string): string {
  const spaced = cleanText(
    remainder
      .replace(/_/g, ' ')
      .replace(/([a-z])([A-Z])/g, '$1 $2')
      .replace(/[-–]/g, ' ')
  );
  if (!spaced) return '';

  const words: string[] = [];
  for (const word of spaced.split(' ')) {
    if (!COLOR_WORD_RE.test(word) || COLOR_STOP_WORDS.has(word.toLowerCase())) break;
    words.push(titleCase(word));
  }
  return words.join(' ');
}

function fromProduct(product: ProductDefinition, remainder: string): DecodedSku {
  return {
    prefix: product.prefix,
    productType: product.label,
    color: normalizeSkuColor(remainder),
    pieces: product.pieces.map((p) => p.name),
    pieceSizes: Object.fromEntries(product.pieces.map((p) => [p.name, p.size])),
    unitWord: product.unitWord,
    known: true,
    product,
  };
}

/**
 * Maps a raw SKU to its product type, colour and expected personalised pieces.
 *
 * Pure function of the SKU and the catalog. Unknown prefixes are not an
 * error: the leading segments pass through as the product type so the item
 * still reaches the table and the labels.
 */
export function decodeSku(sku: string, catalog: ProductCatalog): DecodedSku {
  const raw = cleanText(sku);
  const tokens = raw.split(SKU_SEPARATOR_RE).map((t) => t.trim());
  const first = tokens[0] ?? '';
  const second: string | undefined = tokens.length > 1 ? tokens[1] : undefined;

  if (second !== undefined) {
    const candidate = `${first}-${normalizeCountToken(second)}`.toLowerCase();
    const product = catalog.products.find((p) => p.prefix.toLowerCase() === candidate);
    if (product) return fromProduct(product, tokens.slice(2).join('-'));

    // Older listings drop the piece count ("HT-White"); never reinterpret a different count.
    if (!PCS_TOKEN_RE.test(second)) {
      const aliased = catalog.products.find((p) => p.aliases.some((a) => a.toLowerCase() === first.toLowerCase()));
      if (aliased) return fromProduct(aliased, tokens.slice(1).join('-'));
    }
  }

  const prefix = second !== undefined ? `${first}-${second}` : raw;
  return {
    prefix,
    productType: prefix,
    color: second !== undefined ? normalizeSkuColor(tokens.slice(2).join('-')) : '',
    pieces: [],
    pieceSizes: {},
    unitWord: DEFAULT_UNIT_WORD,
    known: false,
    product: null,
  };
}

export type CustomizationEntry = { piece: string; size: string | null; value: string };

/**
 * Customization in the product's canonical piece order (the fallback
 * vocabulary order for unknown SKUs); keys outside that order follow,
 * alphabetically.
 */
export function orderedCustomization(
  customization: Readonly<Record<string, string>>,
  sku: string,
  catalog: ProductCatalog
): CustomizationEntry[] {
  const decoded = decodeSku(sku, catalog);
  const canonical = decoded.known ? decoded.pieces : catalog.fallbackPieceNames;
  const extra = Object.keys(customization)
    .filter((piece) => !canonical.includes(piece))
    .sort();

  return [...canonical, ...extra]
    .filter((piece) => Boolean(customization[piece]))
    .map((piece) => ({
      piece,
      size: decoded.pieceSizes[piece] ?? null,
      value: customization[piece] ?? '',
    }));
}
