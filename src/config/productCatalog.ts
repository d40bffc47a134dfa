/**
 * PRODUCT CATALOG
 *
 * SKU prefixes we know how to decode, in match order. Each entry maps the
 * leading SKU segment(s) to the label printed on tables and labels, the
 * personalised pieces the product ships with (in canonical print order) and
 * the unit word used next to quantities.
 *
 * Example SKUs: Set-3Pcs-White, Set-6Pcs-Mid Blue, HT-2PCS-White
 */

export type PieceDefinition = {
  name: string;
  size: string;
};

export const PRODUCTION_CATEGORIES = [
  '3/6-Pcs Sets',
  'Hand Towel Sets',
  'Bath Towel Sets',
  'Bath Sheets (1 Pc)',
] as const;

export type ProductionCategory = (typeof PRODUCTION_CATEGORIES)[number];

export interface ProductDefinition {
  prefix: string;
  /** Single-token SKU prefixes seen on older listings (e.g. "HT-White"). */
  aliases: readonly string[];
  label: string;
  pieces: readonly PieceDefinition[];
  unitWord: string;
  /** Production board bucket; a 6-piece set is cut as two 3-piece sets. */
  production: { category: ProductionCategory; setsPerUnit: number };
}

export interface ProductCatalog {
  products: readonly ProductDefinition[];
  /** Piece names accepted when the SKU prefix is not in the catalog. */
  fallbackPieceNames: readonly string[];
}

const PRODUCTS: ProductDefinition[] = [
  {
    prefix: 'Set-6Pcs',
    aliases: [],
    label: '6-Piece Towel Set',
    pieces: [
      { name: 'First Washcloth', size: 'Small' },
      { name: 'Second Washcloth', size: 'Small' },
      { name: 'First Hand Towel', size: 'Medium' },
      { name: 'Second Hand Towel', size: 'Medium' },
      { name: 'First Bath Towel', size: 'Large' },
      { name: 'Second Bath Towel', size: 'Large' },
    ],
    unitWord: 'Sets',
    production: { category: '3/6-Pcs Sets', setsPerUnit: 2 },
  },
  {
    prefix: 'Set-3Pcs',
    aliases: [],
    label: '3-Piece Towel Set',
    pieces: [
      { name: 'Washcloth', size: 'Small' },
      { name: 'Hand Towel', size: 'Medium' },
      { name: 'Bath Towel', size: 'Large' },
    ],
    unitWord: 'Sets',
    production: { category: '3/6-Pcs Sets', setsPerUnit: 1 },
  },
  {
    prefix: 'HT-2Pcs',
    aliases: ['HT'],
    label: '2-Piece Hand Towel Set',
    pieces: [
      { name: 'First Hand Towel', size: 'Medium' },
      { name: 'Second Hand Towel', size: 'Medium' },
    ],
    unitWord: 'Sets',
    production: { category: 'Hand Towel Sets', setsPerUnit: 1 },
  },
  {
    prefix: 'BT-2Pcs',
    aliases: ['BT'],
    label: '2-Piece Bath Towel Set',
    pieces: [
      { name: 'First Bath Towel', size: 'Large' },
      { name: 'Second Bath Towel', size: 'Large' },
    ],
    unitWord: 'Sets',
    production: { category: 'Bath Towel Sets', setsPerUnit: 1 },
  },
  {
    prefix: 'BS-1Pcs',
    aliases: ['BS'],
    label: 'Oversized Bath Sheet',
    pieces: [{ name: 'Oversized Bath Sheet', size: 'XL' }],
    unitWord: 'Qty',
    production: { category: 'Bath Sheets (1 Pc)', setsPerUnit: 1 },
  },
];

// Some slips use First/Second naming even for non-set listings.
const FALLBACK_PIECE_NAMES = [
  'Washcloth',
  'Hand Towel',
  'Bath Towel',
  'Oversized Bath Sheet',
  'Guest Towel',
  'First Washcloth',
  'Second Washcloth',
  'First Hand Towel',
  'Second Hand Towel',
  'First Bath Towel',
  'Second Bath Towel',
];

function freezeProduct(p: ProductDefinition): ProductDefinition {
  return Object.freeze({
    ...p,
    aliases: Object.freeze([...p.aliases]),
    pieces: Object.freeze(p.pieces.map((piece) => Object.freeze({ ...piece }))),
    production: Object.freeze({ ...p.production }),
  });
}

export const PRODUCT_CATALOG: ProductCatalog = Object.freeze({
  products: Object.freeze(PRODUCTS.map(freezeProduct)),
  fallbackPieceNames: Object.freeze([...FALLBACK_PIECE_NAMES]),
});

