import { matchOrderAnchor, readSkuAnchor } from './fieldExtractors';
import type { ItemChunk, OrderBlock } from './types';

type AnchoredSpan<A> = { anchor: A; start: number; end: number };

type SegmenterState<A> =
  | { kind: 'before-first-anchor' }
  | { kind: 'in-span'; anchor: A; start: number };

/**
 * Splits lines into spans that each start at an anchor line and run until
 * the next anchor (exclusive) or the end. Lines before the first anchor
 * belong to no span and are dropped.
 */
function splitOnAnchors<A>(lines: readonly string[], readAnchor: (line: string) => A | null): AnchoredSpan<A>[] {
  const spans: AnchoredSpan<A>[] = [];
  let state: SegmenterState<A> = { kind: 'before-first-anchor' };

  for (let index = 0; index < lines.length; index++) {
    const anchor = readAnchor(lines[index] ?? '');
    if (anchor === null) continue;

    if (state.kind === 'in-span') {
      spans.push({ anchor: state.anchor, start: state.start, end: index });
    }
    state = { kind: 'in-span', anchor, start: index };
  }

  if (state.kind === 'in-span') {
    spans.push({ anchor: state.anchor, start: state.start, end: lines.length });
  }
  return spans;
}

/** One block per order-id anchor; N anchors give N blocks. */
export function segmentOrders(lines: readonly string[]): OrderBlock[] {
  return splitOnAnchors(lines, matchOrderAnchor).map(({ anchor, start, end }) => ({
    orderId: anchor,
    startLine: start,
    lines: lines.slice(start, end),
  }));
}

function readNonEmptySku(line: string): string | null {
  const sku = readSkuAnchor(line);
  return sku ? sku : null;
}

/**
 * One chunk per SKU anchor inside the block. A block without SKU anchors
 * (cancelled or metadata-only orders) yields none; a SKU label without a
 * value identifies nothing and does not open a chunk.
 */
export function segmentItems(block: OrderBlock): ItemChunk[] {
  return splitOnAnchors(block.lines, readNonEmptySku).map(({ anchor, start, end }) => ({
    sku: anchor,
    start,
    end,
    lines: block.lines.slice(start, end),
  }));
}
