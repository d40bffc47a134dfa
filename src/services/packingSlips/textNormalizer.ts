import type { PageText } from './types';

const WHITESPACE_RE = /\s+/g;
const LINE_BREAK_RE = /\r?\n|\r/;

function stripNbsp(s: string) {
  return s.replace(/\u00A0/g, ' ');
}

/** Collapses every whitespace run (including internal ones) to a single space and trims. */
export function cleanText(raw: string): string {
  return stripNbsp(String(raw ?? ''))
    .replace(WHITESPACE_RE, ' ')
    .trim();
}

export function splitPageLines(page: PageText): string[] {
  if (page === null) return [];
  if (typeof page === 'string') return page.split(LINE_BREAK_RE);
  return [...page];
}

/**
 * Flattens the pages of one document into its canonical line sequence:
 * page order kept, whitespace-only lines dropped, every kept line cleaned.
 * A page given as a blob keeps its own line boundaries.
 */
export function normalizeDocumentLines(pages: readonly PageText[]): string[] {
  const lines: string[] = [];
  for (const page of pages) {
    for (const raw of splitPageLines(page)) {
      const line = cleanText(raw);
      if (line) lines.push(line);
    }
  }
  return lines;
}
