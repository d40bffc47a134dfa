import { describe, it, expect } from 'vitest';
import { cleanText, normalizeDocumentLines, splitPageLines } from '../../../../src/services/packingSlips/textNormalizer';

describe('textNormalizer', () => {
  it('cleanText collapses whitespace runs and non-breaking spaces', () => {
    expect(cleanText('  Jane  Doe\t\tSmith  ')).toBe('Jane Doe Smith');
    expect(cleanText('   ')).toBe('');
  });

  describe('splitPageLines', () => {
    it('returns no lines for an unreadable page', () => {
      expect(splitPageLines(null)).toEqual([]);
    });

    it('splits a text blob on any line ending', () => {
      expect(splitPageLines('a\r\nb\rc\nd')).toEqual(['a', 'b', 'c', 'd']);
    });

    it('copies a page given as lines', () => {
      const page = ['one', 'two'];
      const lines = splitPageLines(page);
      expect(lines).toEqual(['one', 'two']);
      expect(lines).not.toBe(page);
    });
  });

  it('normalizeDocumentLines keeps page order and drops blank lines', () => {
    const lines = normalizeDocumentLines([
      'Order ID: 123-4567890-1234567\n\n   SKU:   Set-3Pcs-White  ',
      null,
      ['  ', 'Washcloth: JD'],
      '',
    ]);

    expect(lines).toEqual(['Order ID: 123-4567890-1234567', 'SKU: Set-3Pcs-White', 'Washcloth: JD']);
  });
});
