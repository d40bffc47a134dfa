import { describe, it, expect } from 'vitest';
import {
  FIELD_SPECS,
  extractCustomization,
  extractField,
  extractQuantity,
  matchLabel,
  matchOrderAnchor,
  readSkuAnchor,
  stripColorSwatch,
} from '../../../../src/services/packingSlips/fieldExtractors';

describe('fieldExtractors', () => {
  describe('matchLabel', () => {
    it('matches a label prefix case-insensitively after leading whitespace', () => {
      expect(matchLabel('  sku: Set-3Pcs-White', ['SKU'])).toEqual({ label: 'SKU', rest: ': Set-3Pcs-White' });
    });

    it('requires the label to end at a boundary', () => {
      expect(matchLabel('SKUs ordered: 3', ['SKU'])).toBeNull();
    });
  });

  describe('extractField', () => {
    it('reads an inline value after the colon', () => {
      expect(extractField(['Buyer Name: Jane Doe'], FIELD_SPECS.buyerName)).toEqual({
        value: 'Jane Doe',
        label: 'Buyer Name',
        lineIndex: 0,
      });
    });

    it('reads the value from a following line when the label stands alone', () => {
      expect(extractField(['Ship To:', '', 'Jane Doe'], FIELD_SPECS.buyerName)).toEqual({
        value: 'Jane Doe',
        label: 'Ship To',
        lineIndex: 0,
      });
    });

    it('does not take another labelled line as a lookahead value', () => {
      expect(extractField(['Ship To:', 'SKU: Set-3Pcs-White'], FIELD_SPECS.buyerName)).toBeNull();
    });

    it('stops looking ahead after six lines', () => {
      const lines = ['Order Date:', '', '', '', '', '', '', 'Mon, Mar 3, 2025'];
      expect(extractField(lines, FIELD_SPECS.orderDate)).toBeNull();
    });

    it('prefers the primary label even when the alternate comes first', () => {
      const lines = ['Embroidery Font: Block', 'Choose Your Font: Script'];
      expect(extractField(lines, FIELD_SPECS.font)?.value).toBe('Script');
    });

    it('falls back to the alternate label', () => {
      expect(extractField(['Thread Color: Gold'], FIELD_SPECS.threadColor)).toEqual({
        value: 'Gold',
        label: 'Thread Color',
        lineIndex: 0,
      });
    });

    it('never looks ahead for single-line fields', () => {
      expect(extractField(['Choose Your Font:', 'Script'], FIELD_SPECS.font)).toBeNull();
      expect(extractField(['Gift Message:', 'Washcloth: JD'], FIELD_SPECS.giftMessage)).toBeNull();
    });

    it('requires the colon right after a font or thread colour label', () => {
      expect(extractField(['Embroidery Font Color: Navy'], FIELD_SPECS.font)).toBeNull();
      expect(extractField(['Thread Color Choice: Gold'], FIELD_SPECS.threadColor)).toBeNull();
      expect(extractField(['Embroidery Font : Block'], FIELD_SPECS.font)?.value).toBe('Block');
    });
  });

  describe('anchors', () => {
    it('captures the order id from the anchor line', () => {
      expect(matchOrderAnchor('Order ID: 123-4567890-1234567')).toBe('123-4567890-1234567');
      expect(matchOrderAnchor('Order ID # 123-4567890-1234567')).toBe('123-4567890-1234567');
    });

    it('rejects ids of the wrong shape', () => {
      expect(matchOrderAnchor('Order ID: 123-4567890-12345678')).toBeNull();
      expect(matchOrderAnchor('Order Date: 123-4567890-1234567')).toBeNull();
    });

    it('distinguishes an empty SKU anchor from a non-anchor', () => {
      expect(readSkuAnchor('SKU: HT-2Pcs-Navy')).toBe('HT-2Pcs-Navy');
      expect(readSkuAnchor('SKU:')).toBe('');
      expect(readSkuAnchor('Item: towel')).toBeNull();
    });
  });

  describe('extractQuantity', () => {
    it('uses a Quantity line inside the chunk first', () => {
      const block = ['Order ID: 123-4567890-1234567', 'Quantity 3', 'Bath Towel Set', 'SKU: Set-3Pcs-White', 'Quantity: 2'];
      expect(extractQuantity(block, { start: 3, end: 5 })).toBe(2);
    });

    it('reads the Quantity line above the anchor when the block prints counts above each SKU', () => {
      const block = [
        'Order ID: 123-4567890-1234567',
        'Quantity 2',
        'SKU: Set-3Pcs-White',
        'Quantity 5',
        'SKU: HT-2Pcs-Navy',
      ];
      expect(extractQuantity(block, { start: 2, end: 4 })).toBe(2);
      expect(extractQuantity(block, { start: 4, end: 5 }, 3)).toBe(5);
    });

    it('scans backward for a standalone integer', () => {
      const block = ['Order ID: 123-4567890-1234567', '2', 'Jane Doe', 'SKU: Set-3Pcs-White'];
      expect(extractQuantity(block, { start: 3, end: 4 })).toBe(2);
    });

    it('prefers a Quantity line over a standalone integer when scanning backward', () => {
      const block = ['Quantity 5', '7', 'SKU: Set-3Pcs-White'];
      expect(extractQuantity(block, { start: 2, end: 3 })).toBe(5);
    });

    it('reads a leading count on a product line', () => {
      const block = ['Order ID: 123-4567890-1234567', '3 Personalized Towel Set', 'SKU: Set-3Pcs-White'];
      expect(extractQuantity(block, { start: 2, end: 3 })).toBe(3);
    });

    it('never scans past the lower bound', () => {
      const block = ['SKU: Set-3Pcs-White', '4', 'SKU: HT-2Pcs-Navy'];
      expect(extractQuantity(block, { start: 2, end: 3 }, 1)).toBe(4);
      expect(extractQuantity(block, { start: 2, end: 3 }, 2)).toBe(1);
    });

    it('defaults to 1 and ignores a zero quantity', () => {
      expect(extractQuantity(['SKU: Set-3Pcs-White'], { start: 0, end: 1 })).toBe(1);
      expect(extractQuantity(['SKU: Set-3Pcs-White', 'Quantity: 0'], { start: 0, end: 2 })).toBe(1);
    });
  });

  describe('extractCustomization', () => {
    const pieces = ['Washcloth', 'Hand Towel', 'Bath Towel'];

    it('keeps the last value of a repeated piece and skips empty ones', () => {
      const lines = ['Washcloth: JD', 'Hand Towel: AB', 'Bath Towel:', 'Washcloth: KL'];
      expect(extractCustomization(lines, pieces)).toEqual({ Washcloth: 'KL', 'Hand Towel': 'AB' });
    });

    it('requires the colon right after the piece name', () => {
      expect(extractCustomization(['Hand Towel Color: Navy'], pieces)).toEqual({});
    });

    it('ignores order-total text', () => {
      expect(extractCustomization(['Washcloth: Item subtotal $29.99'], pieces)).toEqual({});
    });

    it('accepts only the given piece names', () => {
      expect(extractCustomization(['Guest Towel: JD'], pieces)).toEqual({});
    });
  });

  it('stripColorSwatch removes the hex swatch', () => {
    expect(stripColorSwatch('Navy (#123456)')).toBe('Navy');
    expect(stripColorSwatch('Mid Blue ( #4477aa )')).toBe('Mid Blue');
  });
});
