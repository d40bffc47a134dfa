import { describe, it, expect } from 'vitest';
import { truncate, wrapText } from '../../../src/utils/textWrap';

describe('wrapText', () => {
  it('breaks between words at the character limit', () => {
    expect(wrapText('Happy birthday Jane, love from all of us', 28)).toEqual(['Happy birthday Jane, love', 'from all of us']);
  });

  it('keeps an over-long word on its own line', () => {
    expect(wrapText('To Bartholomew-Fitzgerald with love', 10)).toEqual(['To', 'Bartholomew-Fitzgerald', 'with love']);
  });

  it('returns no lines for blank text', () => {
    expect(wrapText('   ', 10)).toEqual([]);
  });
});

describe('truncate', () => {
  it('cuts text longer than the limit', () => {
    expect(truncate('Jane Doe', 4)).toBe('Jane');
    expect(truncate('Jane', 4)).toBe('Jane');
  });
});
