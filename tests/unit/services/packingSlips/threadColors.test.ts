import { describe, it, expect } from 'vitest';
import { THREAD_COLOR_ES } from '../../../../src/config/threadColors';
import { localizeThreadColor } from '../../../../src/services/packingSlips/threadColors';

describe('localizeThreadColor', () => {
  it('pairs the Spanish name with the English one', () => {
    expect(localizeThreadColor('Navy', THREAD_COLOR_ES)).toEqual({
      english: 'Navy',
      spanish: 'Azul Marino',
      display: 'Azul Marino (Navy)',
    });
  });

  it('ignores case, extra whitespace and a colour swatch', () => {
    expect(localizeThreadColor('  mid   BLUE ', THREAD_COLOR_ES).display).toBe('Azul Medio (Mid Blue)');
    expect(localizeThreadColor('Gold (#d4af37)', THREAD_COLOR_ES).display).toBe('Dorado (Gold)');
  });

  it('pairs an unknown colour with itself', () => {
    expect(localizeThreadColor('Chartreuse', THREAD_COLOR_ES).display).toBe('Chartreuse (Chartreuse)');
  });

  it('returns empty strings for an empty colour', () => {
    expect(localizeThreadColor('', THREAD_COLOR_ES)).toEqual({ english: '', spanish: '', display: '' });
  });
});
