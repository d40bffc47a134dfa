import type { ThreadColorDictionary } from '../../config/threadColors';
import { stripColorSwatch } from './fieldExtractors';
import { cleanText } from './textNormalizer';

export type LocalizedThreadColor = {
  english: string;
  spanish: string;
  /** "Azul Marino (Navy)"; an unknown colour is paired with itself. */
  display: string;
};

function colorKey(name: string): string {
  return cleanText(name).toLowerCase();
}

export function localizeThreadColor(raw: string, dictionary: ThreadColorDictionary): LocalizedThreadColor {
  const base = stripColorSwatch(raw);
  if (!base) return { english: '', spanish: '', display: '' };

  const key = colorKey(base);
  const entry = Object.entries(dictionary).find(([english]) => colorKey(english) === key);
  const english = entry ? entry[0] : base;
  const spanish = entry ? entry[1] : base;

  return { english, spanish, display: `${spanish} (${english})` };
}
