/**
 * Transliteration Utility
 *
 * Maps Latin letters with diacritics to their plain ASCII counterparts
 * ("ą" -> "a", "Ł" -> "L"). Some mappings are lossy ("ß" -> "s").
 */

import transliterationTable from '../data/transliteration.json';

const TRANSLITERATION_MAP: ReadonlyMap<string, string> = new Map(Object.entries(transliterationTable));

/**
 * Convert a single character to its ASCII equivalent when a mapping is known.
 * @param char - One UTF-16 character
 * @returns The mapped character, or the input unchanged
 */
export function toLatin(char: string): string {
  return TRANSLITERATION_MAP.get(char) ?? char;
}

/**
 * Apply {@link toLatin} to every character of a string.
 */
export function toLatinString(text: string): string {
  let result = '';
  for (const char of text) {
    result += toLatin(char);
  }
  return result;
}
