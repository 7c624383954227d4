/**
 * Keyword Translation
 *
 * Normalizes raw input into the canonical English vocabulary the
 * extraction rules understand.
 */

import { toLatinString } from '../../utils/transliteration';
import { KEYWORD_TABLE, type KeywordEntry } from './constants';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a single word-bounded alternation from the table.
 * Keys keep declaration order; at a given position the first key that
 * also satisfies the trailing \b wins.
 */
export function buildKeywordPattern(table: ReadonlyArray<KeywordEntry>): RegExp {
  const alternation = table.map(([foreign]) => escapeRegExp(foreign)).join('|');
  return new RegExp(`\\b(${alternation})\\b`, 'gi');
}

const KEYWORD_PATTERN = buildKeywordPattern(KEYWORD_TABLE);
const KEYWORD_LOOKUP: ReadonlyMap<string, string> = new Map(KEYWORD_TABLE);

/**
 * Lower-case, transliterate and keyword-translate a phrase.
 * @example translate('Jutro o 9') // 'tomorrow  at  9'
 */
export function translate(raw: string): string {
  const normalized = toLatinString(raw.trim().toLowerCase());
  return normalized.replace(KEYWORD_PATTERN, (match) => KEYWORD_LOOKUP.get(match.toLowerCase()) ?? match);
}
