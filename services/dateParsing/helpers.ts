/**
 * Date parsing helper functions
 */

import { DateParseError } from './errors';
import { AT_TOKEN } from './constants';

/**
 * Read a captured digit run as an integer.
 * @throws DateParseError when the capture is not a safe integer
 */
export function toInteger(digits: string, input: string, field: string): number {
  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) {
    throw new DateParseError(`Cannot read "${digits}" as ${field}`, input, 'INVALID_NUMBER', field);
  }
  return value;
}

export interface AtClause {
  /** Text before the first "at", or the whole text */
  before: string;
  /** Text after the first "at", null when there is none */
  after: string | null;
}

/**
 * Split on the first raw occurrence of "at". This is a plain substring
 * search, so "saturday" and "chat" split too.
 */
export function splitAtClause(text: string): AtClause {
  const index = text.indexOf(AT_TOKEN);
  if (index === -1) {
    return { before: text, after: null };
  }
  return {
    before: text.slice(0, index),
    after: text.slice(index + AT_TOKEN.length)
  };
}
