/**
 * Date Parsing Service
 *
 * Turns free-form English or Polish date/time phrases ("next monday at 14:30",
 * "31.01.2025", "jutro wieczorem utc+2") into a fixed-offset timestamp.
 * Pure function of (text, now): no I/O, no shared mutable state.
 */

import { DateTime } from 'luxon';
import logger from '../utils/logger';
import { NOW_TOKEN } from './dateParsing/constants';
import { DateParseError, isDateParseError } from './dateParsing/errors';
import { EXTRACTION_RULES, runExtraction } from './dateParsing/extraction';
import { assembleTimestamp, initialFields, parseFullTimestamp, toReference } from './dateParsing/assembly';
import { normalizeDate, daysInMonth } from './dateParsing/normalization';
import { translate } from './dateParsing/translation';
import type { DateTimeFields, ParseBreakdown } from './dateParsing/types';

export {
  DateParseError,
  isDateParseError,
  EXTRACTION_RULES,
  normalizeDate,
  daysInMonth,
  translate
};
export type { DateTimeFields, ParseBreakdown };

export interface ParseOutcome extends ParseBreakdown {
  result: DateTime<true>;
}

function fieldsOf(time: DateTime<true>): DateTimeFields {
  return {
    year: time.year,
    month: time.month,
    day: time.day,
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    utcOffsetHours: time.offset / 60
  };
}

/**
 * Parse a phrase and report how the result was reached.
 * A phrase no rule recognises ("banana") falls back to the reference date
 * and hour at UTC, with minute and second 0 and an empty `matchedRules`.
 * @param text - Raw phrase, any case, may contain Polish diacritics
 * @param now - Reference instant for relative phrases (defaults to the current time)
 * @throws DateParseError when the phrase is empty or yields an impossible timestamp
 */
export function describeParse(text: string, now: Date = new Date()): ParseOutcome {
  if (!text.trim()) {
    throw new DateParseError('Date phrase is empty', text, 'EMPTY_INPUT');
  }

  const translated = translate(text);
  const { instant, reference } = toReference(now, text);

  const full = parseFullTimestamp(translated);
  if (full) {
    return { translated, fields: fieldsOf(full), matchedRules: [], fastPath: 'iso', result: full };
  }

  if (translated === NOW_TOKEN) {
    return { translated, fields: fieldsOf(instant), matchedRules: [], fastPath: 'now', result: instant };
  }

  const fields = initialFields(reference);
  const matchedRules = runExtraction({ text: translated, reference }, fields);
  const result = assembleTimestamp(fields, text);

  logger.debug(`📅 [DateParsing] "${text}" → ${result.toISO()}`, {
    translated,
    matchedRules
  });

  return { translated, fields, matchedRules, fastPath: null, result };
}

/**
 * Parse a phrase into a fixed-offset timestamp
 * @example parseDateTime('next monday at 14:30', new Date('2025-01-15T09:00:00Z')) // 2025-01-20T14:30:00Z
 */
export function parseDateTime(text: string, now: Date = new Date()): DateTime<true> {
  return describeParse(text, now).result;
}

/**
 * Like {@link parseDateTime} but returns null instead of throwing a DateParseError
 */
export function tryParseDateTime(text: string, now: Date = new Date()): DateTime<true> | null {
  try {
    return parseDateTime(text, now);
  } catch (error: unknown) {
    if (isDateParseError(error)) {
      logger.debug(`📅 [DateParsing] Could not parse "${text}": ${error.message}`, { code: error.code });
      return null;
    }
    throw error;
  }
}
