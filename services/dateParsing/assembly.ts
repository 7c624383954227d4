/**
 * Timestamp Assembly
 *
 * Turns the accumulated fields into a fixed-offset luxon DateTime, and
 * implements the full-timestamp fast path.
 */

import { DateTime, FixedOffsetZone } from 'luxon';
import { CALENDAR } from '../../utils/constants';
import { PATTERNS } from './constants';
import { DateParseError } from './errors';
import { normalizeDate } from './normalization';
import type { DateTimeFields, ReferenceInstant } from './types';

type ClockField = 'hour' | 'minute' | 'second';

const CLOCK_LIMITS: ReadonlyArray<readonly [ClockField, number]> = [
  ['hour', CALENDAR.MAX_HOUR],
  ['minute', CALENDAR.MAX_MINUTE],
  ['second', CALENDAR.MAX_SECOND]
];

/**
 * Break the reference instant down in UTC
 * @throws DateParseError when `now` is an invalid Date
 */
export function toReference(now: Date, input: string): { instant: DateTime<true>; reference: ReferenceInstant } {
  const instant = DateTime.fromJSDate(now, { zone: 'utc' });
  if (!instant.isValid) {
    throw new DateParseError('Reference instant is not a valid date', input, 'INVALID_REFERENCE');
  }
  return {
    instant,
    reference: {
      year: instant.year,
      month: instant.month,
      day: instant.day,
      hour: instant.hour,
      weekday: instant.weekday - 1
    }
  };
}

/**
 * Starting accumulator: the reference date and hour, on the hour, at UTC
 */
export function initialFields(reference: ReferenceInstant): DateTimeFields {
  return {
    year: reference.year,
    month: reference.month,
    day: reference.day,
    hour: reference.hour,
    minute: 0,
    second: 0,
    utcOffsetHours: 0
  };
}

/**
 * Parse a complete offset-aware timestamp, or return null.
 * Input is expected lower-cased; "t"/"z" and a space separator are accepted.
 */
export function parseFullTimestamp(text: string): DateTime<true> | null {
  if (!PATTERNS.ISO_TIMESTAMP.test(text)) return null;

  const candidate = text.toUpperCase().replace(' ', 'T');
  const parsed = DateTime.fromISO(candidate, { setZone: true });
  return parsed.isValid ? parsed : null;
}

/**
 * Validate, normalize and build the final timestamp
 * @throws DateParseError for values the normalizer cannot repair
 */
export function assembleTimestamp(fields: DateTimeFields, input: string): DateTime<true> {
  for (const [field, max] of CLOCK_LIMITS) {
    const value = fields[field];
    if (value < 0 || value > max) {
      throw new DateParseError(`${field} ${value} is out of range`, input, 'OUT_OF_RANGE', field);
    }
  }

  if (Math.abs(fields.utcOffsetHours) > CALENDAR.MAX_OFFSET_HOURS) {
    throw new DateParseError(`UTC offset ${fields.utcOffsetHours}h is out of range`, input, 'INVALID_OFFSET', 'utcOffset');
  }

  const { year, month, day } = normalizeDate(fields, input);
  const result = DateTime.fromObject(
    { year, month, day, hour: fields.hour, minute: fields.minute, second: fields.second },
    { zone: FixedOffsetZone.instance(fields.utcOffsetHours * 60) }
  );

  if (!result.isValid) {
    throw new DateParseError(
      `Cannot build a timestamp: ${result.invalidExplanation ?? result.invalidReason ?? 'invalid date'}`,
      input,
      'OUT_OF_RANGE'
    );
  }

  // Keep the assembled values even when normalizeDate rolled the calendar
  fields.year = year;
  fields.month = month;
  fields.day = day;
  return result;
}
