/**
 * Date Parsing Service Tests
 * Reference instant for every case: Wednesday 2025-01-15 09:41:27 UTC
 */

import {
  parseDateTime,
  tryParseDateTime,
  describeParse,
  DateParseError
} from '../../services/dateParsingService';
import { DateFormatter } from '../../utils/dateFormatter';
import { WEDNESDAY_MORNING, isoOf, captureThrown } from '../utils/testHelpers';

const T = WEDNESDAY_MORNING;

function parse(text: string, now: Date = T): string | null {
  return isoOf(parseDateTime(text, now));
}

describe('dateParsingService', () => {
  describe('fast paths', () => {
    it('should return the reference instant for "now"', () => {
      const result = parseDateTime('now', T);
      expect(result.toMillis()).toBe(T.getTime());
      expect(result.offset).toBe(0);
    });

    it('should treat "now" case-insensitively and in Polish', () => {
      expect(parseDateTime('  NOW ', T).toMillis()).toBe(T.getTime());
      expect(parseDateTime('teraz', T).toMillis()).toBe(T.getTime());
    });

    it('should return a complete ISO timestamp unchanged, keeping its offset', () => {
      const result = parseDateTime('2025-03-10T18:45:00+02:00', T);
      expect(result.offset).toBe(120);
      expect(isoOf(result)).toBe('2025-03-10T18:45:00+02:00');
    });

    it('should accept a space separator and a Z suffix', () => {
      expect(parse('2024-02-29 23:59:59Z')).toBe('2024-02-29T23:59:59Z');
    });

    it('should report which fast path answered', () => {
      expect(describeParse('now', T).fastPath).toBe('now');
      expect(describeParse('2025-03-10T18:45:00Z', T).fastPath).toBe('iso');
      expect(describeParse('today', T).fastPath).toBeNull();
    });

    it('should round-trip its own canonical output', () => {
      for (const phrase of ['next monday at 14:30', 'tomorrow evening cest', 'today 10:00 utc-5', '31.01.2025']) {
        const first = parseDateTime(phrase, T);
        const second = parseDateTime(DateFormatter.toCanonical(first), new Date('2030-06-01T00:00:00Z'));
        expect(second.toMillis()).toBe(first.toMillis());
        expect(second.offset).toBe(first.offset);
      }
    });
  });

  describe('relative days', () => {
    it('should keep the reference date and hour for "today"', () => {
      expect(parse('today')).toBe('2025-01-15T09:00:00Z');
    });

    it('should move one day for "tomorrow" and "yesterday"', () => {
      expect(parse('tomorrow')).toBe('2025-01-16T09:00:00Z');
      expect(parse('yesterday')).toBe('2025-01-14T09:00:00Z');
    });

    it('should roll "yesterday" on the first of the month back into the previous month', () => {
      expect(parse('yesterday', new Date('2025-03-01T06:00:00Z'))).toBe('2025-02-28T06:00:00Z');
      expect(parse('yesterday', new Date('2025-01-01T06:00:00Z'))).toBe('2024-12-31T06:00:00Z');
    });

    it('should roll "tomorrow" on the last day of the year into January', () => {
      expect(parse('tomorrow', new Date('2024-12-31T22:10:00Z'))).toBe('2025-01-01T22:00:00Z');
    });
  });

  describe('weekdays', () => {
    it('should resolve "next monday at 14:30" to the following Monday', () => {
      expect(parse('next monday at 14:30')).toBe('2025-01-20T14:30:00Z');
    });

    it('should resolve a bare weekday within the current week', () => {
      expect(parse('monday')).toBe('2025-01-13T09:00:00Z');
      expect(parse('friday')).toBe('2025-01-17T09:00:00Z');
    });

    it('should shift a week back for "last"', () => {
      expect(parse('last friday')).toBe('2025-01-10T09:00:00Z');
    });

    it('should resolve "weekend" to Saturday', () => {
      expect(parse('weekend')).toBe('2025-01-18T09:00:00Z');
      expect(parse('next sunday')).toBe('2025-01-26T09:00:00Z');
    });

    it('should carry a weekday past the end of the month', () => {
      expect(parse('next friday', new Date('2025-01-29T12:00:00Z'))).toBe('2025-02-07T12:00:00Z');
    });
  });

  describe('structured date literals', () => {
    it('should read ISO hyphenated dates regardless of the reference', () => {
      expect(parse('2025-01-31')).toBe('2025-01-31T09:00:00Z');
      expect(parse('2025-01-31', new Date('2030-06-10T00:20:00Z'))).toBe('2025-01-31T00:00:00Z');
    });

    it('should read day.month.year and month/day/year as the same date', () => {
      expect(parse('31.01.2025')).toBe('2025-01-31T09:00:00Z');
      expect(parse('01/31/2025')).toBe('2025-01-31T09:00:00Z');
    });

    it('should read day.month without a year', () => {
      expect(parse('24.12')).toBe('2025-12-24T09:00:00Z');
    });

    it('should read reverse dotted and day-first hyphenated dates', () => {
      expect(parse('2026.3.7')).toBe('2026-03-07T09:00:00Z');
      expect(parse('7-3-2026')).toBe('2026-03-07T09:00:00Z');
    });
  });

  describe('month names and ordinals', () => {
    it('should combine a month name with an ordinal day', () => {
      expect(parse('march 21st')).toBe('2025-03-21T09:00:00Z');
      expect(parse('3rd of may')).toBe('2025-05-03T09:00:00Z');
    });

    it('should combine a month name with a plain day and year', () => {
      expect(parse('15 february 2026')).toBe('2026-02-15T09:00:00Z');
    });
  });

  describe('time of day', () => {
    it('should apply keyword default times', () => {
      expect(parse('tomorrow morning')).toBe('2025-01-16T08:00:00Z');
      expect(parse('today noon')).toBe('2025-01-15T12:00:00Z');
      expect(parse('tomorrow afternoon')).toBe('2025-01-16T14:00:00Z');
      expect(parse('yesterday evening')).toBe('2025-01-14T18:00:00Z');
      expect(parse('today night')).toBe('2025-01-15T22:00:00Z');
      expect(parse('midnight')).toBe('2025-01-15T00:00:00Z');
    });

    it('should let an explicit time win over a keyword time', () => {
      expect(parse('tomorrow morning 7:45')).toBe('2025-01-16T07:45:00Z');
    });

    it('should read seconds from an explicit time', () => {
      expect(parse('today 10:20:30')).toBe('2025-01-15T10:20:30Z');
    });

    it('should read hour, minute and second after "at"', () => {
      expect(parse('tomorrow at 6 15 45')).toBe('2025-01-16T06:15:45Z');
    });

    it('should apply pm and am', () => {
      expect(parse('tomorrow at 3 pm')).toBe('2025-01-16T15:00:00Z');
      expect(parse('today at 12 am')).toBe('2025-01-15T00:00:00Z');
      expect(parse('today at 12 pm')).toBe('2025-01-15T12:00:00Z');
    });
  });

  describe('time zones', () => {
    it('should apply named abbreviations', () => {
      expect(parse('tomorrow evening cest')).toBe('2025-01-16T18:00:00+02:00');
      expect(parse('today 10:00 pst')).toBe('2025-01-15T10:00:00-08:00');
      expect(parse('today 10:00 aedt')).toBe('2025-01-15T10:00:00+11:00');
    });

    it('should apply explicit utc and gmt offsets', () => {
      expect(parse('today 10:00 utc-5')).toBe('2025-01-15T10:00:00-05:00');
      expect(parse('today 10:00 gmt+1')).toBe('2025-01-15T10:00:00+01:00');
    });

    it('should let an explicit offset override a named abbreviation', () => {
      expect(parseDateTime('today 10:00 cest utc-5', T).offset).toBe(-5 * 60);
    });

    it('should keep wall-clock fields instead of converting', () => {
      const result = parseDateTime('today 10:00 utc+3', T);
      expect(result.hour).toBe(10);
      expect(result.toUTC().hour).toBe(7);
    });
  });

  describe('Polish input', () => {
    it('should translate relative days and prepositions', () => {
      expect(parse('jutro o 17')).toBe('2025-01-16T17:00:00Z');
      expect(parse('wczoraj wieczorem')).toBe('2025-01-14T18:00:00Z');
    });

    it('should transliterate diacritics before translating', () => {
      expect(parse('następny piątek o 18:30')).toBe('2025-01-24T18:30:00Z');
      expect(parse('Środa rano')).toBe('2025-01-15T08:00:00Z');
    });

    it('should translate month names', () => {
      expect(parse('15 stycznia 2026')).toBe('2026-01-15T09:00:00Z');
    });
  });

  describe('describeParse', () => {
    it('should list matched rules in application order', () => {
      const outcome = describeParse('next monday at 14:30', T);
      expect(outcome.matchedRules).toEqual(['atClause', 'weekday', 'explicitTime']);
      expect(outcome.translated).toBe('next monday at 14:30');
    });

    it('should expose the final fields', () => {
      const outcome = describeParse('tomorrow evening cest', T);
      expect(outcome.matchedRules).toEqual(['relativeDay', 'timeOfDay', 'timezoneAbbreviation']);
      expect(outcome.fields).toEqual({
        year: 2025,
        month: 1,
        day: 16,
        hour: 18,
        minute: 0,
        second: 0,
        utcOffsetHours: 2
      });
    });

    it('should fall back to the reference date and hour when nothing matches', () => {
      const outcome = describeParse('banana', T);
      expect(isoOf(outcome.result)).toBe('2025-01-15T09:00:00Z');
      expect(outcome.matchedRules).toEqual([]);
    });

    it('should report normalized fields after a month rollover', () => {
      const outcome = describeParse('next friday', new Date('2025-01-29T12:00:00Z'));
      expect(outcome.fields).toMatchObject({ year: 2025, month: 2, day: 7 });
    });
  });

  describe('errors', () => {
    it('should reject empty and whitespace-only input', () => {
      const error = captureThrown(() => parseDateTime('   ', T));
      expect(error).toBeInstanceOf(DateParseError);
      expect(error).toMatchObject({ code: 'EMPTY_INPUT', input: '   ' });
    });

    it('should reject an hour past 23', () => {
      expect(captureThrown(() => parseDateTime('25:00', T))).toMatchObject({
        code: 'OUT_OF_RANGE',
        field: 'hour'
      });
    });

    it('should reject a month the normalizer cannot repair', () => {
      expect(captureThrown(() => parseDateTime('13/45/2025', T))).toMatchObject({
        code: 'OUT_OF_RANGE',
        field: 'month'
      });
    });

    it('should reject offsets wider than 14 hours', () => {
      expect(captureThrown(() => parseDateTime('today utc+15', T))).toMatchObject({
        code: 'INVALID_OFFSET'
      });
    });

    it('should reject an invalid reference instant', () => {
      expect(captureThrown(() => parseDateTime('today', new Date('not a date')))).toMatchObject({
        code: 'INVALID_REFERENCE'
      });
    });
  });

  describe('tryParseDateTime', () => {
    it('should return null instead of throwing a parse error', () => {
      expect(tryParseDateTime('   ', T)).toBeNull();
      expect(tryParseDateTime('25:00', T)).toBeNull();
    });

    it('should return the timestamp when parsing succeeds', () => {
      const result = tryParseDateTime('tomorrow', T);
      expect(result && isoOf(result)).toBe('2025-01-16T09:00:00Z');
    });
  });
});
