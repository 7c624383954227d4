/**
 * Pattern Extraction
 *
 * The ordered rule cascade. Every rule reads the same translated text and
 * overwrites the fields it owns when its pattern matches, so for each field
 * the last matching rule in EXTRACTION_RULES decides the value.
 */

import { LITERAL_ORDINALS, MONTH_TABLE, PATTERNS } from './constants';
import { splitAtClause, toInteger } from './helpers';
import { relativeDayRule, weekdayRule } from './relative';
import { gmtOffsetRule, meridiemRule, timeOfDayRule, timezoneAbbreviationRule, utcOffsetRule } from './timeAndZone';
import type { DateTimeFields, ExtractionRule, ParseContext } from './types';

const MAX_AT_NUMBERS = 3;

export const yearRule: ExtractionRule = {
  name: 'year',
  apply({ text }, fields) {
    const match = PATTERNS.YEAR.exec(text);
    if (!match) return false;
    fields.year = toInteger(match[0], text, 'year');
    return true;
  }
};

/**
 * Up to three numbers after "at" become hour, minute and second
 */
export const atClauseRule: ExtractionRule = {
  name: 'atClause',
  apply({ text }, fields) {
    const { after } = splitAtClause(text);
    if (after === null) return false;

    const numbers = (after.match(PATTERNS.AT_NUMBERS) ?? []).slice(0, MAX_AT_NUMBERS);
    const [hour, minute, second] = numbers;
    if (hour !== undefined) fields.hour = toInteger(hour, text, 'hour');
    if (minute !== undefined) fields.minute = toInteger(minute, text, 'minute');
    if (second !== undefined) fields.second = toInteger(second, text, 'second');
    return true;
  }
};

/**
 * First 1-2 digit number before "at" (or anywhere, without "at")
 */
export const dayRule: ExtractionRule = {
  name: 'day',
  apply({ text }, fields) {
    const match = PATTERNS.DAY.exec(splitAtClause(text).before);
    if (!match) return false;
    fields.day = toInteger(match[0], text, 'day');
    return true;
  }
};

interface DateLayout {
  day: number;
  month: number;
  year?: number;
}

/**
 * Structured literal whose capture groups map to day/month/year by position
 */
function structuredDateRule(name: string, pattern: RegExp, layout: DateLayout): ExtractionRule {
  return {
    name,
    apply({ text }, fields) {
      const match = pattern.exec(text);
      if (!match) return false;

      fields.day = toInteger(match[layout.day], text, 'day');
      fields.month = toInteger(match[layout.month], text, 'month');
      if (layout.year !== undefined) {
        fields.year = toInteger(match[layout.year], text, 'year');
      }
      return true;
    }
  };
}

export const slashDateRule = structuredDateRule('slashDate', PATTERNS.SLASH_DATE, { month: 1, day: 2, year: 3 });
export const shortDotDateRule = structuredDateRule('shortDotDate', PATTERNS.SHORT_DOT_DATE, { day: 1, month: 2 });
export const dotDateRule = structuredDateRule('dotDate', PATTERNS.DOT_DATE, { day: 1, month: 2, year: 3 });
export const reverseDotDateRule = structuredDateRule('reverseDotDate', PATTERNS.REVERSE_DOT_DATE, { year: 1, month: 2, day: 3 });
export const hyphenatedDateRule = structuredDateRule('hyphenatedDate', PATTERNS.HYPHENATED_DATE, { year: 1, month: 2, day: 3 });
export const reverseHyphenatedDateRule = structuredDateRule('reverseHyphenatedDate', PATTERNS.REVERSE_HYPHENATED_DATE, { day: 1, month: 2, year: 3 });

/**
 * Independent substring checks in calendar order; a later month present
 * anywhere in the text (even inside another word) wins.
 */
export const monthNameRule: ExtractionRule = {
  name: 'monthName',
  apply({ text }, fields) {
    let matched = false;
    MONTH_TABLE.forEach(([full, abbreviation], index) => {
      if (text.includes(full) || text.includes(abbreviation)) {
        fields.month = index + 1;
        matched = true;
      }
    });
    return matched;
  }
};

export const ordinalDayRule: ExtractionRule = {
  name: 'ordinalDay',
  apply({ text }, fields) {
    let matched = false;
    for (const [literal, day] of LITERAL_ORDINALS) {
      if (text.includes(literal)) {
        fields.day = day;
        matched = true;
      }
    }

    const match = PATTERNS.NTH_DAY.exec(text);
    if (match) {
      fields.day = toInteger(match[1], text, 'day');
      matched = true;
    }
    return matched;
  }
};

/**
 * H:M[:S] literal; seconds reset to 0 when not written
 */
export const explicitTimeRule: ExtractionRule = {
  name: 'explicitTime',
  apply({ text }, fields) {
    const match = PATTERNS.TIME.exec(text);
    if (!match) return false;

    const [, hour, minute, second] = match;
    fields.hour = toInteger(hour, text, 'hour');
    fields.minute = toInteger(minute, text, 'minute');
    fields.second = second === undefined ? 0 : toInteger(second, text, 'second');
    return true;
  }
};

/**
 * Application order is precedence. Do not reorder without updating the
 * precedence tests.
 */
export const EXTRACTION_RULES: ReadonlyArray<ExtractionRule> = Object.freeze([
  yearRule,
  atClauseRule,
  dayRule,
  weekdayRule,
  slashDateRule,
  shortDotDateRule,
  dotDateRule,
  reverseDotDateRule,
  hyphenatedDateRule,
  reverseHyphenatedDateRule,
  monthNameRule,
  ordinalDayRule,
  relativeDayRule,
  timeOfDayRule,
  explicitTimeRule,
  meridiemRule,
  timezoneAbbreviationRule,
  gmtOffsetRule,
  utcOffsetRule
]);

/**
 * Run the cascade in place.
 * @returns Names of the rules that matched, in application order
 */
export function runExtraction(
  context: ParseContext,
  fields: DateTimeFields,
  rules: ReadonlyArray<ExtractionRule> = EXTRACTION_RULES
): string[] {
  const matched: string[] = [];
  for (const rule of rules) {
    if (rule.apply(context, fields)) {
      matched.push(rule.name);
    }
  }
  return matched;
}
