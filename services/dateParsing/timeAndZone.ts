/**
 * Time-of-Day & Zone Resolution
 */

import { AM_TOKEN, PATTERNS, PM_TOKEN, TIME_OF_DAY_TABLE, TIMEZONE_TABLE } from './constants';
import { toInteger } from './helpers';
import type { ExtractionRule } from './types';

export const timeOfDayRule: ExtractionRule = {
  name: 'timeOfDay',
  apply({ text }, fields) {
    let matched = false;
    for (const { keyword, hour } of TIME_OF_DAY_TABLE) {
      if (text.includes(keyword)) {
        fields.hour = hour;
        fields.minute = 0;
        fields.second = 0;
        matched = true;
      }
    }
    return matched;
  }
};

/**
 * am/pm are searched anywhere in the text, not next to the time token.
 * A stray " pm" elsewhere in the phrase still shifts the hour.
 */
export const meridiemRule: ExtractionRule = {
  name: 'meridiem',
  apply({ text }, fields) {
    let matched = false;
    if (text.includes(AM_TOKEN) && fields.hour === 12) {
      fields.hour = 0;
      matched = true;
    }
    if (text.includes(PM_TOKEN) && fields.hour < 12) {
      fields.hour += 12;
      matched = true;
    }
    return matched;
  }
};

export const timezoneAbbreviationRule: ExtractionRule = {
  name: 'timezoneAbbreviation',
  apply({ text }, fields) {
    let matched = false;
    for (const [abbreviation, offsetHours] of TIMEZONE_TABLE) {
      if (text.includes(` ${abbreviation}`)) {
        fields.utcOffsetHours = offsetHours;
        matched = true;
      }
    }
    return matched;
  }
};

function explicitOffsetRule(name: string, pattern: RegExp): ExtractionRule {
  return {
    name,
    apply({ text }, fields) {
      const match = pattern.exec(text);
      if (!match) return false;
      fields.utcOffsetHours = toInteger(match[1], text, 'utcOffset');
      return true;
    }
  };
}

export const gmtOffsetRule = explicitOffsetRule('gmtOffset', PATTERNS.GMT_OFFSET);
export const utcOffsetRule = explicitOffsetRule('utcOffset', PATTERNS.UTC_OFFSET);
