/**
 * Date Parsing Constants
 *
 * Lookup tables and compiled patterns shared by the extraction rules.
 * All tables are frozen at load time.
 */

import keywordTable from '../../data/keywords.json';
import timezoneTable from '../../data/timezones.json';

export type KeywordEntry = readonly [foreign: string, canonical: string];
export type TimezoneEntry = readonly [abbreviation: string, offsetHours: number];

function toPairs<T>(rows: unknown[][], isValue: (value: unknown) => value is T, source: string): ReadonlyArray<readonly [string, T]> {
  return Object.freeze(rows.map((row, index) => {
    const [key, value] = row;
    if (typeof key !== 'string' || !isValue(value)) {
      throw new Error(`Malformed entry #${index} in ${source}`);
    }
    return Object.freeze([key, value] as const);
  }));
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isInteger = (value: unknown): value is number => typeof value === 'number' && Number.isInteger(value);

/**
 * Polish (and alternate) tokens -> canonical English vocabulary, in declaration order
 */
export const KEYWORD_TABLE: ReadonlyArray<KeywordEntry> = toPairs(keywordTable, isString, 'keywords.json');

/**
 * Zone abbreviations -> fixed whole-hour offsets. No DST handling.
 */
export const TIMEZONE_TABLE: ReadonlyArray<TimezoneEntry> = toPairs(timezoneTable, isInteger, 'timezones.json');

/**
 * Weekday name -> ordinal (Monday = 0 ... Sunday = 6). "weekend" means Saturday.
 */
export const WEEKDAY_TABLE: ReadonlyArray<readonly [string, number]> = Object.freeze([
  ['monday', 0],
  ['tuesday', 1],
  ['wednesday', 2],
  ['thursday', 3],
  ['friday', 4],
  ['saturday', 5],
  ['sunday', 6],
  ['weekend', 5]
] as const);

/**
 * Month keywords in calendar order: [full name, abbreviation]
 */
export const MONTH_TABLE: ReadonlyArray<readonly [string, string]> = Object.freeze([
  ['january', 'jan'],
  ['february', 'feb'],
  ['march', 'mar'],
  ['april', 'apr'],
  ['may', 'may'],
  ['june', 'jun'],
  ['july', 'jul'],
  ['august', 'aug'],
  ['september', 'sep'],
  ['october', 'oct'],
  ['november', 'nov'],
  ['december', 'dec']
] as const);

export interface TimeOfDayKeyword {
  keyword: string;
  hour: number;
}

/**
 * Keyword default times. Order matters: "afternoon" must follow "noon"
 * and "midnight" must follow "night" so the longer word wins.
 */
export const TIME_OF_DAY_TABLE: ReadonlyArray<TimeOfDayKeyword> = Object.freeze([
  { keyword: 'morning', hour: 8 },
  { keyword: 'noon', hour: 12 },
  { keyword: 'afternoon', hour: 14 },
  { keyword: 'evening', hour: 18 },
  { keyword: 'night', hour: 22 },
  { keyword: 'midnight', hour: 0 }
]);

export const RELATIVE_DAY_TABLE: ReadonlyArray<readonly [string, number]> = Object.freeze([
  ['yesterday', -1],
  ['today', 0],
  ['tomorrow', 1]
] as const);

export const LITERAL_ORDINALS: ReadonlyArray<readonly [string, number]> = Object.freeze([
  ['1st', 1],
  ['2nd', 2],
  ['3rd', 3]
] as const);

export const AT_TOKEN = 'at';
export const NOW_TOKEN = 'now';
export const LAST_TOKEN = 'last';
export const NEXT_TOKEN = 'next';
export const AM_TOKEN = ' am';
export const PM_TOKEN = ' pm';

export const PATTERNS = {
  YEAR: /\b\d{4}\b/,
  DAY: /\b\d{1,2}\b/,
  AT_NUMBERS: /\b\d{1,2}\b/g,
  SLASH_DATE: /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/,
  SHORT_DOT_DATE: /\b(\d{1,2})\.(\d{1,2})\b/,
  DOT_DATE: /\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/,
  REVERSE_DOT_DATE: /\b(\d{4})\.(\d{1,2})\.(\d{1,2})\b/,
  HYPHENATED_DATE: /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/,
  REVERSE_HYPHENATED_DATE: /\b(\d{1,2})-(\d{1,2})-(\d{4})\b/,
  NTH_DAY: /\b(\d{1,2})(?:st|nd|rd|th)\b/,
  TIME: /\b(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?\b/,
  GMT_OFFSET: /gmt([+-]\d{1,2})/,
  UTC_OFFSET: /utc([+-]\d{1,2})/,
  // Complete offset-aware timestamp (ISO-8601 / RFC 3339), already lower-cased
  ISO_TIMESTAMP: /^\d{4}-\d{2}-\d{2}[t ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:z|[+-]\d{2}(?::?\d{2})?)$/
} as const;
