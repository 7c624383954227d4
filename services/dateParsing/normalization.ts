/**
 * Calendar Normalization
 *
 * Folds an out-of-range day-of-month into neighbouring months:
 * day 45 of January becomes February 14, day 0 of March becomes
 * the last day of February.
 */

import { CALENDAR } from '../../utils/constants';
import { DateParseError } from './errors';
import type { CalendarDate } from './types';

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1];
}

/**
 * @param input - Original phrase, carried into the error
 * @throws DateParseError when month is outside 1..12
 */
export function normalizeDate(date: CalendarDate, input: string = ''): CalendarDate {
  let { year, month, day } = date;

  if (!Number.isInteger(month) || month < 1 || month > CALENDAR.MONTHS_IN_YEAR) {
    throw new DateParseError(`Month ${month} is out of range`, input, 'OUT_OF_RANGE', 'month');
  }

  while (day > daysInMonth(year, month)) {
    day -= daysInMonth(year, month);
    month++;
    if (month > CALENDAR.MONTHS_IN_YEAR) {
      month = 1;
      year++;
    }
  }

  while (day < 1) {
    month--;
    if (month < 1) {
      month = CALENDAR.MONTHS_IN_YEAR;
      year--;
    }
    day += daysInMonth(year, month);
  }

  return { year, month, day };
}
