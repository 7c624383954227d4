/**
 * Date Formatter Utility
 *
 * Human-friendly, relative rendering of timestamps ("Today, 13:37",
 * "Yesterday", "Mon, 09:00", "Mar 05", "2024-12-31, 18:00").
 * English only, 24-hour clock. Offsets are whole hours, no DST.
 */

import { DateTime, FixedOffsetZone } from 'luxon';
import { CALENDAR } from './constants';

export interface NaturalFormatOptions {
  /** Hours from UTC applied to both the timestamp and "now" before comparing */
  offsetHours?: number;
  /** Include HH:mm where the rule has a time form */
  includeTime?: boolean;
  /** Reference instant (defaults to the current time) */
  now?: Date;
}

const LOCALE = 'en-US';

export class DateFormatter {
  /**
   * Format a timestamp relative to now
   */
  static toNatural(time: DateTime, options: NaturalFormatOptions = {}): string {
    const { offsetHours = 0, includeTime = true, now = new Date() } = options;
    const zone = FixedOffsetZone.instance(offsetHours * 60);

    const target = time.setZone(zone).setLocale(LOCALE);
    const current = DateTime.fromJSDate(now).setZone(zone).setLocale(LOCALE);

    const targetDay = target.startOf('day');
    const currentDay = current.startOf('day');
    const dayDelta = Math.round(targetDay.diff(currentDay, 'days').days);

    const withTime = (dateFormat: string): string =>
      target.toFormat(includeTime ? `${dateFormat}, HH:mm` : dateFormat);

    if (dayDelta === 0) {
      if (!includeTime) return 'Today';
      return target.toMillis() > current.toMillis() ? `Today, ${target.toFormat('HH:mm')}` : target.toFormat('HH:mm');
    }

    if (dayDelta === -1) {
      return includeTime ? `Yesterday, ${target.toFormat('HH:mm')}` : 'Yesterday';
    }

    if (dayDelta === 1) {
      return includeTime ? `Tomorrow, ${target.toFormat('HH:mm')}` : 'Tomorrow';
    }

    if (Math.abs(dayDelta) <= CALENDAR.DAYS_IN_WEEK) {
      return withTime('ccc');
    }

    if (target.year === current.year) {
      return withTime('MMM dd');
    }

    return withTime('yyyy-MM-dd');
  }

  /**
   * Canonical string for a parsed timestamp; feeding it back to the
   * parser returns the same instant and offset.
   */
  static toCanonical(time: DateTime<true>): string {
    return time.toISO({ suppressMilliseconds: true });
  }
}
