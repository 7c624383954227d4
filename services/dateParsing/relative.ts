/**
 * Relative Resolution
 *
 * Named weekdays (with last/next) and yesterday/today/tomorrow,
 * computed against the reference day. Results may leave the current
 * month; the normalizer folds them back.
 */

import { CALENDAR } from '../../utils/constants';
import { LAST_TOKEN, NEXT_TOKEN, RELATIVE_DAY_TABLE, WEEKDAY_TABLE } from './constants';
import type { ExtractionRule } from './types';

/**
 * Week shift implied by the phrase: "last" wins over "next"
 */
export function weekShift(text: string): number {
  if (text.includes(LAST_TOKEN)) return -CALENDAR.DAYS_IN_WEEK;
  if (text.includes(NEXT_TOKEN)) return CALENDAR.DAYS_IN_WEEK;
  return 0;
}

export const weekdayRule: ExtractionRule = {
  name: 'weekday',
  apply({ text, reference }, fields) {
    const entry = WEEKDAY_TABLE.find(([name]) => text.includes(name));
    if (!entry) return false;

    const [, target] = entry;
    fields.day = reference.day + (target - reference.weekday) + weekShift(text);
    return true;
  }
};

export const relativeDayRule: ExtractionRule = {
  name: 'relativeDay',
  apply({ text, reference }, fields) {
    let matched = false;
    for (const [word, delta] of RELATIVE_DAY_TABLE) {
      if (text.includes(word)) {
        fields.day = reference.day + delta;
        matched = true;
      }
    }
    return matched;
  }
};
