/**
 * Application-wide constants
 * SSOT (Single Source of Truth) for magic numbers and common values
 *
 * All time-related constants are in milliseconds unless otherwise specified.
 */

/**
 * Time constants (in milliseconds)
 */
export const TIME = {
  SECOND: 1000,
  MINUTE: 60 * 1000
} as const;

/**
 * Calendar limits used when assembling a parsed timestamp
 */
export const CALENDAR = {
  MONTHS_IN_YEAR: 12,
  DAYS_IN_WEEK: 7,
  MAX_HOUR: 23,
  MAX_MINUTE: 59,
  MAX_SECOND: 59,
  // Widest fixed offset in use (Line Islands, UTC+14)
  MAX_OFFSET_HOURS: 14
} as const;
