/**
 * Date Parsing Types
 */

/**
 * Mutable accumulator the extraction rules write into.
 * Values may be out of calendar range until the normalizer runs.
 */
export interface DateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Fixed offset from UTC in whole hours */
  utcOffsetHours: number;
}

/**
 * The reference instant broken down in UTC
 */
export interface ReferenceInstant {
  year: number;
  month: number;
  day: number;
  hour: number;
  /** Monday = 0 ... Sunday = 6 */
  weekday: number;
}

/**
 * Read-only view shared by every extraction rule
 */
export interface ParseContext {
  /** Lower-cased, transliterated, keyword-translated input */
  readonly text: string;
  readonly reference: ReferenceInstant;
}

/**
 * One step of the extraction cascade.
 * `apply` overwrites the fields it owns and reports whether its pattern matched.
 */
export interface ExtractionRule {
  readonly name: string;
  apply(context: ParseContext, fields: DateTimeFields): boolean;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Diagnostic breakdown of a parse
 */
export interface ParseBreakdown {
  translated: string;
  fields: DateTimeFields;
  matchedRules: string[];
  /** Set when a fast path answered without running the cascade */
  fastPath: 'iso' | 'now' | null;
}
