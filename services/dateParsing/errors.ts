export type DateParseErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_NUMBER'
  | 'OUT_OF_RANGE'
  | 'INVALID_OFFSET'
  | 'INVALID_REFERENCE';

/**
 * Raised when a phrase cannot be turned into a valid timestamp.
 */
export class DateParseError extends Error {
  constructor(
    message: string,
    public readonly input: string,
    public readonly code: DateParseErrorCode,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'DateParseError';
  }
}

export function isDateParseError(error: unknown): error is DateParseError {
  return error instanceof DateParseError;
}
