/**
 * Error handling utilities for consistent error processing
 */

/**
 * Serialized error structure
 */
export interface SerializedError {
  name?: string;
  message?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Extract error message from various error formats
 * @param error - The error object (can be string, object, or complex structure)
 * @param fallback - Fallback message if no error message found
 * @returns Clean error message
 */
export function extractErrorMessage(error: unknown, fallback: string = 'Unknown error occurred'): string {
  if (!error) {
    return fallback;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    return error.message || fallback;
  }

  if (typeof error === 'object') {
    const message: unknown = Reflect.get(error, 'message') || Reflect.get(error, 'error') || Reflect.get(error, 'detail');
    if (message) {
      return typeof message === 'string' ? message : JSON.stringify(message);
    }

    const errorDetails = Object.entries(error)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `${key}: ${String(value)}`)
      .join(', ');

    return errorDetails || fallback;
  }

  return String(error);
}

/**
 * Serialize error object to ensure it's properly JSON serializable
 * @param error - The error to serialize
 * @returns JSON-serializable error object
 */
export function serializeError(error: unknown): SerializedError | string | null {
  if (!error) {
    return null;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    const serialized: SerializedError = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };

    // Own properties such as DateParseError.code / input
    for (const key of Object.getOwnPropertyNames(error)) {
      if (Object.prototype.hasOwnProperty.call(serialized, key)) continue;
      const value: unknown = Reflect.get(error, key);
      if (typeof value !== 'function') {
        serialized[key] = value;
      }
    }

    return serialized;
  }

  if (typeof error === 'object') {
    try {
      JSON.stringify(error);
      return { ...error };
    } catch {
      const serialized: SerializedError = {};
      for (const [key, value] of Object.entries(error)) {
        serialized[key] = typeof value === 'object' && value !== null ? '[Non-serializable value]' : value;
      }
      return serialized;
    }
  }

  return String(error);
}
