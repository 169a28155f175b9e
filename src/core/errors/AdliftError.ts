/**
 * Core error handling for adlift
 *
 * Every failure the library reports is an AdliftError carrying:
 * - a structured error code
 * - the offending values as context
 */

/**
 * Error codes for the categories of failure the library reports
 */
export enum ErrorCode {
  // Data errors
  INVALID_DATA = 'INVALID_DATA',
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',

  // Parameter errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class for adlift with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new AdliftError(
 *   ErrorCode.INVALID_INPUT,
 *   'Control denominator must be positive',
 *   { trials: 0 }
 * );
 * ```
 */
export class AdliftError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Values involved in the failure
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AdliftError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AdliftError);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is an AdliftError
 */
export function isAdliftError(error: unknown): error is AdliftError {
  return error instanceof AdliftError;
}

/**
 * Wrap an unknown thrown value as an AdliftError.
 * AdliftErrors pass through untouched.
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): AdliftError {
  if (isAdliftError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new AdliftError(code, message, context);
}
