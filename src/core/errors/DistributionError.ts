/**
 * Core error handling system for iidkit
 *
 * Provides consistent error handling across the library with:
 * - Structured error codes for different error categories
 * - Context preservation for debugging
 * - Proper stack trace handling
 */

/**
 * Error codes covering every failure the library reports
 */
export enum ErrorCode {
  // Shape errors
  INVALID_SHAPE = 'INVALID_SHAPE',
  INCOMPATIBLE_SHAPES = 'INCOMPATIBLE_SHAPES',
  VALIDATION_DEFERRED = 'VALIDATION_DEFERRED',

  // Distribution errors
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  UNSUPPORTED_STATISTIC = 'UNSUPPORTED_STATISTIC',

  // System errors
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new DistributionError(
 *   ErrorCode.INVALID_PARAMETER,
 *   'Scale must be positive',
 *   { scale: -1 }
 * );
 * ```
 */
export class DistributionError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = 'DistributionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Formatted representation including code and context
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Invalid sample shape, incompatible observation, or inconsistent shapes between
 * two distributions in a pairwise operation.
 */
export class ShapeError extends DistributionError {
  constructor(
    message: string,
    context?: ErrorContext,
    code: ErrorCode = ErrorCode.INVALID_SHAPE
  ) {
    super(code, message, context);
    this.name = 'ShapeError';
  }
}

/**
 * A shape violation that could only be detected once a mutable shape was read.
 * Same conditions as static validation, reported at evaluation time.
 */
export class ValidationDeferredError extends ShapeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context, ErrorCode.VALIDATION_DEFERRED);
    this.name = 'ValidationDeferredError';
  }
}

/**
 * A summary statistic (or other optional capability) the distribution does not implement
 */
export class UnsupportedStatisticError extends DistributionError {
  constructor(
    public readonly statistic: string,
    distributionName: string
  ) {
    super(
      ErrorCode.UNSUPPORTED_STATISTIC,
      `${distributionName} does not implement ${statistic}()`,
      { statistic, distribution: distributionName }
    );
    this.name = 'UnsupportedStatisticError';
  }
}

/**
 * Type guard to check if an error is a DistributionError
 */
export function isDistributionError(error: unknown): error is DistributionError {
  return error instanceof DistributionError;
}

/**
 * Wrap unknown errors as DistributionError
 * Useful for catch blocks where the error type is unknown
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): DistributionError {
  if (isDistributionError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new DistributionError(code, message, context);
}
