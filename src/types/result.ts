/**
 * Result Pattern Implementation
 *
 * Gateway, registry and service calls return Result<T> - they never throw.
 * Failures are converted to display text only at the facade or HTTP boundary.
 */

/**
 * Closed set of failure codes produced inside the core
 */
export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'PROVIDER_ERROR'
  | 'UNKNOWN_TASK'
  | 'UNKNOWN_AGENT'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure<C extends ErrorCode = ErrorCode> {
  success: false;
  error: {
    code: C;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T, C extends ErrorCode = ErrorCode> = Success<T> | Failure<C>;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure<C extends ErrorCode>(
  code: C,
  message: string,
  details?: Record<string, unknown>
): Failure<C> {
  const error: Failure<C>['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T, C extends ErrorCode>(
  result: Result<T, C>
): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T, C extends ErrorCode>(
  result: Result<T, C>
): result is Failure<C> {
  return result.success === false;
}
