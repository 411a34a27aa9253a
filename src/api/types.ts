/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ErrorCode } from '../types/index.js';

/**
 * Extended Hono context with request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 404 | 500 | 502 | 503;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Readonly<Record<ErrorCode, ErrorStatus>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  UNKNOWN_TASK: 404,
  UNKNOWN_AGENT: 404,
  CONFIGURATION_ERROR: 503,
  AUTHENTICATION_ERROR: 502,
  PROVIDER_ERROR: 502,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
