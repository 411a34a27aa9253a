/**
 * API Response Helpers
 * Standardized response formatting and body validation
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import type { ErrorCode, Result } from '../../types/index.js';
import { success, failure } from '../../types/index.js';
import type { ErrorResponse, SuccessResponse } from '../types.js';
import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Request ID set by the request-id middleware
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') ?? 'unknown';
}

/**
 * Create error response from service error
 */
export function errorResponse(c: Context, error: ServiceError): Response {
  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      details: error.details,
      requestId: getRequestId(c),
    },
  };
  return c.json(body, getErrorStatus(error.code));
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  status: 200 | 201 = 200
): Response {
  const body: SuccessResponse<T> = {
    data,
    meta: { requestId: getRequestId(c) },
  };
  return c.json(body, status);
}

/**
 * Parse and validate a JSON request body
 */
export async function parseBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<Result<z.infer<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return failure('VALIDATION_ERROR', 'Request body must be valid JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return failure('VALIDATION_ERROR', 'Invalid request body', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return success(parsed.data);
}
