/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ErrorCode, Principal } from '../../types/index.js';
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
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || 'unknown';
}

/**
 * Helper to get principal from context
 */
export function getPrincipal(c: Context): Principal | null {
  return c.get('principal') ?? null;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  const status = getErrorStatus(error.code);

  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        ...(error.details !== undefined && { details: error.details }),
        requestId,
      },
    },
    status
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}
