/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ErrorCode, Principal } from '../types/index.js';

/**
 * Extended Hono context with principal
 */
declare module 'hono' {
  interface ContextVariableMap {
    principal: Principal | null;
    requestId: string;
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 410 | 413 | 415 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  DENIED: 403,
  NOT_FOUND: 404,
  GONE: 410,
  VALIDATION_ERROR: 400,
  FILE_TOO_LARGE: 413,
  UNSUPPORTED_TYPE: 415,
  // Never leave the service layer; collapsed into DENIED
  TOKEN_INVALID: 403,
  TOKEN_EXPIRED: 403,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
