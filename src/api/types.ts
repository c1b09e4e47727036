/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ApiKey } from '@/types/index.js';

/**
 * Extended Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    apiKey: ApiKey;
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
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 412 | 428 | 429 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
  INVALID_STATE: 400,
  PRECONDITION_REQUIRED: 428,
  PRECONDITION_FAILED: 412,
  RATE_LIMITED: 429,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return ERROR_STATUS_MAP[code] ?? 500;
}
