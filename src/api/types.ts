/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { AuditService } from '../services/audit.service.js';
import type { FileService } from '../services/file.service.js';
import type { ErrorCode } from '../types/index.js';

/**
 * Extended Hono context with the request id
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
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 404 | 409 | 413 | 500 | 503;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  NOT_FOUND: 404,
  SIZE_OUT_OF_RANGE: 413,
  CONFLICT: 409,
  STORAGE_UNAVAILABLE: 503,
  VERIFICATION_FAILED: 500,
  VALIDATION_ERROR: 400,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Services the routes delegate to
 */
export interface ApiServices {
  fileService: FileService;
  auditService: Pick<AuditService, 'queryLogs'>;
}
