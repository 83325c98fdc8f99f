/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { CustodyService } from '@/services/custody.service.js';
import type { UserService } from '@/services/user.service.js';
import type { ActorContext, ErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Codes produced by the API layer itself, on top of service codes
 */
export type ApiErrorCode = ErrorCode | 'UNAUTHORIZED' | 'FORBIDDEN' | 'RATE_LIMITED';

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 429 | 500 | 502 | 504;

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta?: {
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

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ApiErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  RATE_LIMITED: 429,
  INTERNAL_ERROR: 500,
  TRANSPORT_ERROR: 502,
  TRANSPORT_TIMEOUT: 504,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ApiErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Service context for dependency injection
 */
export interface ApiServices {
  custodyService: CustodyService;
  userService: UserService;
}
