/**
 * Error Codes for the subsidy API
 *
 * Categorized by error type:
 * - 1xxx: Authentication / authorization errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System and upstream errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  FORBIDDEN = 1004,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_ARGUMENT = 2002,

  // Business errors (3xxx)
  SUBSIDY_NOT_FOUND = 3001,
  TRANSACTION_NOT_FOUND = 3002,
  REDEMPTION_NOT_FOUND = 3003,
  CONTENT_NOT_FOUND = 3004,
  INVALID_STATE_TRANSITION = 3005,
  RESOURCE_NOT_FOUND = 3006,
  IDEMPOTENCY_KEY_CONFLICT = 3007,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  UPSTREAM_ERROR = 5003,
  ENROLLMENT_ERROR = 5004,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.FORBIDDEN]: 403,

  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_ARGUMENT]: 400,

  [ErrorCode.SUBSIDY_NOT_FOUND]: 404,
  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.REDEMPTION_NOT_FOUND]: 404,
  [ErrorCode.CONTENT_NOT_FOUND]: 404,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.IDEMPOTENCY_KEY_CONFLICT]: 409,

  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.UPSTREAM_ERROR]: 502,
  [ErrorCode.ENROLLMENT_ERROR]: 502,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
