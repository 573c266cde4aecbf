/**
 * Error Handling Middleware
 *
 * Consistent error response format, error logging, and sanitization of
 * 5xx messages in production.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

interface ApiErrorOptions {
  statusCode?: number;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
  cause?: unknown;
}

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(errorCode: ErrorCode, message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options.statusCode ?? errorCodeToStatus[errorCode] ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.validationErrors = options.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static forbidden(message = 'Forbidden'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { validationErrors });
  }

  static invalidArgument(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_ARGUMENT, message, { isOperational: false });
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      subsidy: ErrorCode.SUBSIDY_NOT_FOUND,
      transaction: ErrorCode.TRANSACTION_NOT_FOUND,
      redemption: ErrorCode.REDEMPTION_NOT_FOUND,
      content: ErrorCode.CONTENT_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  static contentNotFound(contentKey: string): ApiError {
    return new ApiError(
      ErrorCode.CONTENT_NOT_FOUND,
      `Content ${contentKey} not found or not priced for this customer`
    );
  }

  static invalidTransition(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_STATE_TRANSITION, message);
  }

  static idempotencyConflict(idempotencyKey: string): ApiError {
    return new ApiError(
      ErrorCode.IDEMPOTENCY_KEY_CONFLICT,
      `Idempotency key ${idempotencyKey} is already used by a different redemption`
    );
  }

  /**
   * Non-404 failure talking to a collaborator. Upstream 5xx statuses are
   * passed through; anything else is reported as the code's default (502).
   */
  static upstream(code: ErrorCode, message: string, upstreamStatus?: number, cause?: unknown): ApiError {
    return new ApiError(code, message, {
      statusCode: upstreamStatus !== undefined && upstreamStatus >= 500 ? upstreamStatus : undefined,
      cause,
    });
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, { isOperational: false });
  }

  static database(message = 'Database error'): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message);
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): ApiError {
    return new ApiError(ErrorCode.RATE_LIMIT_EXCEEDED, message);
  }
}

const isAppError = (err: unknown): err is AppError => err instanceof Error;

/**
 * Main error handler middleware
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';
  const appError: AppError = isAppError(err) ? err : new Error(String(err));

  const errorCode = appError.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = appError.statusCode || errorCodeToStatus[errorCode] || 500;

  logger.error(
    {
      errorCode,
      statusCode,
      error: appError.message,
      stack: config.isDevelopment ? appError.stack : undefined,
      path: req.path,
      method: req.method,
      isOperational: appError.isOperational,
    },
    `Error: ${appError.message}`
  );

  const message =
    config.isProduction && statusCode >= 500 ? 'Internal server error' : appError.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (appError.validationErrors) {
    response.error.details = appError.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId: getCorrelationId() || 'unknown',
    },
  };

  res.status(404).json(response);
};

/**
 * Async handler wrapper to forward rejections to the error middleware
 */
export const asyncHandler = <R extends Request = Request>(
  fn: (req: R, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: R, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
