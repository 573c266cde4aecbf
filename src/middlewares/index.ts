/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError, asyncHandler, AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { globalLimiter, redemptionLimiter } from './rateLimiter';

// Idempotency
export { IDEMPOTENCY_HEADER, idempotencyKeyFrom, validateIdempotencyKey } from './idempotency';

// Response caching
export { cacheResponse } from './responseCache';
