/**
 * Rate Limiting Middleware
 *
 * Redis-backed store so limits hold across instances; the default memory
 * store is used in tests.
 *
 * Set RATE_LIMIT_DISABLED=true to turn limiting off (load tests only).
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { config } from '../config';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';
import '../auth/auth.types';

const createStore = (prefix: string) => {
  if (config.isTest) {
    return undefined;
  }

  try {
    const client = getRedisClient();
    return new RedisStore({
      // @ts-expect-error - RedisStore expects a specific sendCommand signature
      sendCommand: (...args: string[]) => client.call(...args),
      prefix,
    });
  } catch (error) {
    logger.warn({ err: error }, 'Failed to create Redis store for rate limiting, using memory store');
    return undefined;
  }
};

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const limitedResponse = (message: string) => ({
  success: false,
  error: {
    code: ErrorCode.RATE_LIMIT_EXCEEDED,
    message,
  },
});

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (config.rateLimit.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

/**
 * Global rate limiter, keyed by IP
 */
export const globalLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:global:'),
    windowMs: config.rateLimit.global.windowMs,
    limit: config.rateLimit.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitedResponse('Too many requests, please try again later'),
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Redemption writes, keyed by the authenticated caller
 */
export const redemptionLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:redeem:'),
    windowMs: config.rateLimit.redemption.windowMs,
    limit: config.rateLimit.redemption.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitedResponse('Too many redemption requests, please slow down'),
    keyGenerator: (req: Request) => req.user?.userId || req.ip || 'unknown',
    validate: false,
  })
);
