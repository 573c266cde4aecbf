/**
 * Response Cache Middleware
 *
 * Caches successful JSON responses in Redis for a short TTL, keyed by a
 * caller-supplied function of the request. Skipped in tests and whenever
 * Redis is not connected.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { logger } from '../observability';
import { isRecord } from '../utils/request';

interface CachedResponse {
  statusCode: number;
  body: unknown;
  cachedAt: string;
}

const CACHE_PREFIX = 'response-cache:';

const parseCached = (raw: string): CachedResponse | null => {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed) && typeof parsed.statusCode === 'number' && typeof parsed.cachedAt === 'string') {
      return { statusCode: parsed.statusCode, body: parsed.body, cachedAt: parsed.cachedAt };
    }
  } catch (error) {
    logger.warn({ err: error }, 'Discarding unreadable cached response');
  }
  return null;
};

/**
 * `keyFor` returns null to bypass the cache for a request
 */
export const cacheResponse =
  (ttlSeconds: number, keyFor: (req: Request) => string | null) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const key = keyFor(req);

    if (key === null || config.isTest || !isRedisConnected()) {
      next();
      return;
    }

    const cacheKey = `${CACHE_PREFIX}${key}`;

    try {
      const redis = getRedisClient();
      const raw = await redis.get(cacheKey);
      const cached = raw === null ? null : parseCached(raw);

      if (cached) {
        logger.debug({ cacheKey, cachedAt: cached.cachedAt }, 'Serving cached response');
        res.setHeader('X-Cache', 'HIT');
        res.status(cached.statusCode).json(cached.body);
        return;
      }

      const originalJson = res.json.bind(res);

      res.json = function (body: unknown) {
        if (res.statusCode >= 200 && res.statusCode < 300) {
          const toCache: CachedResponse = {
            statusCode: res.statusCode,
            body,
            cachedAt: new Date().toISOString(),
          };

          redis
            .setex(cacheKey, ttlSeconds, JSON.stringify(toCache))
            .then(() => {
              logger.debug({ cacheKey, ttlSeconds }, 'Cached response');
            })
            .catch((err: unknown) => {
              logger.error({ err, cacheKey }, 'Failed to cache response');
            });
        }

        res.setHeader('X-Cache', 'MISS');
        return originalJson(body);
      };

      next();
    } catch (error) {
      // A cache outage must not fail the request
      logger.error({ err: error, cacheKey }, 'Response cache error');
      next();
    }
  };
