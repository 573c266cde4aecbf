/**
 * Redis Client
 *
 * One shared ioredis connection backs the redemption rate limiter and the
 * content-metadata response cache; BullMQ opens its own connections from
 * queue.config. Both users fall back (memory store, no cache) while the
 * client is not ready, so Redis never blocks a redemption.
 */

import Redis from 'ioredis';

import { logger } from '../observability';

import { config } from './index';

let redisClient: Redis | null = null;

/**
 * Reconnect delay for the n-th attempt, or null to stop retrying
 */
export const reconnectDelay = (attempt: number): number | null => {
  if (attempt > config.redis.maxConnectRetries) {
    return null;
  }
  return Math.min(attempt * 100, config.redis.maxRetryDelayMs);
};

export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      connectionName: config.redis.connectionName,
      maxRetriesPerRequest: 3,
      retryStrategy: reconnectDelay,
      lazyConnect: true,
    });

    redisClient.on('error', (err) => {
      logger.error({ err }, 'Redis client error');
    });

    redisClient.on('ready', () => {
      logger.info({ host: config.redis.host, port: config.redis.port }, 'Redis client ready');
    });

    redisClient.on('end', () => {
      logger.warn('Redis connection closed; response cache and shared rate limits are off');
    });
  }

  return redisClient;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready' || client.status === 'connecting') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};

export const isRedisConnected = (): boolean => redisClient?.status === 'ready';

/**
 * ioredis connection status, or `absent` before the client is created
 */
export const getRedisStatus = (): string => redisClient?.status ?? 'absent';
