/**
 * Upstash Redis Client
 * Backs the search result cache and the distributed rate limiter
 */

import { Redis } from '@upstash/redis';

import type { AppConfig } from './config.js';

/**
 * Create a Redis client, or null when Redis is not configured
 */
export function createRedis(config: AppConfig['redis']): Redis | null {
  if (config === null) {
    return null;
  }
  return new Redis({ url: config.url, token: config.token });
}

/**
 * Read a cached value. Upstash deserializes JSON on the way out,
 * so callers validate the shape themselves.
 */
export async function cacheGet(redis: Redis, key: string): Promise<unknown> {
  const value = await redis.get<unknown>(key);
  return value;
}

/**
 * Cache helper with TTL
 */
export async function cacheSet(
  redis: Redis,
  key: string,
  value: unknown,
  ttlSeconds: number
): Promise<void> {
  await redis.set(key, value, { ex: ttlSeconds });
}
