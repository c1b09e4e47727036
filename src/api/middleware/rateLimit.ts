/**
 * Rate Limiting Middleware
 * Upstash sliding window when Redis is configured, otherwise an
 * in-memory fixed window. Keyed by API key; best effort, small overshoot
 * at the boundary is acceptable.
 */

import { Ratelimit } from '@upstash/ratelimit';
import type { Redis } from '@upstash/redis';
import type { Context, MiddlewareHandler } from 'hono';

import { RATE_LIMIT_DEFAULTS } from '@/lib/config.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to the API key)
   */
  getIdentifier?: (c: Context) => string;
}

/**
 * Normalized limiter decision
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the window resets */
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

/**
 * Default rate limit config
 */
export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  limit: RATE_LIMIT_DEFAULTS.requests,
  window: RATE_LIMIT_DEFAULTS.windowSeconds,
};

/**
 * Key requests by API key, falling back to the client address
 */
function defaultGetIdentifier(c: Context): string {
  const apiKey = c.get('apiKey');
  if (apiKey !== undefined) {
    return `key:${apiKey.id}`;
  }
  const ip =
    c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip') ?? 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG
): MiddlewareHandler {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;

  return async function rateLimitMiddleware(c, next) {
    const result = await rateLimiter.limit(getIdentifier(c));

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      c.header('Retry-After', result.reset.toString());
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: result.reset,
              limit: result.limit,
            },
            requestId: c.get('requestId'),
          },
        },
        429
      );
    }

    await next();
  };
}

/**
 * Adapt an Upstash Ratelimit instance
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Ratelimit,
  now: () => number = Date.now
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        // Upstash reports reset as a unix timestamp in milliseconds
        reset: Math.max(0, Math.ceil((result.reset - now()) / 1000)),
      };
    },
  };
}

/**
 * Sliding-window limiter backed by Upstash Redis
 */
export function createRedisRateLimiter(
  redis: Redis,
  config: Pick<RateLimitConfig, 'limit' | 'window'>
): RateLimiter {
  return createUpstashRateLimiter(
    new Ratelimit({
      redis,
      limiter: Ratelimit.slidingWindow(config.limit, `${config.window} s`),
      prefix: 'memory-vault:ratelimit',
    })
  );
}

/**
 * Create in-memory rate limiter (for testing/development)
 */
export function createInMemoryRateLimiter(
  config: Pick<RateLimitConfig, 'limit' | 'window'>,
  clock: () => number = Date.now
): RateLimiter {
  const store = new Map<string, { count: number; resetAt: number }>();

  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const now = clock();
      const windowMs = config.window * 1000;

      let entry = store.get(identifier);

      // Window expired
      if (entry !== undefined && entry.resetAt <= now) {
        store.delete(identifier);
        entry = undefined;
      }

      if (entry === undefined) {
        entry = { count: 0, resetAt: now + windowMs };
        store.set(identifier, entry);
      }

      entry.count++;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: Math.ceil((entry.resetAt - now) / 1000),
      };
    },
  };
}
