/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices, AppDeps } from './app.js';
export {
  createInMemoryRateLimiter,
  createRedisRateLimiter,
  createUpstashRateLimiter,
} from './middleware/rateLimit.js';
export type { RateLimiter, RateLimitResult } from './middleware/rateLimit.js';
