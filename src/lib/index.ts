/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { logger } from './logger.js';
export type { Logger } from './logger.js';
export { createSupabaseAdmin } from './supabase.js';
export { createRedis, cacheGet, cacheSet } from './redis.js';
export { createDomainEventBus } from './event-bus.js';
export type { DomainEventBus, DomainEventPublisher } from './event-bus.js';
export { createSqliteLexicalIndex } from './fts.js';
export type { LexicalIndex } from './fts.js';
export {
  signAccessToken,
  verifyAccessToken,
  createHs256TokenVerifier,
} from './jwt.js';
export { sanitizeOutput, createSanitizer } from './dlp.js';
