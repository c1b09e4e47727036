/**
 * Search result caches
 * Upstash Redis when configured, otherwise a per-process TTL map
 */

import type { Redis } from '@upstash/redis';
import { z } from 'zod';

import { cacheGet, cacheSet } from '@/lib/redis.js';
import { ENTRY_TYPES, SENSITIVITY_LEVELS } from '@/types/index.js';

import type { CachedSearch, QueryCache } from './query.service.js';

const cachedSearchSchema = z.object({
  marker: z.string(),
  results: z.array(
    z.object({
      entryId: z.number().int(),
      title: z.string(),
      snippet: z.string(),
      combinedScore: z.number(),
      textScore: z.number(),
      vectorScore: z.number(),
      sensitivity: z.enum(SENSITIVITY_LEVELS),
      entryType: z.enum(ENTRY_TYPES),
    })
  ),
});

/**
 * Redis-backed cache; entries that fail validation count as misses
 */
export function createRedisQueryCache(redis: Redis): QueryCache {
  return {
    async get(key: string): Promise<CachedSearch | null> {
      const parsed = cachedSearchSchema.safeParse(await cacheGet(redis, key));
      return parsed.success ? parsed.data : null;
    },

    async set(key: string, value: CachedSearch, ttlSeconds: number) {
      await cacheSet(redis, key, value, ttlSeconds);
    },
  };
}

export const DEFAULT_IN_MEMORY_CACHE_ENTRIES = 1000;

export interface InMemoryQueryCache extends QueryCache {
  readonly size: number;
}

/**
 * In-memory cache (single process). Expired entries are swept on every
 * write, and past maxEntries the least recently used entry is evicted.
 */
export function createInMemoryQueryCache(
  now: () => number = Date.now,
  maxEntries: number = DEFAULT_IN_MEMORY_CACHE_ENTRIES
): InMemoryQueryCache {
  // Map order doubles as recency order: oldest first
  const store = new Map<string, { value: CachedSearch; expiresAt: number }>();

  function sweepExpired(at: number): void {
    for (const [key, entry] of store) {
      if (entry.expiresAt <= at) {
        store.delete(key);
      }
    }
  }

  return {
    get size() {
      return store.size;
    },

    async get(key: string): Promise<CachedSearch | null> {
      const hit = store.get(key);
      if (hit === undefined) {
        return null;
      }
      store.delete(key);
      if (hit.expiresAt <= now()) {
        return null;
      }
      store.set(key, hit);
      return hit.value;
    },

    async set(key: string, value: CachedSearch, ttlSeconds: number) {
      const at = now();
      sweepExpired(at);
      store.delete(key);
      store.set(key, { value, expiresAt: at + ttlSeconds * 1000 });
      for (const oldest of store.keys()) {
        if (store.size <= maxEntries) {
          break;
        }
        store.delete(oldest);
      }
    },
  };
}
