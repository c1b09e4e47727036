/**
 * ApiKeyService Implementation
 *
 * SCOPE: Gatekeeping the collaborator HTTP API by company API key
 *
 * Keys are stored as SHA-256 hex digests; the raw key never reaches storage.
 */

import { createHash } from 'node:crypto';

import type { ApiKey } from '@/types/index.js';

/**
 * Database abstraction interface for ApiKeyService
 */
export interface ApiKeyServiceDb {
  /** Active keys only */
  findActiveKeyByHash: (keyHash: string) => Promise<ApiKey | null>;
}

export interface ApiKeyService {
  /** Resolve a presented key, or null when it is unknown or inactive */
  authenticate(rawKey: string): Promise<ApiKey | null>;
}

export function hashApiKey(rawKey: string): string {
  return createHash('sha256').update(rawKey).digest('hex');
}

/**
 * Create ApiKeyService instance
 */
export function createApiKeyService(deps: { db: ApiKeyServiceDb }): ApiKeyService {
  const { db } = deps;

  return {
    async authenticate(rawKey: string): Promise<ApiKey | null> {
      const trimmed = rawKey.trim();
      if (trimmed === '') {
        return null;
      }
      return db.findActiveKeyByHash(hashApiKey(trimmed));
    },
  };
}
