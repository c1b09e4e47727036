/**
 * ApiKeyService Database Adapter
 * Implements ApiKeyServiceDb interface using Supabase
 *
 * Table: api_keys
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { ApiKey } from '@/types/index.js';

import type { ApiKeyServiceDb } from './api-key.service.js';

interface ApiKeyRow {
  id: string;
  company_id: string;
  label: string;
}

/**
 * Create ApiKeyServiceDb implementation using Supabase
 */
export function createApiKeyServiceDb(supabase: SupabaseClient): ApiKeyServiceDb {
  return {
    async findActiveKeyByHash(keyHash: string): Promise<ApiKey | null> {
      const { data, error } = await supabase
        .from('api_keys')
        .select('id, company_id, label')
        .eq('key_hash', keyHash)
        .eq('is_active', true)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to look up API key: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      const row = data as ApiKeyRow;
      return { id: row.id, companyId: row.company_id, label: row.label };
    },
  };
}
