/**
 * EmbeddingService Database Adapter
 * Implements EmbeddingServiceDb interface using Supabase
 *
 * Table: memory_embeddings (one row per entry, keyed by entry_id)
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { MemoryEmbedding } from '@/types/index.js';

import type { EmbeddingServiceDb } from './embedding.service.js';

/**
 * Create EmbeddingServiceDb implementation using Supabase
 */
export function createEmbeddingServiceDb(
  supabase: SupabaseClient
): EmbeddingServiceDb {
  return {
    async upsertEmbeddings(embeddings: MemoryEmbedding[]): Promise<number> {
      if (embeddings.length === 0) {
        return 0;
      }

      const { data, error } = await supabase
        .from('memory_embeddings')
        .upsert(
          embeddings.map((embedding) => ({
            entry_id: embedding.entryId,
            vector: embedding.vector,
            dimension: embedding.dimension,
            model_name: embedding.modelName,
            updated_at: new Date().toISOString(),
          })),
          { onConflict: 'entry_id' }
        )
        .select('entry_id');

      if (error !== null) {
        throw new Error(`Failed to store embeddings: ${error.message}`);
      }

      return (data ?? []).length;
    },
  };
}
