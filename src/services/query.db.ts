/**
 * HybridQueryService Database Adapter
 * Implements QueryServiceDb interface using Supabase
 *
 * Tables: memory_entries, memory_embeddings
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { LexicalDocument } from '@/lib/fts.js';
import { selectAllPages } from '@/lib/supabase.js';
import type { MemoryEntry } from '@/types/index.js';

import { mapRowToMemoryEntry, type MemoryEntryRow } from './memory.db.js';
import type { QueryServiceDb, StoredVector } from './query.service.js';

interface EmbeddingRow {
  entry_id: number;
  vector: unknown;
}

function parseVector(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is number => typeof item === 'number');
}

/**
 * Create QueryServiceDb implementation using Supabase
 */
export function createQueryServiceDb(supabase: SupabaseClient): QueryServiceDb {
  return {
    async getModificationMarker(): Promise<string> {
      const { data, error, count } = await supabase
        .from('memory_entries')
        .select('updated_at', { count: 'exact' })
        .order('updated_at', { ascending: false })
        .limit(1);

      if (error !== null) {
        throw new Error(`Failed to read modification marker: ${error.message}`);
      }

      const rows = data as Array<{ updated_at: string }>;
      const latest = rows[0]?.updated_at ?? '';
      // The count changes on delete even when max(updated_at) does not
      return `${latest}|${count ?? 0}`;
    },

    async listIndexableEntries(): Promise<LexicalDocument[]> {
      const rows = await selectAllPages('indexable entries', (from, to) =>
        supabase
          .from('memory_entries')
          .select('id, title, content')
          .order('id', { ascending: true })
          .range(from, to)
      );

      return (rows as LexicalDocument[]).map((row) => ({
        id: row.id,
        title: row.title,
        content: row.content,
      }));
    },

    async listEmbeddings(): Promise<StoredVector[]> {
      const rows = await selectAllPages('embeddings', (from, to) =>
        supabase
          .from('memory_embeddings')
          .select('entry_id, vector')
          .order('entry_id', { ascending: true })
          .range(from, to)
      );

      return (rows as EmbeddingRow[]).map((row) => ({
        entryId: row.entry_id,
        vector: parseVector(row.vector),
      }));
    },

    async getEntriesByIds(entryIds: number[]): Promise<MemoryEntry[]> {
      if (entryIds.length === 0) {
        return [];
      }

      const { data, error } = await supabase
        .from('memory_entries')
        .select('*')
        .in('id', entryIds);

      if (error !== null) {
        throw new Error(`Failed to load memory entries: ${error.message}`);
      }

      return (data as MemoryEntryRow[]).map(mapRowToMemoryEntry);
    },
  };
}
