/**
 * MemoryService Database Adapter
 * Implements MemoryServiceDb interface using Supabase
 *
 * Table: memory_entries
 * Version checks ride on the UPDATE/DELETE filter (... AND version = ?),
 * so the check and the write are one statement.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { selectAllPages } from '@/lib/supabase.js';
import type {
  CreateMemoryEntryParams,
  EntryType,
  ListMemoryEntriesParams,
  MemoryEntry,
  MemoryEntryUpdate,
  Sensitivity,
} from '@/types/index.js';
import { isEntryType, isSensitivity } from '@/types/index.js';

import type { MemoryServiceDb } from './memory.service.js';

/**
 * Database row type
 */
export interface MemoryEntryRow {
  id: number;
  title: string;
  content: string;
  sensitivity: string;
  entry_type: string;
  version: number;
  created_at: string;
  updated_at: string;
}

function parseSensitivity(value: string): Sensitivity {
  if (!isSensitivity(value)) {
    throw new Error(`Unknown sensitivity in storage: ${value}`);
  }
  return value;
}

function parseEntryType(value: string): EntryType {
  if (!isEntryType(value)) {
    throw new Error(`Unknown entry type in storage: ${value}`);
  }
  return value;
}

/**
 * Map database row to MemoryEntry entity
 */
export function mapRowToMemoryEntry(row: MemoryEntryRow): MemoryEntry {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    sensitivity: parseSensitivity(row.sensitivity),
    entryType: parseEntryType(row.entry_type),
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Create MemoryServiceDb implementation using Supabase
 */
export function createMemoryServiceDb(
  supabase: SupabaseClient
): MemoryServiceDb {
  return {
    async createEntry(params: CreateMemoryEntryParams): Promise<MemoryEntry> {
      const { data, error } = await supabase
        .from('memory_entries')
        .insert({
          title: params.title,
          content: params.content,
          sensitivity: params.sensitivity,
          entry_type: params.entryType,
          version: 1,
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to create memory entry: ${error.message}`);
      }

      return mapRowToMemoryEntry(data as MemoryEntryRow);
    },

    async getEntry(entryId: number): Promise<MemoryEntry | null> {
      const { data, error } = await supabase
        .from('memory_entries')
        .select('*')
        .eq('id', entryId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get memory entry: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToMemoryEntry(data as MemoryEntryRow);
    },

    async listEntries(
      params: ListMemoryEntriesParams
    ): Promise<MemoryEntry[]> {
      const rows = await selectAllPages('memory entries', (from, to) => {
        let query = supabase
          .from('memory_entries')
          .select('*')
          .order('updated_at', { ascending: false })
          .order('title', { ascending: true })
          .order('id', { ascending: true });

        if (params.sensitivity !== undefined) {
          query = query.eq('sensitivity', params.sensitivity);
        }
        if (params.entryType !== undefined) {
          query = query.eq('entry_type', params.entryType);
        }

        return query.range(from, to);
      });

      return (rows as MemoryEntryRow[]).map(mapRowToMemoryEntry);
    },

    async compareAndSwapEntry(
      entryId: number,
      expectedVersion: number,
      updates: MemoryEntryUpdate
    ): Promise<MemoryEntry | null> {
      const updateData: Record<string, unknown> = {
        version: expectedVersion + 1,
        updated_at: new Date().toISOString(),
      };

      if (updates.title !== undefined) {
        updateData.title = updates.title;
      }
      if (updates.content !== undefined) {
        updateData.content = updates.content;
      }
      if (updates.sensitivity !== undefined) {
        updateData.sensitivity = updates.sensitivity;
      }
      if (updates.entryType !== undefined) {
        updateData.entry_type = updates.entryType;
      }

      const { data, error } = await supabase
        .from('memory_entries')
        .update(updateData)
        .eq('id', entryId)
        .eq('version', expectedVersion)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to update memory entry: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToMemoryEntry(data as MemoryEntryRow);
    },

    async deleteEntryIfVersion(
      entryId: number,
      expectedVersion: number
    ): Promise<boolean> {
      const { data, error } = await supabase
        .from('memory_entries')
        .delete()
        .eq('id', entryId)
        .eq('version', expectedVersion)
        .select('id');

      if (error !== null) {
        throw new Error(`Failed to delete memory entry: ${error.message}`);
      }

      return (data ?? []).length > 0;
    },
  };
}
