/**
 * Memory Domain Types
 *
 * SCOPE: Memory entries, their embeddings, and hybrid search results
 * NOT IN SCOPE: Per-user ownership (entries are guarded by consent, not owner)
 */

/**
 * Sensitivity levels, ordered from least to most sensitive.
 * The order is significant: policy checks over several entries use the highest.
 */
export const SENSITIVITY_LEVELS = ['public', 'confidential', 'secret'] as const;

export type Sensitivity = (typeof SENSITIVITY_LEVELS)[number];

export const ENTRY_TYPES = ['fact', 'event', 'note'] as const;

export type EntryType = (typeof ENTRY_TYPES)[number];

export const DEFAULT_SENSITIVITY: Sensitivity = 'public';
export const DEFAULT_ENTRY_TYPE: EntryType = 'note';

export function isSensitivity(value: unknown): value is Sensitivity {
  return SENSITIVITY_LEVELS.some((level) => level === value);
}

export function isEntryType(value: unknown): value is EntryType {
  return ENTRY_TYPES.some((type) => type === value);
}

/**
 * Position of a sensitivity in the ordering (public = 0)
 */
export function sensitivityRank(sensitivity: Sensitivity): number {
  return SENSITIVITY_LEVELS.indexOf(sensitivity);
}

/**
 * Memory entry - a stored unit of knowledge
 * version starts at 1 and increases by exactly one per successful update
 */
export interface MemoryEntry {
  id: number;
  title: string;
  content: string;
  sensitivity: Sensitivity;
  entryType: EntryType;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Parameters for creating an entry
 */
export interface CreateMemoryEntryParams {
  title: string;
  content: string;
  sensitivity: Sensitivity;
  entryType: EntryType;
}

/**
 * Field changes applied by an update. Absent fields are left untouched.
 */
export interface MemoryEntryUpdate {
  title?: string;
  content?: string;
  sensitivity?: Sensitivity;
  entryType?: EntryType;
}

/**
 * Filters for listing entries
 */
export interface ListMemoryEntriesParams {
  sensitivity?: Sensitivity;
  entryType?: EntryType;
}

/**
 * Stored vector for one entry
 */
export interface MemoryEmbedding {
  entryId: number;
  vector: number[];
  dimension: number;
  modelName: string;
}

/**
 * One ranked hit from the hybrid query service
 */
export interface HybridSearchResult {
  entryId: number;
  title: string;
  snippet: string;
  combinedScore: number;
  textScore: number;
  vectorScore: number;
  sensitivity: Sensitivity;
  entryType: EntryType;
}

/**
 * Wire form of a search hit, as returned by memory.search
 */
export interface SerializedSearchResult {
  id: number;
  title: string;
  snippet: string;
  combined_score: number;
  scores: {
    text: number;
    vector: number;
  };
  sensitivity: Sensitivity;
  entry_type: EntryType;
}

export function serializeSearchResult(
  result: HybridSearchResult
): SerializedSearchResult {
  return {
    id: result.entryId,
    title: result.title,
    snippet: result.snippet,
    combined_score: result.combinedScore,
    scores: {
      text: result.textScore,
      vector: result.vectorScore,
    },
    sensitivity: result.sensitivity,
    entry_type: result.entryType,
  };
}

/**
 * Wire form of an entry, shared by memory.get and the entry routes
 */
export interface SerializedMemoryEntry {
  id: number;
  title: string;
  content: string;
  sensitivity: Sensitivity;
  entry_type: EntryType;
  version: number;
  updated_at: string;
}

export function serializeMemoryEntry(
  entry: MemoryEntry
): SerializedMemoryEntry {
  return {
    id: entry.id,
    title: entry.title,
    content: entry.content,
    sensitivity: entry.sensitivity,
    entry_type: entry.entryType,
    version: entry.version,
    updated_at: entry.updatedAt.toISOString(),
  };
}
