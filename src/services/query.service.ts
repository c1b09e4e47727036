/**
 * HybridQueryService Implementation
 *
 * SCOPE: Ranking memory entries against free text
 * NOT IN SCOPE: Consent filtering (callers drop results the consent
 * does not cover before returning them)
 *
 * GUARDRAILS:
 * - Blank queries return no results without touching storage
 * - Cached results and the lexical index are both keyed off the
 *   modification marker; a changed marker invalidates both
 * - Ordering is total: combined, text, vector, then entry id
 */

import { createHash } from 'node:crypto';

import { SEARCH_DEFAULTS } from '@/lib/config.js';
import type { LexicalDocument, LexicalIndex } from '@/lib/fts.js';
import type { Logger } from '@/lib/logger.js';
import type {
  HybridSearchResult,
  MemoryEntry,
  QueryEncoder,
  Result,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/** Candidates kept from the vector side, as a multiple of limit */
export const VECTOR_CANDIDATE_MULTIPLIER = 3;

export const SNIPPET_LENGTH = 200;

export interface StoredVector {
  entryId: number;
  vector: number[];
}

/**
 * Database abstraction interface for HybridQueryService
 */
export interface QueryServiceDb {
  /** Changes whenever any entry is created, updated or deleted */
  getModificationMarker: () => Promise<string>;
  listIndexableEntries: () => Promise<LexicalDocument[]>;
  listEmbeddings: () => Promise<StoredVector[]>;
  getEntriesByIds: (entryIds: number[]) => Promise<MemoryEntry[]>;
}

export interface CachedSearch {
  marker: string;
  results: HybridSearchResult[];
}

export interface QueryCache {
  get: (key: string) => Promise<CachedSearch | null>;
  set: (key: string, value: CachedSearch, ttlSeconds: number) => Promise<void>;
}

export interface HybridQueryOptions {
  textWeight: number;
  vectorWeight: number;
  cacheTtlSeconds: number;
}

export interface HybridQueryService {
  search(
    userId: string,
    query: string,
    limit?: number
  ): Promise<Result<HybridSearchResult[]>>;
}

export interface ScoredCandidate {
  entryId: number;
  combinedScore: number;
  textScore: number;
  vectorScore: number;
}

// ─────────────────────────────────────────────────────────────
// Scoring
// ─────────────────────────────────────────────────────────────

/**
 * Map a lower-is-better FTS rank onto (0, 1]
 */
export function normalizeTextRank(rank: number): number {
  return 1 / (1 + Math.max(0, rank));
}

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity. The dot product runs over the shorter of the two
 * vectors; a zero-norm side scores 0.
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[]
): number {
  const normA = norm(a);
  const normB = norm(b);
  if (normA === 0 || normB === 0) {
    return 0;
  }
  const length = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot / (normA * normB);
}

/**
 * Weighted union of text and vector scores; a side an entry is missing
 * from counts as 0.
 */
export function combineScores(
  textScores: ReadonlyMap<number, number>,
  vectorScores: ReadonlyMap<number, number>,
  weights: { textWeight: number; vectorWeight: number }
): ScoredCandidate[] {
  const ids = new Set<number>([...textScores.keys(), ...vectorScores.keys()]);
  const candidates: ScoredCandidate[] = [];

  for (const entryId of ids) {
    const textScore = textScores.get(entryId) ?? 0;
    const vectorScore = vectorScores.get(entryId) ?? 0;
    candidates.push({
      entryId,
      combinedScore:
        weights.textWeight * textScore + weights.vectorWeight * vectorScore,
      textScore,
      vectorScore,
    });
  }

  return candidates.sort(
    (a, b) =>
      b.combinedScore - a.combinedScore ||
      b.textScore - a.textScore ||
      b.vectorScore - a.vectorScore ||
      a.entryId - b.entryId
  );
}

// ─────────────────────────────────────────────────────────────
// Encoder output coercion
// ─────────────────────────────────────────────────────────────

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function hasToList(value: unknown): value is { tolist(): unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'tolist' in value &&
    typeof value.tolist === 'function'
  );
}

function toList(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (hasToList(value)) {
    return toList(value.tolist());
  }
  if (isIterable(value)) {
    return Array.from(value);
  }
  return [value];
}

function toFloat(value: unknown): number {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' || typeof value === 'bigint'
        ? Number(value)
        : Number.NaN;
  if (Number.isNaN(parsed)) {
    throw new Error('Query embedding contains a non-numeric value');
  }
  return parsed;
}

/**
 * Take the first row of whatever the encoder returned (nested arrays,
 * typed arrays, objects exposing tolist()) as a plain number array.
 */
export function coerceEmbedding(encoded: unknown): number[] {
  const rows = toList(encoded);
  if (rows.length === 0) {
    return [];
  }
  return toList(rows[0]).map(toFloat);
}

// ─────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────

function hashQuery(query: string): string {
  return createHash('sha256').update(query).digest('hex');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Create HybridQueryService instance
 */
export function createHybridQueryService(deps: {
  db: QueryServiceDb;
  index: LexicalIndex;
  encoder: QueryEncoder;
  cache: QueryCache;
  logger: Logger;
  options?: Partial<HybridQueryOptions>;
}): HybridQueryService {
  const { db, index, encoder, cache } = deps;
  const log = deps.logger.child({ component: 'hybrid-query' });
  const options: HybridQueryOptions = { ...SEARCH_DEFAULTS, ...deps.options };

  let indexedMarker: string | null = null;

  async function ensureIndex(marker: string): Promise<void> {
    if (indexedMarker === marker) {
      return;
    }
    const documents = await db.listIndexableEntries();
    index.rebuild(documents);
    indexedMarker = marker;
    log.debug({ documents: documents.length }, 'Lexical index rebuilt');
  }

  async function vectorScores(
    query: string,
    limit: number
  ): Promise<Map<number, number>> {
    const queryVector = coerceEmbedding(await encoder.encode([query]));
    if (queryVector.length === 0 || norm(queryVector) === 0) {
      return new Map();
    }

    const scored: Array<[number, number]> = [];
    for (const stored of await db.listEmbeddings()) {
      const score = cosineSimilarity(queryVector, stored.vector);
      if (score > 0) {
        scored.push([stored.entryId, score]);
      }
    }
    scored.sort((a, b) => b[1] - a[1] || a[0] - b[0]);
    return new Map(scored.slice(0, limit * VECTOR_CANDIDATE_MULTIPLIER));
  }

  return {
    async search(
      userId: string,
      query: string,
      limit: number = 10
    ): Promise<Result<HybridSearchResult[]>> {
      const normalized = query.trim();
      if (normalized === '') {
        return success([]);
      }
      if (!Number.isInteger(limit) || limit < 1) {
        return failure('VALIDATION_ERROR', 'Limit must be a positive integer');
      }

      try {
        const marker = await db.getModificationMarker();
        const cacheKey = `memory-query:${userId}:${limit}:${hashQuery(normalized)}`;

        const cached = await cache.get(cacheKey);
        if (cached !== null && cached.marker === marker) {
          return success(cached.results);
        }

        await ensureIndex(marker);

        const textScores = new Map<number, number>();
        for (const match of index.search(normalized, limit)) {
          textScores.set(match.id, normalizeTextRank(match.rank));
        }

        const ranked = combineScores(
          textScores,
          await vectorScores(normalized, limit),
          options
        ).slice(0, limit);

        const entries = await db.getEntriesByIds(
          ranked.map((candidate) => candidate.entryId)
        );
        const byId = new Map(entries.map((entry) => [entry.id, entry]));

        const results: HybridSearchResult[] = [];
        for (const candidate of ranked) {
          const entry = byId.get(candidate.entryId);
          if (entry === undefined) {
            continue;
          }
          results.push({
            ...candidate,
            title: entry.title,
            snippet: entry.content.slice(0, SNIPPET_LENGTH),
            sensitivity: entry.sensitivity,
            entryType: entry.entryType,
          });
        }

        await cache.set(cacheKey, { marker, results }, options.cacheTtlSeconds);
        return success(results);
      } catch (error) {
        log.error({ err: error }, 'Hybrid search failed');
        return failure(
          'INTERNAL_ERROR',
          `Failed to search memory: ${describeError(error)}`
        );
      }
    },
  };
}
