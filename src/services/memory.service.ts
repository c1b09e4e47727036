/**
 * MemoryService Implementation
 *
 * SCOPE: Storage of memory entries with optimistic concurrency
 * NOT IN SCOPE: Authorization (callers run the policy engine first)
 *
 * GUARDRAILS:
 * - New entries start at version 1
 * - Updates and deletes are compare-and-swap on version: a stale
 *   expected version changes nothing and yields CONFLICT
 * - Every successful write publishes a domain event afterwards
 */

import type { DomainEventPublisher } from '@/lib/event-bus.js';
import type {
  ActorContext,
  CreateMemoryEntryParams,
  ListMemoryEntriesParams,
  MemoryEntry,
  MemoryEntryChangedData,
  MemoryEntryUpdate,
  Result,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/**
 * Database abstraction interface for MemoryService
 */
export interface MemoryServiceDb {
  createEntry: (params: CreateMemoryEntryParams) => Promise<MemoryEntry>;
  getEntry: (entryId: number) => Promise<MemoryEntry | null>;
  listEntries: (params: ListMemoryEntriesParams) => Promise<MemoryEntry[]>;
  /**
   * Apply updates and bump the version, only if the stored version still
   * equals expectedVersion. Returns null when nothing matched.
   */
  compareAndSwapEntry: (
    entryId: number,
    expectedVersion: number,
    updates: MemoryEntryUpdate
  ) => Promise<MemoryEntry | null>;
  /**
   * Delete only if the stored version equals expectedVersion
   */
  deleteEntryIfVersion: (
    entryId: number,
    expectedVersion: number
  ) => Promise<boolean>;
}

/**
 * MemoryService interface
 */
export interface MemoryService {
  createEntry(
    actor: ActorContext,
    params: CreateMemoryEntryParams
  ): Promise<Result<MemoryEntry>>;
  getEntry(entryId: number): Promise<Result<MemoryEntry>>;
  listEntries(params: ListMemoryEntriesParams): Promise<Result<MemoryEntry[]>>;
  updateEntry(
    actor: ActorContext,
    entryId: number,
    expectedVersion: number,
    updates: MemoryEntryUpdate
  ): Promise<Result<MemoryEntry>>;
  deleteEntry(
    actor: ActorContext,
    entryId: number,
    expectedVersion: number
  ): Promise<Result<void>>;
}

function toEventData(entry: MemoryEntry): MemoryEntryChangedData {
  return {
    entryId: entry.id,
    title: entry.title,
    version: entry.version,
    sensitivity: entry.sensitivity,
    entryType: entry.entryType,
  };
}

/**
 * Create MemoryService instance
 */
export function createMemoryService(deps: {
  db: MemoryServiceDb;
  events: DomainEventPublisher;
}): MemoryService {
  const { db, events } = deps;

  return {
    /**
     * Create an entry at version 1
     */
    async createEntry(
      actor: ActorContext,
      params: CreateMemoryEntryParams
    ): Promise<Result<MemoryEntry>> {
      try {
        const entry = await db.createEntry(params);
        events.publish('memory.entry.created', actor, toEventData(entry));
        return success(entry);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to create memory entry');
      }
    },

    async getEntry(entryId: number): Promise<Result<MemoryEntry>> {
      try {
        const entry = await db.getEntry(entryId);
        if (entry === null) {
          return failure('NOT_FOUND', 'Memory entry not found');
        }
        return success(entry);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to load memory entry');
      }
    },

    async listEntries(
      params: ListMemoryEntriesParams
    ): Promise<Result<MemoryEntry[]>> {
      try {
        const entries = await db.listEntries(params);
        return success(entries);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to list memory entries');
      }
    },

    async updateEntry(
      actor: ActorContext,
      entryId: number,
      expectedVersion: number,
      updates: MemoryEntryUpdate
    ): Promise<Result<MemoryEntry>> {
      try {
        const updated = await db.compareAndSwapEntry(
          entryId,
          expectedVersion,
          updates
        );
        if (updated === null) {
          const current = await db.getEntry(entryId);
          if (current === null) {
            return failure('NOT_FOUND', 'Memory entry not found');
          }
          return failure('CONFLICT', 'Version conflict detected', {
            expectedVersion,
            currentVersion: current.version,
          });
        }
        events.publish('memory.entry.updated', actor, toEventData(updated));
        return success(updated);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to update memory entry');
      }
    },

    async deleteEntry(
      actor: ActorContext,
      entryId: number,
      expectedVersion: number
    ): Promise<Result<void>> {
      try {
        const deleted = await db.deleteEntryIfVersion(entryId, expectedVersion);
        if (!deleted) {
          const current = await db.getEntry(entryId);
          if (current === null) {
            return failure('NOT_FOUND', 'Memory entry not found');
          }
          return failure('CONFLICT', 'Version conflict detected', {
            expectedVersion,
            currentVersion: current.version,
          });
        }
        events.publish('memory.entry.deleted', actor, { entryId });
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to delete memory entry');
      }
    },
  };
}
