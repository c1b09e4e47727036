/**
 * CondensationService Implementation
 *
 * SCOPE: Extractive summaries of memory entries, produced by queued jobs
 *
 * GUARDRAILS:
 * - Transitions are checked here; storage only applies them
 * - Claiming a job is compare-and-swap on its status, so two workers
 *   never process the same job
 * - Failed jobs stay failed until someone reschedules them
 */

import type { DomainEventBus } from '@/lib/event-bus.js';
import type {
  CondensationJob,
  CondensationJobStatus,
  Result,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

export const SUMMARY_MAX_LENGTH = 1024;
export const FALLBACK_SUMMARY_LENGTH = 256;

/**
 * Database abstraction interface for CondensationService
 */
export interface CondensationServiceDb {
  insertJob: (entryId: number, scheduledFor: Date) => Promise<CondensationJob>;
  getJob: (jobId: number) => Promise<CondensationJob | null>;
  /** Pending jobs with scheduledFor <= now, oldest first */
  listDueJobs: (now: Date, limit: number) => Promise<CondensationJob[]>;
  /**
   * Persist job state only if the stored status still equals expectedStatus
   */
  saveJobIfStatus: (
    job: CondensationJob,
    expectedStatus: CondensationJobStatus
  ) => Promise<boolean>;
}

export interface CondensationService {
  enqueue(entryId: number, when?: Date): Promise<Result<CondensationJob>>;
  /** Claim the oldest due job and move it to processing */
  acquireNextJob(): Promise<Result<CondensationJob | null>>;
  completeJob(
    job: CondensationJob,
    summary: string
  ): Promise<Result<CondensationJob>>;
  failJob(job: CondensationJob, message: string): Promise<Result<CondensationJob>>;
  rescheduleJob(jobId: number, when?: Date): Promise<Result<CondensationJob>>;
}

// ─────────────────────────────────────────────────────────────
// Summaries
// ─────────────────────────────────────────────────────────────

function splitSentences(text: string): string[] {
  const normalized = text.replace(/\n/g, ' ').trim();
  if (normalized === '') {
    return [];
  }
  return normalized
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence !== '');
}

export function generateSummary(content: string, maxSentences = 3): string {
  const sentences = splitSentences(content);
  if (sentences.length === 0) {
    return content.trim().slice(0, FALLBACK_SUMMARY_LENGTH);
  }
  return sentences.slice(0, maxSentences).join(' ').slice(0, SUMMARY_MAX_LENGTH);
}

// ─────────────────────────────────────────────────────────────
// Transitions
// ─────────────────────────────────────────────────────────────

export function applyStart(
  job: CondensationJob,
  at: Date
): Result<CondensationJob> {
  if (job.status !== 'pending' && job.status !== 'failed') {
    return failure('INVALID_STATE', 'Only pending or failed jobs can be started');
  }
  return success({
    ...job,
    status: 'processing',
    startedAt: at,
    attempts: job.attempts + 1,
  });
}

export function applyComplete(
  job: CondensationJob,
  summary: string,
  at: Date
): Result<CondensationJob> {
  if (job.status !== 'processing') {
    return failure('INVALID_STATE', 'Only processing jobs can be completed');
  }
  return success({
    ...job,
    status: 'completed',
    summary,
    completedAt: at,
    errorMessage: '',
  });
}

export function applyFail(
  job: CondensationJob,
  message: string,
  at: Date
): Result<CondensationJob> {
  if (job.status !== 'processing') {
    return failure('INVALID_STATE', 'Only processing jobs can fail');
  }
  return success({
    ...job,
    status: 'failed',
    errorMessage: message,
    completedAt: at,
  });
}

export function applyReschedule(
  job: CondensationJob,
  when: Date
): Result<CondensationJob> {
  if (job.status !== 'failed' && job.status !== 'processing') {
    return failure(
      'INVALID_STATE',
      'Only failed or processing jobs may be rescheduled'
    );
  }
  return success({
    ...job,
    status: 'pending',
    scheduledFor: when,
    startedAt: null,
    completedAt: null,
  });
}

/**
 * Create CondensationService instance
 */
export function createCondensationService(deps: {
  db: CondensationServiceDb;
  now?: () => Date;
}): CondensationService {
  const { db } = deps;
  const now = deps.now ?? (() => new Date());

  async function persist(
    previous: CondensationJob,
    next: Result<CondensationJob>
  ): Promise<Result<CondensationJob>> {
    if (!next.success) {
      return next;
    }
    const saved = await db.saveJobIfStatus(next.data, previous.status);
    if (!saved) {
      return failure('CONFLICT', 'Job was changed by another worker');
    }
    return next;
  }

  return {
    async enqueue(
      entryId: number,
      when?: Date
    ): Promise<Result<CondensationJob>> {
      try {
        const job = await db.insertJob(entryId, when ?? now());
        return success(job);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to enqueue condensation job');
      }
    },

    async acquireNextJob(): Promise<Result<CondensationJob | null>> {
      try {
        const due = await db.listDueJobs(now(), 10);
        for (const job of due) {
          const claimed = await persist(job, applyStart(job, now()));
          if (claimed.success) {
            return claimed;
          }
          // lost the race for this one; try the next
        }
        return success(null);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to acquire condensation job');
      }
    },

    async completeJob(
      job: CondensationJob,
      summary: string
    ): Promise<Result<CondensationJob>> {
      try {
        return await persist(job, applyComplete(job, summary, now()));
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to complete condensation job');
      }
    },

    async failJob(
      job: CondensationJob,
      message: string
    ): Promise<Result<CondensationJob>> {
      try {
        return await persist(job, applyFail(job, message, now()));
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to record job failure');
      }
    },

    async rescheduleJob(
      jobId: number,
      when?: Date
    ): Promise<Result<CondensationJob>> {
      try {
        const job = await db.getJob(jobId);
        if (job === null) {
          return failure('NOT_FOUND', 'Condensation job not found');
        }
        return await persist(job, applyReschedule(job, when ?? now()));
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to reschedule condensation job');
      }
    },
  };
}

/**
 * Queue a condensation job whenever an entry is created or changed
 */
export function registerCondensationScheduler(
  bus: Pick<DomainEventBus, 'subscribe'>,
  condensation: CondensationService
): () => void {
  const enqueue = async (event: { data: { entryId: number } }): Promise<void> => {
    const result = await condensation.enqueue(event.data.entryId);
    if (!result.success) {
      throw new Error(result.error.message);
    }
  };
  const unsubscribeCreated = bus.subscribe('memory.entry.created', enqueue);
  const unsubscribeUpdated = bus.subscribe('memory.entry.updated', enqueue);
  return () => {
    unsubscribeCreated();
    unsubscribeUpdated();
  };
}
