/**
 * Condensation Job Types
 *
 * A condensation job produces an extractive summary of one memory entry.
 *
 * Lifecycle:
 *   pending -> processing -> completed
 *                         -> failed -> processing (manual restart)
 *   failed | processing -> pending (reschedule)
 */

export type CondensationJobStatus =
  | 'pending'
  | 'processing'
  | 'completed'
  | 'failed';

export interface CondensationJob {
  id: number;
  entryId: number;
  status: CondensationJobStatus;
  scheduledFor: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  attempts: number;
  summary: string;
  errorMessage: string;
  createdAt: Date;
}
