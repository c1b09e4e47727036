/**
 * CondensationService Database Adapter
 * Implements CondensationServiceDb interface using Supabase
 *
 * Table: memory_condensation_jobs
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { CondensationJob, CondensationJobStatus } from '@/types/index.js';

import type { CondensationServiceDb } from './condensation.service.js';

interface CondensationJobRow {
  id: number;
  entry_id: number;
  status: string;
  scheduled_for: string;
  started_at: string | null;
  completed_at: string | null;
  attempts: number;
  summary: string | null;
  error_message: string | null;
  created_at: string;
}

function parseStatus(value: string): CondensationJobStatus {
  switch (value) {
    case 'pending':
    case 'processing':
    case 'completed':
    case 'failed':
      return value;
    default:
      throw new Error(`Unknown condensation job status in storage: ${value}`);
  }
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function mapRowToJob(row: CondensationJobRow): CondensationJob {
  return {
    id: row.id,
    entryId: row.entry_id,
    status: parseStatus(row.status),
    scheduledFor: new Date(row.scheduled_for),
    startedAt: toDate(row.started_at),
    completedAt: toDate(row.completed_at),
    attempts: row.attempts,
    summary: row.summary ?? '',
    errorMessage: row.error_message ?? '',
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create CondensationServiceDb implementation using Supabase
 */
export function createCondensationServiceDb(
  supabase: SupabaseClient
): CondensationServiceDb {
  return {
    async insertJob(
      entryId: number,
      scheduledFor: Date
    ): Promise<CondensationJob> {
      const { data, error } = await supabase
        .from('memory_condensation_jobs')
        .insert({
          entry_id: entryId,
          status: 'pending',
          scheduled_for: scheduledFor.toISOString(),
          attempts: 0,
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert condensation job: ${error.message}`);
      }

      return mapRowToJob(data as CondensationJobRow);
    },

    async getJob(jobId: number): Promise<CondensationJob | null> {
      const { data, error } = await supabase
        .from('memory_condensation_jobs')
        .select('*')
        .eq('id', jobId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get condensation job: ${error.message}`);
      }

      return data === null ? null : mapRowToJob(data as CondensationJobRow);
    },

    async listDueJobs(now: Date, limit: number): Promise<CondensationJob[]> {
      const { data, error } = await supabase
        .from('memory_condensation_jobs')
        .select('*')
        .eq('status', 'pending')
        .lte('scheduled_for', now.toISOString())
        .order('scheduled_for', { ascending: true })
        .order('created_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to list due condensation jobs: ${error.message}`);
      }

      return (data as CondensationJobRow[]).map(mapRowToJob);
    },

    async saveJobIfStatus(
      job: CondensationJob,
      expectedStatus: CondensationJobStatus
    ): Promise<boolean> {
      const { data, error } = await supabase
        .from('memory_condensation_jobs')
        .update({
          status: job.status,
          scheduled_for: job.scheduledFor.toISOString(),
          started_at: job.startedAt?.toISOString() ?? null,
          completed_at: job.completedAt?.toISOString() ?? null,
          attempts: job.attempts,
          summary: job.summary,
          error_message: job.errorMessage,
          updated_at: new Date().toISOString(),
        })
        .eq('id', job.id)
        .eq('status', expectedStatus)
        .select('id');

      if (error !== null) {
        throw new Error(`Failed to save condensation job: ${error.message}`);
      }

      return (data ?? []).length > 0;
    },
  };
}
