/**
 * Condensation worker
 *
 * Drains due condensation jobs. A job whose entry cannot be summarized is
 * marked failed with the error text and left for an explicit reschedule.
 */

import type { Logger } from '@/lib/logger.js';
import {
  generateSummary,
  type CondensationService,
} from '@/services/condensation.service.js';
import type { MemoryService } from '@/services/memory.service.js';

export interface CondensationWorkerDeps {
  condensation: CondensationService;
  memory: Pick<MemoryService, 'getEntry'>;
  logger: Logger;
}

/**
 * Process due jobs until none remain or maxJobs have been handled.
 * Returns the number of jobs processed (completed or failed).
 */
export async function processCondensationJobs(
  deps: CondensationWorkerDeps,
  options: { maxJobs?: number } = {}
): Promise<number> {
  const { condensation, memory } = deps;
  const log = deps.logger.child({ component: 'condensation-worker' });
  let processed = 0;

  while (options.maxJobs === undefined || processed < options.maxJobs) {
    const acquired = await condensation.acquireNextJob();
    if (!acquired.success) {
      throw new Error(acquired.error.message);
    }
    const job = acquired.data;
    if (job === null) {
      break;
    }

    const entry = await memory.getEntry(job.entryId);
    const outcome = entry.success
      ? await condensation.completeJob(job, generateSummary(entry.data.content))
      : await condensation.failJob(job, entry.error.message);

    if (!outcome.success) {
      log.error({ jobId: job.id, error: outcome.error.message }, 'Could not record job outcome');
    } else if (outcome.data.status === 'failed') {
      log.warn({ jobId: job.id, error: outcome.data.errorMessage }, 'Condensation job failed');
    }
    processed++;
  }

  log.info({ processed }, 'Condensation run finished');
  return processed;
}
