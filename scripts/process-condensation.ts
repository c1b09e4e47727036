/**
 * Drain due condensation jobs once
 * Usage: npx tsx scripts/process-condensation.ts [--max-jobs 50]
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';

import { createContainer } from '../src/container.js';
import { loadConfig } from '../src/lib/config.js';
import { logger } from '../src/lib/logger.js';
import { processCondensationJobs } from '../src/workers/index.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: { 'max-jobs': { type: 'string' } },
  });
  const maxJobs =
    values['max-jobs'] === undefined
      ? undefined
      : Number.parseInt(values['max-jobs'], 10);

  const container = createContainer(loadConfig(), logger);
  const processed = await processCondensationJobs(
    {
      condensation: container.condensation,
      memory: container.memory,
      logger,
    },
    maxJobs === undefined ? {} : { maxJobs }
  );

  logger.info({ processed }, 'Processed condensation jobs');
  container.lexicalIndex.close();
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Condensation run failed');
  process.exit(1);
});
