/**
 * Compute and store vectors for memory entries
 * Usage: npx tsx scripts/build-embeddings.ts [--batch-size 32] [--limit 100]
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';

import { createContainer } from '../src/container.js';
import { loadConfig } from '../src/lib/config.js';
import { logger } from '../src/lib/logger.js';
import { buildEmbeddings } from '../src/workers/index.js';

function readPositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      'batch-size': { type: 'string' },
      limit: { type: 'string' },
    },
  });

  const container = createContainer(loadConfig(), logger);
  if (container.embeddings === null) {
    logger.error('OPENROUTER_API_KEY is not set; no embedding backend available');
    process.exit(1);
  }

  const batchSize = readPositiveInt(values['batch-size']);
  const limit = readPositiveInt(values.limit);
  const stored = await buildEmbeddings(
    { memory: container.memory, embeddings: container.embeddings, logger },
    {
      ...(batchSize !== undefined && { batchSize }),
      ...(limit !== undefined && { limit }),
    }
  );

  logger.info({ stored }, 'Embedding build finished');
  container.lexicalIndex.close();
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Embedding build failed');
  process.exit(1);
});
