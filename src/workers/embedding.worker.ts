/**
 * Embedding build worker
 *
 * (Re)computes one stored vector per memory entry, in id order and in
 * batches, so hybrid search has a vector side to rank against.
 */

import type { Logger } from '@/lib/logger.js';
import type { EmbeddingService } from '@/services/embedding.service.js';
import type { MemoryService } from '@/services/memory.service.js';

export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;

export interface EmbeddingWorkerDeps {
  memory: Pick<MemoryService, 'listEntries'>;
  embeddings: EmbeddingService;
  logger: Logger;
}

export interface BuildEmbeddingsOptions {
  batchSize?: number;
  /** Only embed the first N entries by id */
  limit?: number;
}

/**
 * Returns the number of vectors stored
 */
export async function buildEmbeddings(
  deps: EmbeddingWorkerDeps,
  options: BuildEmbeddingsOptions = {}
): Promise<number> {
  const log = deps.logger.child({ component: 'embedding-worker' });
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE);

  const listed = await deps.memory.listEntries({});
  if (!listed.success) {
    throw new Error(listed.error.message);
  }

  let entries = [...listed.data].sort((a, b) => a.id - b.id);
  if (options.limit !== undefined && options.limit > 0) {
    entries = entries.slice(0, options.limit);
  }
  if (entries.length === 0) {
    log.info('No memory entries found to embed');
    return 0;
  }

  let stored = 0;
  for (let start = 0; start < entries.length; start += batchSize) {
    const batch = entries.slice(start, start + batchSize);
    const result = await deps.embeddings.embedEntries(batch);
    if (!result.success) {
      throw new Error(result.error.message);
    }
    stored += result.data.stored;
  }

  log.info({ stored }, 'Stored embeddings for memory entries');
  return stored;
}
