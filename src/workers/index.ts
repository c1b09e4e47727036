/**
 * Background Workers Exports
 *
 * Workers are invoked by the scheduler (or an operator) and run to
 * completion; they hold no state between runs.
 */

export { processCondensationJobs } from './condensation.worker.js';
export type { CondensationWorkerDeps } from './condensation.worker.js';
export {
  buildEmbeddings,
  DEFAULT_EMBEDDING_BATCH_SIZE,
} from './embedding.worker.js';
export type {
  BuildEmbeddingsOptions,
  EmbeddingWorkerDeps,
} from './embedding.worker.js';
