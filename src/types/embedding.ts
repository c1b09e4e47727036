/**
 * Embedding Types
 *
 * SCOPE: Vector generation for entries and search queries
 */

/**
 * Embedding configuration
 */
export interface EmbeddingConfig {
  model: string;
  dimensions: number;
}

export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  model: 'text-embedding-3-small',
  dimensions: 1536,
};

/**
 * Batch embedding result
 */
export interface BatchEmbeddingResult {
  /** Embeddings in same order as input texts */
  embeddings: number[][];
  model: string;
  totalTokens: number;
}

/**
 * Pluggable query encoder.
 * Backends return whatever shape they natively produce (nested arrays,
 * typed arrays, tensors exposing tolist()); the query service coerces it.
 */
export interface QueryEncoder {
  encode(texts: string[]): Promise<unknown>;
}
