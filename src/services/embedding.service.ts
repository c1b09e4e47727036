/**
 * EmbeddingService Implementation
 *
 * SCOPE: Vector embeddings for memory entries and search queries
 * Uses OpenAI text-embedding-3-small via OpenRouter by default
 *
 * GUARDRAILS:
 * - Outbound calls are bounded by a timeout
 * - Provider responses are schema-checked before use
 */

import { z } from 'zod';

import { OUTBOUND_TIMEOUT_MS } from '@/lib/config.js';
import type {
  BatchEmbeddingResult,
  EmbeddingConfig,
  MemoryEmbedding,
  MemoryEntry,
  QueryEncoder,
  Result,
} from '@/types/index.js';
import { DEFAULT_EMBEDDING_CONFIG, failure, success } from '@/types/index.js';

/**
 * Embedding client interface (abstraction over OpenAI/OpenRouter)
 */
export interface EmbeddingServiceClient {
  createBatchEmbeddings: (
    texts: string[],
    config?: EmbeddingConfig
  ) => Promise<BatchEmbeddingResult>;
}

/**
 * Storage for entry vectors
 */
export interface EmbeddingServiceDb {
  upsertEmbeddings: (embeddings: MemoryEmbedding[]) => Promise<number>;
}

/**
 * EmbeddingService interface
 */
export interface EmbeddingService {
  /** Embed entries and store one vector per entry */
  embedEntries(entries: MemoryEntry[]): Promise<Result<{ stored: number }>>;
}

/**
 * Text an entry is embedded from
 */
export function composeEntryText(entry: Pick<MemoryEntry, 'title' | 'content'>): string {
  return `${entry.title}\n\n${entry.content}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Create EmbeddingService instance
 */
export function createEmbeddingService(deps: {
  client: EmbeddingServiceClient;
  db: EmbeddingServiceDb;
  config?: EmbeddingConfig;
}): EmbeddingService {
  const { client, db } = deps;
  const config = deps.config ?? DEFAULT_EMBEDDING_CONFIG;

  return {
    async embedEntries(
      entries: MemoryEntry[]
    ): Promise<Result<{ stored: number }>> {
      if (entries.length === 0) {
        return success({ stored: 0 });
      }

      let batch: BatchEmbeddingResult;
      try {
        batch = await client.createBatchEmbeddings(
          entries.map(composeEntryText),
          config
        );
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to embed entries: ${describeError(error)}`
        );
      }

      if (batch.embeddings.length !== entries.length) {
        return failure(
          'INTERNAL_ERROR',
          'Embedding provider returned a different number of vectors'
        );
      }

      const records: MemoryEmbedding[] = entries.map((entry, index) => {
        const vector = batch.embeddings[index] ?? [];
        return {
          entryId: entry.id,
          vector,
          dimension: vector.length,
          modelName: batch.model,
        };
      });

      try {
        const stored = await db.upsertEmbeddings(records);
        return success({ stored });
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to store embeddings: ${describeError(error)}`
        );
      }
    },
  };
}

/**
 * Query encoder backed by an embedding client
 */
export function createEmbeddingQueryEncoder(
  client: EmbeddingServiceClient,
  config: EmbeddingConfig = DEFAULT_EMBEDDING_CONFIG
): QueryEncoder {
  return {
    async encode(texts: string[]): Promise<unknown> {
      const result = await client.createBatchEmbeddings(texts, config);
      return result.embeddings;
    },
  };
}

/**
 * Encoder used when no embedding backend is configured.
 * An empty vector makes the query service rank on text alone.
 */
export function createNullQueryEncoder(): QueryEncoder {
  return {
    async encode(): Promise<unknown> {
      return [];
    },
  };
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
  model: z.string(),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

type EmbeddingResponse = z.infer<typeof embeddingResponseSchema>;

/**
 * Create OpenAI/OpenRouter embedding client
 * This connects to OpenRouter which provides OpenAI-compatible API
 */
export function createOpenRouterEmbeddingClient(
  apiKey: string,
  options: { timeoutMs?: number; fetch?: typeof fetch } = {}
): EmbeddingServiceClient {
  const baseUrl = 'https://openrouter.ai/api/v1';
  const timeoutMs = options.timeoutMs ?? OUTBOUND_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;

  async function callEmbeddingAPI(
    input: string[],
    config: EmbeddingConfig
  ): Promise<EmbeddingResponse> {
    const response = await fetchImpl(`${baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
        'X-Title': 'memory-vault',
      },
      body: JSON.stringify({
        model: config.model,
        input,
        dimensions: config.dimensions,
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Embedding API error: ${response.status} - ${error}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Embedding API returned an unexpected payload');
    }
    return parsed.data;
  }

  return {
    async createBatchEmbeddings(
      texts: string[],
      config: EmbeddingConfig = DEFAULT_EMBEDDING_CONFIG
    ): Promise<BatchEmbeddingResult> {
      const result = await callEmbeddingAPI(texts, config);
      return {
        embeddings: result.data.map((d) => d.embedding),
        model: result.model,
        totalTokens: result.usage?.total_tokens ?? 0,
      };
    },
  };
}
