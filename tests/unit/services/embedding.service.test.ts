/**
 * EmbeddingService Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';

import {
  composeEntryText,
  createEmbeddingQueryEncoder,
  createEmbeddingService,
  createNullQueryEncoder,
  createOpenRouterEmbeddingClient,
} from '@/services/embedding.service.js';
import type { MemoryEntry } from '@/types/index.js';

import { createFakeEmbeddingClient, createInMemoryEmbeddingDb } from '../../mocks/index.js';

function entry(id: number, title: string, content: string): MemoryEntry {
  return {
    id,
    title,
    content,
    sensitivity: 'public',
    entryType: 'note',
    version: 1,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt: new Date('2024-01-01T00:00:00.000Z'),
  };
}

describe('composeEntryText', () => {
  it('should join title and content with a blank line', () => {
    expect(composeEntryText({ title: 'Coffee', content: 'Flat white' })).toBe(
      'Coffee\n\nFlat white'
    );
  });
});

describe('EmbeddingService', () => {
  it('should store one vector per entry', async () => {
    const client = createFakeEmbeddingClient({ 'Coffee\n\nFlat white': [0.5, 0.5] });
    const db = createInMemoryEmbeddingDb();
    const service = createEmbeddingService({ client, db });

    const result = await service.embedEntries([
      entry(1, 'Coffee', 'Flat white'),
      entry(2, 'Tea', 'Green'),
    ]);

    expect(result).toEqual({ success: true, data: { stored: 2 } });
    expect(client.calls).toEqual([['Coffee\n\nFlat white', 'Tea\n\nGreen']]);
    expect(db.stored.get(1)).toEqual({
      entryId: 1,
      vector: [0.5, 0.5],
      dimension: 2,
      modelName: 'fake-embedding',
    });
    // 'Tea\n\nGreen' is 10 characters long
    expect(db.stored.get(2)?.vector).toEqual([10, 1]);
  });

  it('should not call the backend for an empty batch', async () => {
    const client = createFakeEmbeddingClient();
    const service = createEmbeddingService({ client, db: createInMemoryEmbeddingDb() });

    expect(await service.embedEntries([])).toEqual({ success: true, data: { stored: 0 } });
    expect(client.calls).toHaveLength(0);
  });

  it('should fail when the backend returns the wrong number of vectors', async () => {
    const service = createEmbeddingService({
      client: {
        createBatchEmbeddings: async () => ({
          embeddings: [[1]],
          model: 'fake-embedding',
          totalTokens: 1,
        }),
      },
      db: createInMemoryEmbeddingDb(),
    });

    const result = await service.embedEntries([entry(1, 'a', 'b'), entry(2, 'c', 'd')]);

    expect(!result.success && result.error.message).toBe(
      'Embedding provider returned a different number of vectors'
    );
  });

  it('should report backend errors', async () => {
    const service = createEmbeddingService({
      client: {
        createBatchEmbeddings: vi.fn().mockRejectedValue(new Error('rate limited')),
      },
      db: createInMemoryEmbeddingDb(),
    });

    const result = await service.embedEntries([entry(1, 'a', 'b')]);

    expect(result).toEqual({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'Failed to embed entries: rate limited' },
    });
  });

  it('should report storage errors', async () => {
    const service = createEmbeddingService({
      client: createFakeEmbeddingClient(),
      db: { upsertEmbeddings: vi.fn().mockRejectedValue(new Error('timeout')) },
    });

    const result = await service.embedEntries([entry(1, 'a', 'b')]);

    expect(!result.success && result.error.message).toBe(
      'Failed to store embeddings: timeout'
    );
  });
});

describe('query encoders', () => {
  it('should encode queries through the embedding client', async () => {
    const encoder = createEmbeddingQueryEncoder(
      createFakeEmbeddingClient({ coffee: [0.1, 0.9] })
    );

    expect(await encoder.encode(['coffee'])).toEqual([[0.1, 0.9]]);
  });

  it('should return an empty vector without a backend', async () => {
    expect(await createNullQueryEncoder().encode(['coffee'])).toEqual([]);
  });
});

describe('createOpenRouterEmbeddingClient', () => {
  it('should post the texts and parse the response', async () => {
    const requests: Array<{ url: string; init: RequestInit | undefined }> = [];
    const fakeFetch: typeof fetch = async (input, init) => {
      requests.push({ url: String(input), init });
      return new Response(
        JSON.stringify({
          data: [{ embedding: [0.1, 0.2] }],
          model: 'text-embedding-3-small',
          usage: { total_tokens: 3 },
        }),
        { status: 200 }
      );
    };
    const client = createOpenRouterEmbeddingClient('test-key', { fetch: fakeFetch });

    const result = await client.createBatchEmbeddings(['coffee'], {
      model: 'text-embedding-3-small',
      dimensions: 2,
    });

    expect(result).toEqual({
      embeddings: [[0.1, 0.2]],
      model: 'text-embedding-3-small',
      totalTokens: 3,
    });
    expect(requests[0]?.url).toBe('https://openrouter.ai/api/v1/embeddings');
    expect(requests[0]?.init?.body).toBe(
      JSON.stringify({ model: 'text-embedding-3-small', input: ['coffee'], dimensions: 2 })
    );
  });

  it('should throw on an error status', async () => {
    const client = createOpenRouterEmbeddingClient('test-key', {
      fetch: async () => new Response('quota exceeded', { status: 429 }),
    });

    await expect(client.createBatchEmbeddings(['coffee'])).rejects.toThrow(
      'Embedding API error: 429 - quota exceeded'
    );
  });

  it('should throw on an unexpected payload', async () => {
    const client = createOpenRouterEmbeddingClient('test-key', {
      fetch: async () => new Response(JSON.stringify({ result: [] }), { status: 200 }),
    });

    await expect(client.createBatchEmbeddings(['coffee'])).rejects.toThrow(
      'Embedding API returned an unexpected payload'
    );
  });
});
