/**
 * Graph route
 * Proximity ranking over the projection kept by the event bus
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { parseCandidates } from '@/api/routes/graph.js';

import { createTestApp, TEST_API_KEY } from '../../helpers/app.js';
import { createTestStack, grantWithToken, type TestStack } from '../../helpers/stack.js';
import { createTestActor, TEST_USER_ID } from '../../helpers/test-utils.js';

describe('parseCandidates', () => {
  it('should merge repeated and comma-separated values in first-seen order', () => {
    expect(parseCandidates(['3', ' 1 '], '1, 2,,3')).toEqual(['3', '1', '2']);
  });

  it('should return nothing when neither is given', () => {
    expect(parseCandidates(undefined, undefined)).toEqual([]);
    expect(parseCandidates([' '], ' , ')).toEqual([]);
  });
});

describe('graph routes', () => {
  let stack: TestStack;
  let app: Hono;

  beforeEach(async () => {
    stack = createTestStack();
    app = createTestApp(stack);
    const actor = createTestActor();
    await stack.memory.createEntry(actor, {
      title: 'Public roadmap',
      content: 'Milestones for the next quarter',
      sensitivity: 'public',
      entryType: 'note',
    });
    await stack.memory.createEntry(actor, {
      title: 'Incident postmortem',
      content: 'Operational details',
      sensitivity: 'secret',
      entryType: 'event',
    });
    await grantWithToken(stack, {
      scopes: ['memory.read'],
      sensitivityLevels: ['public'],
    });
    await stack.events.flush();
  });

  afterEach(() => {
    stack.close();
  });

  function related(query: string, headers: Record<string, string> = { 'X-API-Key': TEST_API_KEY }) {
    return app.request(`/api/v1/graph/related?${query}`, { headers });
  }

  it('should rank entries under a granted sensitivity above the rest', async () => {
    const res = await related(
      `node_type=user&reference_id=${TEST_USER_ID}&candidate=2&candidate=1`
    );
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      data: {
        node: { node_type: 'user', reference_id: TEST_USER_ID },
        count: 2,
        results: [
          { node_type: 'memory_entry', reference_id: '1', score: 0.105 },
          { node_type: 'memory_entry', reference_id: '2', score: 0 },
        ],
      },
    });
  });

  it('should accept comma-separated candidates and a limit', async () => {
    const res = await related(
      `node_type=user&reference_id=${TEST_USER_ID}&candidates=2,1&limit=1`
    );
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      data: { count: 1, results: [{ reference_id: '1' }] },
    });
  });

  it('should answer an unknown anchor with no results', async () => {
    const res = await related('node_type=user&reference_id=nobody&candidate=1');
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ data: { node: null, count: 0, results: [] } });
  });

  it('should stop ranking an entry once it is deleted', async () => {
    await stack.memory.deleteEntry(createTestActor(), 1, 1);
    await stack.events.flush();

    const res = await related(
      `node_type=user&reference_id=${TEST_USER_ID}&candidate=1&candidate=2`
    );
    const body: unknown = await res.json();

    expect(body).toMatchObject({
      data: { count: 1, results: [{ reference_id: '2', score: 0 }] },
    });
  });

  it('should require the anchor', async () => {
    const res = await related('reference_id=1&candidate=1');
    const body: unknown = await res.json();

    expect(res.status).toBe(400);
    expect(body).toMatchObject({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'node_type and reference_id are required.',
      },
    });
  });

  it('should reject a limit that is not a positive integer', async () => {
    const res = await related(
      `node_type=user&reference_id=${TEST_USER_ID}&candidate=1&limit=0`
    );
    const body: unknown = await res.json();

    expect(res.status).toBe(400);
    expect(body).toMatchObject({
      error: { message: 'limit must be a positive integer.' },
    });
  });

  it('should require at least one candidate', async () => {
    const res = await related(`node_type=user&reference_id=${TEST_USER_ID}`);
    const body: unknown = await res.json();

    expect(res.status).toBe(400);
    expect(body).toMatchObject({
      error: { message: 'At least one candidate reference must be provided.' },
    });
  });

  it('should sit behind the API key gate', async () => {
    const res = await related(`node_type=user&reference_id=${TEST_USER_ID}&candidate=1`, {});

    expect(res.status).toBe(401);
  });
});
