/**
 * Tool dispatcher and manifest
 */

import { describe, it, expect } from 'vitest';

import { createToolDispatcher } from '@/tools/dispatcher.js';
import { buildManifest, PROTOCOL_VERSION, SERVER_LABEL } from '@/tools/manifest.js';
import type { ToolHandler } from '@/tools/types.js';
import { failure, success } from '@/types/index.js';

import { createTestStack } from '../../helpers/stack.js';
import { createSilentLogger } from '../../mocks/index.js';

function dispatcherWith(handlers: Record<string, ToolHandler>) {
  return createToolDispatcher({
    handlers: new Map(Object.entries(handlers)),
    logger: createSilentLogger(),
  });
}

const context = { requestId: 'req-test' };

describe('createToolDispatcher', () => {
  it('should pass the request through to the handler', async () => {
    const dispatcher = dispatcherWith({
      echo: async (request) =>
        success({ token: request.bearerToken, payload: request.payload, id: request.requestId }),
    });

    const result = await dispatcher.execute('echo', 'abc', { a: 1 }, context);

    expect(result).toEqual({
      success: true,
      data: { token: 'abc', payload: { a: 1 }, id: 'req-test' },
    });
  });

  it('should deny unknown tools', async () => {
    const result = await dispatcherWith({}).execute('memory.purge', '', {}, context);

    expect(result).toEqual({
      success: false,
      error: { code: 'PERMISSION_DENIED', message: 'Unknown tool: memory.purge' },
    });
  });

  it('should deny payloads that are not objects', async () => {
    const dispatcher = dispatcherWith({ echo: async () => success({}) });

    for (const payload of [null, [1, 2], 'text', 5]) {
      const result = await dispatcher.execute('echo', '', payload, context);
      expect(!result.success && result.error.message).toBe(
        'Tool payload must be a JSON object.'
      );
    }
  });

  it('should collapse every failure code into PERMISSION_DENIED', async () => {
    const dispatcher = dispatcherWith({
      missing: async () => failure('NOT_FOUND', 'Memory entry not found'),
      broken: async () => failure('INTERNAL_ERROR', 'Failed to load memory entry'),
    });

    expect(await dispatcher.execute('missing', '', {}, context)).toEqual({
      success: false,
      error: { code: 'PERMISSION_DENIED', message: 'Memory entry not found' },
    });
    expect(await dispatcher.execute('broken', '', {}, context)).toEqual({
      success: false,
      error: { code: 'PERMISSION_DENIED', message: 'Failed to load memory entry' },
    });
  });

  it('should deny when a handler throws', async () => {
    const dispatcher = dispatcherWith({
      explode: async () => {
        throw new Error('unexpected');
      },
    });

    expect(await dispatcher.execute('explode', '', {}, context)).toEqual({
      success: false,
      error: { code: 'PERMISSION_DENIED', message: 'Tool execution failed.' },
    });
  });

  it('should list the built-in tools', () => {
    const stack = createTestStack();
    try {
      expect([...stack.dispatcher.toolNames].sort()).toEqual([
        'consent.grant',
        'consent.revoke',
        'memory.delete',
        'memory.get',
        'memory.search',
        'memory.upsert',
      ]);
    } finally {
      stack.close();
    }
  });
});

describe('buildManifest', () => {
  const manifest = buildManifest();

  it('should describe the server and its auth', () => {
    expect(manifest.server_label).toBe(SERVER_LABEL);
    expect(manifest.protocol_version).toBe(PROTOCOL_VERSION);
    expect(manifest.auth).toEqual({ type: 'oauth2-bearer' });
  });

  it('should advertise the same tools the dispatcher serves', () => {
    expect(manifest.tools.map((tool) => tool.name)).toEqual([
      'memory.search',
      'memory.get',
      'memory.upsert',
      'memory.delete',
      'consent.grant',
      'consent.revoke',
    ]);
  });

  it('should give memory.search a default limit of 10', () => {
    const search = manifest.tools.find((tool) => tool.name === 'memory.search');
    expect(search?.input_schema.properties?.limit).toEqual({
      type: 'integer',
      minimum: 1,
      default: 10,
    });
    expect(search?.input_schema.required).toEqual(['query']);
  });
});
