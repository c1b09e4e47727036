/**
 * Memory Query Route
 * Hybrid search for collaborators. Results outside the agent's consented
 * sensitivity levels are dropped, and the payload is DLP-sanitized.
 */

import { Hono } from 'hono';
import { z } from 'zod';

import { sanitizeOutput } from '@/lib/dlp.js';
import { allowsSensitivity } from '@/services/consent.service.js';
import type { PolicyEngine } from '@/services/policy.service.js';
import type { HybridQueryService } from '@/services/query.service.js';
import type { SubjectDirectory } from '@/services/token-auth.service.js';
import { serializeSearchResult } from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

interface MemoryQueryRoutesDeps {
  query: HybridQueryService;
  policy: PolicyEngine;
  subjects: SubjectDirectory;
}

export const DEFAULT_QUERY_LIMIT = 10;

const querySchema = z.object({
  query: z
    .string({ required_error: 'Query text is required.' })
    .trim()
    .min(1, 'Query text is required.'),
  limit: z
    .number({ invalid_type_error: 'Limit must be a positive integer.' })
    .int('Limit must be a positive integer.')
    .positive('Limit must be a positive integer.')
    .default(DEFAULT_QUERY_LIMIT),
});

export function createMemoryQueryRoutes(deps: MemoryQueryRoutesDeps): Hono {
  const { query, policy, subjects } = deps;
  const app = new Hono();

  /**
   * POST /memory/query/:userId
   */
  app.post('/memory/query/:userId', async (c) => {
    const requestId = c.get('requestId');

    const subject = await subjects.findSubject(c.req.param('userId'));
    if (subject === null) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Subject not found.' },
        requestId
      );
    }

    const agentIdentifier = c.req.header('X-Agent-ID')?.trim();
    if (agentIdentifier === undefined || agentIdentifier === '') {
      return errorResponse(
        c,
        { code: 'PERMISSION_DENIED', message: 'X-Agent-ID header is required.' },
        requestId
      );
    }

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Invalid JSON body.' },
        requestId
      );
    }

    const validation = querySchema.safeParse(rawBody);
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid query',
        },
        requestId
      );
    }
    const body = validation.data;

    const decision = await policy.enforce({
      subjectId: subject.id,
      agentIdentifier,
      action: 'memory:query',
    });
    if (!decision.success) {
      return errorResponse(c, decision.error, requestId);
    }

    const ranked = await query.search(subject.id, body.query, body.limit);
    if (!ranked.success) {
      return errorResponse(c, ranked.error, requestId);
    }

    const { consent } = decision.data;
    const results = ranked.data
      .filter((result) => allowsSensitivity(consent, result.sensitivity))
      .map(serializeSearchResult);

    // Subject ids are UUIDs, whose digit runs the card-number rule matches
    return successResponse(
      c,
      {
        user_id: subject.id,
        count: results.length,
        results: sanitizeOutput(results),
      },
      requestId
    );
  });

  return app;
}
