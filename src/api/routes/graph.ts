/**
 * Graph Route
 * Ranks candidate nodes by their proximity to an anchor node
 */

import { Hono } from 'hono';
import { z } from 'zod';

import {
  DEFAULT_RELATED_LIMIT,
  MAX_RELATED_LIMIT,
  type GraphService,
} from '@/services/graph.service.js';
import { GRAPH_NODE_TYPES } from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

interface GraphRoutesDeps {
  graph: GraphService;
}

const relatedSchema = z.object({
  node_type: z.enum(GRAPH_NODE_TYPES, {
    errorMap: () => ({ message: 'node_type and reference_id are required.' }),
  }),
  reference_id: z
    .string({ required_error: 'node_type and reference_id are required.' })
    .trim()
    .min(1, 'node_type and reference_id are required.'),
  candidate_type: z
    .enum(GRAPH_NODE_TYPES, {
      errorMap: () => ({ message: 'Unknown candidate_type.' }),
    })
    .default('memory_entry'),
  limit: z.coerce
    .number({ invalid_type_error: 'limit must be a positive integer.' })
    .int('limit must be a positive integer.')
    .positive('limit must be a positive integer.')
    .default(DEFAULT_RELATED_LIMIT)
    .transform((limit) => Math.min(limit, MAX_RELATED_LIMIT)),
});

/**
 * Repeated ?candidate= values and comma-separated ?candidates=, trimmed and
 * deduplicated in first-seen order
 */
export function parseCandidates(
  repeated: string[] | undefined,
  joined: string | undefined
): string[] {
  const values = [...(repeated ?? []), ...(joined?.split(',') ?? [])];
  return [
    ...new Set(values.map((value) => value.trim()).filter((value) => value !== '')),
  ];
}

export function createGraphRoutes(deps: GraphRoutesDeps): Hono {
  const { graph } = deps;
  const app = new Hono();

  /**
   * GET /graph/related
   */
  app.get('/graph/related', async (c) => {
    const requestId = c.get('requestId');

    const validation = relatedSchema.safeParse({
      node_type: c.req.query('node_type'),
      reference_id: c.req.query('reference_id'),
      candidate_type: c.req.query('candidate_type'),
      limit: c.req.query('limit'),
    });
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
    const params = validation.data;

    const related = await graph.related({
      anchor: { nodeType: params.node_type, referenceId: params.reference_id },
      candidateType: params.candidate_type,
      candidates: parseCandidates(
        c.req.queries('candidate'),
        c.req.query('candidates')
      ),
      limit: params.limit,
    });
    if (!related.success) {
      return errorResponse(c, related.error, requestId);
    }

    const { node, count, results } = related.data;
    return successResponse(
      c,
      {
        node:
          node === null
            ? null
            : { id: node.id, node_type: node.nodeType, reference_id: node.referenceId },
        count,
        results: results.map((result) => ({
          id: result.id,
          node_type: result.nodeType,
          reference_id: result.referenceId,
          score: result.score,
        })),
      },
      requestId
    );
  });

  return app;
}
