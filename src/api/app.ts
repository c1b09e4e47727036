/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import type { Logger } from '@/lib/logger.js';
import type { ApiKeyService } from '@/services/api-key.service.js';
import type { GraphService } from '@/services/graph.service.js';
import type { MemoryService } from '@/services/memory.service.js';
import type { PolicyEngine } from '@/services/policy.service.js';
import type { HybridQueryService } from '@/services/query.service.js';
import type { SubjectDirectory } from '@/services/token-auth.service.js';
import type { ToolDispatcher } from '@/tools/dispatcher.js';
import { buildManifest } from '@/tools/manifest.js';

import { createApiKeyMiddleware } from './middleware/api-key.js';
import type { RateLimiter } from './middleware/rateLimit.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import { createRequestContextMiddleware } from './middleware/request-context.js';
import { createGraphRoutes } from './routes/graph.js';
import { createHealthRoutes } from './routes/health.js';
import { createMcpRoutes } from './routes/mcp.js';
import { createMemoryEntryRoutes } from './routes/memory-entries.js';
import { createMemoryQueryRoutes } from './routes/memory-query.js';

/**
 * Services the HTTP layer delegates to
 */
export interface ApiServices {
  memory: MemoryService;
  policy: PolicyEngine;
  subjects: SubjectDirectory;
  query: HybridQueryService;
  graph: GraphService;
  apiKeys: ApiKeyService;
  dispatcher: ToolDispatcher;
}

/**
 * App configuration
 */
export interface AppDeps {
  services: ApiServices;
  rateLimiter: RateLimiter;
  logger: Logger;
  allowedOrigins?: string[];
  version?: string;
}

/**
 * Create the main Hono application
 */
export function createApp(deps: AppDeps): Hono {
  const { services, rateLimiter } = deps;
  const log = deps.logger.child({ component: 'http' });
  const app = new Hono();

  // Global middleware
  app.use('*', requestLogger((message) => log.info(message)));
  app.use(
    '*',
    cors({
      origin: deps.allowedOrigins ?? ['http://localhost:3000'],
      allowHeaders: [
        'Content-Type',
        'Authorization',
        'X-API-Key',
        'X-Subject-ID',
        'X-Agent-ID',
        'If-Match',
      ],
      exposeHeaders: ['ETag', 'X-Request-ID', 'Retry-After'],
    })
  );
  app.use('*', createRequestContextMiddleware());

  // Public routes (no API key). Registered before the gate, so the
  // health handler answers without reaching it.
  app.route('/api/v1', createHealthRoutes({ version: deps.version ?? 'v1' }));

  // Collaborator gate for everything else under /api/v1
  app.use('/api/v1/*', createApiKeyMiddleware(services.apiKeys));
  app.use('/api/v1/*', createRateLimitMiddleware(rateLimiter));

  app.route(
    '/api/v1',
    createMcpRoutes({
      dispatcher: services.dispatcher,
      manifest: buildManifest(),
    })
  );
  app.route(
    '/api/v1',
    createMemoryEntryRoutes({
      memory: services.memory,
      policy: services.policy,
      subjects: services.subjects,
    })
  );
  app.route(
    '/api/v1',
    createMemoryQueryRoutes({
      query: services.query,
      policy: services.policy,
      subjects: services.subjects,
    })
  );
  app.route('/api/v1', createGraphRoutes({ graph: services.graph }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId'),
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId');
    log.error({ err, requestId }, 'Unhandled error');

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
