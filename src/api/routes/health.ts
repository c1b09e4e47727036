/**
 * Health Route
 * Public liveness check, mounted ahead of the API-key gate
 */

import { Hono } from 'hono';

export interface HealthRoutesDeps {
  version: string;
  now?: () => Date;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const now = deps.now ?? (() => new Date());
  const app = new Hono();

  /**
   * GET /health
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'memory-vault',
      timestamp: now().toISOString(),
      version: deps.version,
    });
  });

  return app;
}
