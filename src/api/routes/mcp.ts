/**
 * Agent Tool Routes
 * Manifest discovery and tool invocation over HTTP
 *
 * A failed call always answers 403 with the same body. The dispatcher has
 * already logged the specific reason.
 */

import { Hono } from 'hono';

import type { ToolDispatcher } from '@/tools/dispatcher.js';
import type { ToolManifest } from '@/tools/manifest.js';

import { successResponse } from '../utils/response.js';

interface McpRoutesDeps {
  dispatcher: ToolDispatcher;
  manifest: ToolManifest;
}

export function createMcpRoutes(deps: McpRoutesDeps): Hono {
  const { dispatcher, manifest } = deps;
  const app = new Hono();

  /**
   * GET /mcp/manifest
   */
  app.get('/mcp/manifest', (c) => {
    return c.json(manifest);
  });

  /**
   * POST /mcp/tools/:name
   * Bearer token in Authorization, payload as the JSON body
   */
  app.post('/mcp/tools/:name', async (c) => {
    const requestId = c.get('requestId');

    const permissionDenied = () =>
      c.json(
        {
          error: {
            code: 'PERMISSION_DENIED',
            message: 'Permission denied',
            requestId,
          },
        },
        403
      );

    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      return permissionDenied();
    }

    const result = await dispatcher.execute(
      c.req.param('name'),
      c.req.header('Authorization') ?? '',
      payload,
      { requestId }
    );
    if (!result.success) {
      return permissionDenied();
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
