/**
 * API Key Middleware
 * Admits collaborator requests carrying an active X-API-Key
 */

import type { MiddlewareHandler } from 'hono';

import type { ApiKeyService } from '@/services/api-key.service.js';

export function createApiKeyMiddleware(apiKeys: ApiKeyService): MiddlewareHandler {
  return async function apiKeyMiddleware(c, next) {
    const requestId = c.get('requestId');
    const presented = c.req.header('X-API-Key');

    const apiKey =
      presented === undefined ? null : await apiKeys.authenticate(presented);
    if (apiKey === null) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Missing or invalid API key',
            requestId,
          },
        },
        401
      );
    }

    c.set('apiKey', apiKey);
    await next();
  };
}
