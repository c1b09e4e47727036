/**
 * Request Context Middleware
 * Assigns every request an id, exposed to handlers and echoed in X-Request-ID
 */

import type { MiddlewareHandler } from 'hono';
import { nanoid } from 'nanoid';

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

export function createRequestContextMiddleware(): MiddlewareHandler {
  return async function requestContextMiddleware(c, next) {
    const requestId = generateRequestId();
    c.set('requestId', requestId);
    c.header('X-Request-ID', requestId);
    await next();
  };
}
