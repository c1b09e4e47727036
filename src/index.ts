/**
 * memory-vault Application Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { createContainer } from './container.js';
import { loadConfig } from './lib/config.js';
import { logger } from './lib/logger.js';

const config = loadConfig();
const container = createContainer(config, logger);

const app = createApp({
  services: {
    memory: container.memory,
    policy: container.policy,
    subjects: container.subjects,
    query: container.query,
    graph: container.graph,
    apiKeys: container.apiKeys,
    dispatcher: container.dispatcher,
  },
  rateLimiter: container.rateLimiter,
  logger,
  allowedOrigins: config.allowedOrigins,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, env: config.env }, 'Server started');
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    container.lexicalIndex.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app };
