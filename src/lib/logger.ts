/**
 * Shared pino logger
 * Components take a child: logger.child({ component: 'webhooks' })
 */

import pino, { type Logger } from 'pino';

function resolveLevel(): string {
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return process.env.LOG_LEVEL ?? 'info';
}

function createLogger(): Logger {
  if (process.env.NODE_ENV === 'development') {
    return pino({
      level: resolveLevel(),
      transport: { target: 'pino-pretty', options: { colorize: true } },
    });
  }
  return pino({ level: resolveLevel() });
}

export const logger = createLogger();

export type { Logger };
