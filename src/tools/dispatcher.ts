/**
 * Tool Dispatcher
 *
 * Routes a tool call to its handler and collapses every failure into a
 * single PERMISSION_DENIED, so callers cannot tell "not found" from
 * "forbidden". The specific reason is logged, not returned.
 */

import type { Result } from '@/types/index.js';
import { denied } from '@/types/index.js';

import { createConsentTools } from './consent.tools.js';
import { createMemoryTools } from './memory.tools.js';
import { isPlainObject } from './payload.js';
import type {
  ToolDeps,
  ToolDispatcherDeps,
  ToolOutput,
  ToolRegistry,
} from './types.js';

export interface ToolDispatcher {
  readonly toolNames: readonly string[];
  execute(
    name: string,
    bearerToken: string,
    payload: unknown,
    context: { requestId: string }
  ): Promise<Result<ToolOutput>>;
}

/**
 * The fixed registry of built-in tools
 */
export function createToolRegistry(deps: ToolDeps): ToolRegistry {
  return new Map(
    Object.entries({
      ...createMemoryTools(deps),
      ...createConsentTools(deps),
    })
  );
}

export function createToolDispatcher(deps: ToolDispatcherDeps): ToolDispatcher {
  const { handlers } = deps;
  const log = deps.logger.child({ component: 'tools' });

  return {
    toolNames: [...handlers.keys()],

    async execute(
      name: string,
      bearerToken: string,
      payload: unknown,
      context: { requestId: string }
    ): Promise<Result<ToolOutput>> {
      const handler = handlers.get(name);
      if (handler === undefined) {
        return denied(`Unknown tool: ${name}`);
      }
      if (!isPlainObject(payload)) {
        return denied('Tool payload must be a JSON object.');
      }

      let result: Result<ToolOutput>;
      try {
        result = await handler({
          bearerToken,
          payload,
          requestId: context.requestId,
        });
      } catch (error) {
        log.error({ err: error, tool: name, requestId: context.requestId }, 'Tool handler threw');
        return denied('Tool execution failed.');
      }

      if (!result.success) {
        log.info(
          {
            tool: name,
            requestId: context.requestId,
            code: result.error.code,
            reason: result.error.message,
          },
          'Tool call denied'
        );
        return denied(result.error.message);
      }
      return result;
    },
  };
}
