/**
 * Agent Tool Types
 *
 * SCOPE: Contracts shared by the tool handlers and the dispatcher
 */

import type { Logger } from '@/lib/logger.js';
import type { ConsentService } from '@/services/consent.service.js';
import type { MemoryService } from '@/services/memory.service.js';
import type { HybridQueryService } from '@/services/query.service.js';
import type { BearerTokenAuthenticator } from '@/services/token-auth.service.js';
import type { Result } from '@/types/index.js';

/**
 * JSON object a tool call carries
 */
export type ToolPayload = Record<string, unknown>;

/**
 * JSON object a tool returns
 */
export type ToolOutput = Record<string, unknown>;

/**
 * One tool invocation, after the dispatcher has checked the payload shape
 */
export interface ToolRequest {
  bearerToken: string;
  payload: ToolPayload;
  requestId: string;
}

/**
 * Tool handler function signature
 * Every failure comes back as a Result; handlers do not throw on purpose
 */
export type ToolHandler = (request: ToolRequest) => Promise<Result<ToolOutput>>;

/**
 * Registry of tool handlers by tool name
 */
export type ToolRegistry = ReadonlyMap<string, ToolHandler>;

/**
 * Services the built-in handlers run against
 */
export interface ToolDeps {
  authenticator: BearerTokenAuthenticator;
  memory: MemoryService;
  query: HybridQueryService;
  consents: ConsentService;
}

export interface ToolDispatcherDeps {
  handlers: ToolRegistry;
  logger: Logger;
}
