/**
 * Agent Tool Exports
 *
 * Tools are the agent-facing surface: one JSON payload per call plus a
 * bearer token, answered with a JSON object or a uniform denial.
 */

export type {
  ToolPayload,
  ToolOutput,
  ToolRequest,
  ToolHandler,
  ToolRegistry,
  ToolDeps,
  ToolDispatcherDeps,
} from './types.js';

export { createToolDispatcher, createToolRegistry } from './dispatcher.js';
export type { ToolDispatcher } from './dispatcher.js';

export { createMemoryTools, DEFAULT_SEARCH_LIMIT } from './memory.tools.js';
export { createConsentTools } from './consent.tools.js';

export {
  buildManifest,
  SERVER_LABEL,
  PROTOCOL_VERSION,
} from './manifest.js';
export type { ToolManifest, ToolDescriptor, JsonSchema } from './manifest.js';
