/**
 * Capability manifest advertised to agents
 */

export const SERVER_LABEL = 'memory-vault-mcp';
export const PROTOCOL_VERSION = '2024-05-01';

export interface JsonSchema {
  type: string;
  required?: readonly string[];
  properties?: Readonly<Record<string, JsonSchema>>;
  items?: JsonSchema;
  minimum?: number;
  default?: unknown;
}

export interface ToolDescriptor {
  name: string;
  input_schema: JsonSchema;
  output_schema: JsonSchema;
}

export interface ToolManifest {
  server_label: string;
  protocol_version: string;
  tools: ToolDescriptor[];
  auth: { type: 'oauth2-bearer' };
}

const objectSchema: JsonSchema = { type: 'object' };
const stringList: JsonSchema = { type: 'array', items: { type: 'string' } };

export function buildManifest(): ToolManifest {
  return {
    server_label: SERVER_LABEL,
    protocol_version: PROTOCOL_VERSION,
    tools: [
      {
        name: 'memory.search',
        input_schema: {
          type: 'object',
          required: ['query'],
          properties: {
            user_id: { type: 'string' },
            query: { type: 'string' },
            limit: { type: 'integer', minimum: 1, default: 10 },
          },
        },
        output_schema: {
          type: 'object',
          properties: {
            user_id: { type: 'string' },
            count: { type: 'integer' },
            results: { type: 'array', items: objectSchema },
          },
        },
      },
      {
        name: 'memory.get',
        input_schema: {
          type: 'object',
          required: ['entry_id'],
          properties: { entry_id: { type: 'integer' } },
        },
        output_schema: {
          type: 'object',
          properties: { entry: objectSchema },
        },
      },
      {
        name: 'memory.upsert',
        input_schema: {
          type: 'object',
          required: ['entry'],
          properties: { entry: objectSchema },
        },
        output_schema: {
          type: 'object',
          properties: {
            entry_id: { type: 'integer' },
            version: { type: 'integer' },
          },
        },
      },
      {
        name: 'memory.delete',
        input_schema: {
          type: 'object',
          required: ['entry_id'],
          properties: {
            entry_id: { type: 'integer' },
            version: { type: 'integer' },
          },
        },
        output_schema: {
          type: 'object',
          properties: { ok: { type: 'boolean' } },
        },
      },
      {
        name: 'consent.grant',
        input_schema: {
          type: 'object',
          required: ['user_id', 'agent_identifier', 'scopes', 'sensitivity_levels'],
          properties: {
            user_id: { type: 'string' },
            agent_identifier: { type: 'string' },
            scopes: stringList,
            sensitivity_levels: stringList,
          },
        },
        output_schema: {
          type: 'object',
          properties: {
            consent_id: { type: 'integer' },
            version: { type: 'integer' },
          },
        },
      },
      {
        name: 'consent.revoke',
        input_schema: {
          type: 'object',
          required: ['consent_id'],
          properties: { consent_id: { type: 'integer' } },
        },
        output_schema: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            status: { type: 'string' },
          },
        },
      },
    ],
    auth: { type: 'oauth2-bearer' },
  };
}
