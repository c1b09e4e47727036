/**
 * Memory tools: memory.search, memory.get, memory.upsert, memory.delete
 *
 * Every handler authenticates the bearer token itself, against the
 * action and sensitivity it is about to touch. Entry mutations are
 * authorized against a snapshot and then written compare-and-swap on
 * that snapshot's version, so a concurrent change between the check
 * and the write turns into a conflict instead of an unchecked write.
 */

import type {
  EntryType,
  MemoryEntry,
  MemoryEntryUpdate,
  Result,
  Sensitivity,
} from '@/types/index.js';
import {
  DEFAULT_ENTRY_TYPE,
  DEFAULT_SENSITIVITY,
  SCOPE_MEMORY_READ,
  SCOPE_MEMORY_SEARCH,
  SCOPE_MEMORY_WRITE,
  actorFromAuthContext,
  denied,
  isEntryType,
  isSensitivity,
  serializeMemoryEntry,
  serializeSearchResult,
  success,
} from '@/types/index.js';
import { allowsSensitivity } from '@/services/consent.service.js';

import { isPlainObject, pickField, readInteger } from './payload.js';
import type {
  ToolDeps,
  ToolHandler,
  ToolOutput,
  ToolPayload,
  ToolRequest,
} from './types.js';

export const DEFAULT_SEARCH_LIMIT = 10;

const VERSION_CONFLICT = 'Version conflict detected.';
const ENTRY_NOT_FOUND = 'Memory entry not found.';

function readSensitivity(
  payload: ToolPayload,
  fallback: Sensitivity
): Result<Sensitivity> {
  const value = payload.sensitivity;
  if (value === undefined || value === null) {
    return success(fallback);
  }
  return isSensitivity(value)
    ? success(value)
    : denied('Invalid sensitivity value.');
}

function readEntryType(
  payload: ToolPayload,
  fallback: EntryType
): Result<EntryType> {
  const value = payload.entry_type;
  if (value === undefined || value === null) {
    return success(fallback);
  }
  return isEntryType(value)
    ? success(value)
    : denied('Invalid entry_type value.');
}

/**
 * Fields an update payload names, each checked against its type
 */
function readEntryUpdate(payload: ToolPayload): Result<MemoryEntryUpdate> {
  const updates: MemoryEntryUpdate = {};

  if ('title' in payload) {
    if (typeof payload.title !== 'string') {
      return denied('title must be a string.');
    }
    updates.title = payload.title;
  }
  if ('content' in payload) {
    if (typeof payload.content !== 'string') {
      return denied('content must be a string.');
    }
    updates.content = payload.content;
  }
  if ('sensitivity' in payload) {
    if (!isSensitivity(payload.sensitivity)) {
      return denied('Invalid sensitivity value.');
    }
    updates.sensitivity = payload.sensitivity;
  }
  if ('entry_type' in payload) {
    if (!isEntryType(payload.entry_type)) {
      return denied('Invalid entry_type value.');
    }
    updates.entryType = payload.entry_type;
  }

  return success(updates);
}

/**
 * Map store-level outcomes of a guarded write onto tool denials
 */
function collapseWriteFailure(code: string, message: string): Result<never> {
  if (code === 'CONFLICT') {
    return denied(VERSION_CONFLICT);
  }
  if (code === 'NOT_FOUND') {
    return denied(ENTRY_NOT_FOUND);
  }
  return denied(message);
}

export function createMemoryTools(
  deps: Pick<ToolDeps, 'authenticator' | 'memory' | 'query'>
): Record<string, ToolHandler> {
  const { authenticator, memory, query } = deps;

  async function loadEntry(entryId: number): Promise<Result<MemoryEntry>> {
    const loaded = await memory.getEntry(entryId);
    return loaded.success ? loaded : denied(ENTRY_NOT_FOUND);
  }

  async function search({
    bearerToken,
    payload,
  }: ToolRequest): Promise<Result<ToolOutput>> {
    const text = pickField(payload, ['query', 'q']);
    if (typeof text !== 'string' || text.trim() === '') {
      return denied('Search query is required.');
    }

    const rawLimit = payload.limit ?? payload.k;
    const limit =
      rawLimit === undefined || rawLimit === null
        ? DEFAULT_SEARCH_LIMIT
        : readInteger(rawLimit);
    if (limit === null || limit <= 0) {
      return denied('Limit must be a positive integer.');
    }

    const parsed = await authenticator.parse(bearerToken, {
      requiredScopes: [SCOPE_MEMORY_SEARCH],
    });
    if (!parsed.success) {
      return parsed;
    }
    const context = parsed.data;

    const onBehalfOf = pickField(payload, ['user_id']);
    if (onBehalfOf !== undefined && String(onBehalfOf) !== context.subjectId) {
      return denied('Searching on behalf of another user is not permitted.');
    }

    const ranked = await query.search(context.subjectId, text, limit);
    if (!ranked.success) {
      return ranked;
    }

    const { consent } = context;
    const allowed = ranked.data
      .filter(
        (result) =>
          consent !== null && allowsSensitivity(consent, result.sensitivity)
      )
      .slice(0, limit);

    if (allowed.length > 0) {
      const permitted = await authenticator.ensurePermissions(context, {
        action: 'memory:query',
        sensitivities: allowed.map((result) => result.sensitivity),
      });
      if (!permitted.success) {
        return permitted;
      }
    }

    return success({
      user_id: context.subjectId,
      count: allowed.length,
      results: allowed.map(serializeSearchResult),
    });
  }

  async function get({
    bearerToken,
    payload,
  }: ToolRequest): Promise<Result<ToolOutput>> {
    const entryId = readInteger(pickField(payload, ['entry_id', 'id']));
    if (entryId === null) {
      return denied('entry_id must be provided as an integer.');
    }

    const entry = await loadEntry(entryId);
    if (!entry.success) {
      return entry;
    }

    const validated = await authenticator.validate(bearerToken, {
      action: 'memory:retrieve',
      requiredScopes: [SCOPE_MEMORY_READ],
      sensitivity: entry.data.sensitivity,
    });
    if (!validated.success) {
      return validated;
    }

    return success({ entry: serializeMemoryEntry(entry.data) });
  }

  async function create(
    request: ToolRequest,
    entryPayload: ToolPayload
  ): Promise<Result<ToolOutput>> {
    const sensitivity = readSensitivity(entryPayload, DEFAULT_SENSITIVITY);
    if (!sensitivity.success) {
      return sensitivity;
    }
    const entryType = readEntryType(entryPayload, DEFAULT_ENTRY_TYPE);
    if (!entryType.success) {
      return entryType;
    }

    const validated = await authenticator.validate(request.bearerToken, {
      action: 'memory:create',
      requiredScopes: [SCOPE_MEMORY_WRITE],
      sensitivity: sensitivity.data,
    });
    if (!validated.success) {
      return validated;
    }

    const { title, content } = entryPayload;
    if (typeof title !== 'string' || typeof content !== 'string') {
      return denied('title and content must be provided for new entries.');
    }

    const created = await memory.createEntry(
      actorFromAuthContext(validated.data, request.requestId),
      {
        title,
        content,
        sensitivity: sensitivity.data,
        entryType: entryType.data,
      }
    );
    if (!created.success) {
      return created;
    }

    return success({ entry_id: created.data.id, version: created.data.version });
  }

  async function update(
    request: ToolRequest,
    entryId: number,
    entryPayload: ToolPayload
  ): Promise<Result<ToolOutput>> {
    const expectedVersion = readInteger(entryPayload.version);
    if (expectedVersion === null) {
      return denied('Current version must be provided for updates.');
    }
    const updates = readEntryUpdate(entryPayload);
    if (!updates.success) {
      return updates;
    }

    const entry = await loadEntry(entryId);
    if (!entry.success) {
      return entry;
    }

    const validated = await authenticator.validate(request.bearerToken, {
      action: 'memory:update',
      requiredScopes: [SCOPE_MEMORY_WRITE],
      sensitivity: entry.data.sensitivity,
    });
    if (!validated.success) {
      return validated;
    }

    const requested = updates.data.sensitivity;
    if (requested !== undefined && requested !== entry.data.sensitivity) {
      const permitted = await authenticator.ensurePermissions(validated.data, {
        action: 'memory:update',
        sensitivity: requested,
      });
      if (!permitted.success) {
        return permitted;
      }
    }

    if (entry.data.version !== expectedVersion) {
      return denied(VERSION_CONFLICT);
    }

    const updated = await memory.updateEntry(
      actorFromAuthContext(validated.data, request.requestId),
      entryId,
      expectedVersion,
      updates.data
    );
    if (!updated.success) {
      return collapseWriteFailure(updated.error.code, updated.error.message);
    }

    return success({ entry_id: updated.data.id, version: updated.data.version });
  }

  async function upsert(request: ToolRequest): Promise<Result<ToolOutput>> {
    const entryPayload = request.payload.entry;
    if (!isPlainObject(entryPayload)) {
      return denied('entry payload must be an object.');
    }

    const rawId = entryPayload.id ?? entryPayload.entry_id;
    if (rawId === undefined || rawId === null) {
      return create(request, entryPayload);
    }

    const entryId = readInteger(rawId);
    if (entryId === null) {
      return denied('entry.id must be an integer.');
    }
    return update(request, entryId, entryPayload);
  }

  async function remove({
    bearerToken,
    payload,
    requestId,
  }: ToolRequest): Promise<Result<ToolOutput>> {
    const entryId = readInteger(pickField(payload, ['entry_id', 'id']));
    if (entryId === null) {
      return denied('entry_id must be provided as an integer.');
    }

    let expectedVersion: number | null = null;
    if (payload.version !== undefined && payload.version !== null) {
      expectedVersion = readInteger(payload.version);
      if (expectedVersion === null) {
        return denied('version must be an integer when provided.');
      }
    }

    const entry = await loadEntry(entryId);
    if (!entry.success) {
      return entry;
    }

    const validated = await authenticator.validate(bearerToken, {
      action: 'memory:delete',
      requiredScopes: [SCOPE_MEMORY_WRITE],
      sensitivity: entry.data.sensitivity,
    });
    if (!validated.success) {
      return validated;
    }

    if (expectedVersion !== null && entry.data.version !== expectedVersion) {
      return denied(VERSION_CONFLICT);
    }

    // Without a caller version, delete the snapshot that was authorized
    const deleted = await memory.deleteEntry(
      actorFromAuthContext(validated.data, requestId),
      entryId,
      entry.data.version
    );
    if (!deleted.success) {
      return collapseWriteFailure(deleted.error.code, deleted.error.message);
    }

    return success({ ok: true });
  }

  return {
    'memory.search': search,
    'memory.get': get,
    'memory.upsert': upsert,
    'memory.delete': remove,
  };
}
