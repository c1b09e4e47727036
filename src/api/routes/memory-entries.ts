/**
 * Memory Entry Routes
 * Collaborator-facing resource API over memory entries
 *
 * X-Subject-ID and X-Agent-ID name the user and agent the policy engine
 * checks. Writes use optimistic concurrency: the entry version travels
 * as a quoted ETag and must come back in If-Match.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { MemoryService } from '@/services/memory.service.js';
import type { PolicyEngine } from '@/services/policy.service.js';
import type { SubjectDirectory } from '@/services/token-auth.service.js';
import type { MemoryEntry, MemoryEntryUpdate } from '@/types/index.js';
import {
  ENTRY_TYPES,
  SENSITIVITY_LEVELS,
  isEntryType,
  isSensitivity,
  serializeMemoryEntry,
} from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

interface MemoryEntryRoutesDeps {
  memory: MemoryService;
  policy: PolicyEngine;
  subjects: SubjectDirectory;
}

interface Principal {
  subjectId: string;
  agentIdentifier: string;
}

const MISSING_FIELDS = 'Missing required fields: title, content.';

// Zod Schemas
const createSchema = z.object({
  title: z
    .string({ required_error: MISSING_FIELDS })
    .min(1, MISSING_FIELDS),
  content: z
    .string({ required_error: MISSING_FIELDS })
    .min(1, MISSING_FIELDS),
  sensitivity: z.enum(SENSITIVITY_LEVELS).default('public'),
  entry_type: z.enum(ENTRY_TYPES).default('note'),
});

const replaceSchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
  sensitivity: z.enum(SENSITIVITY_LEVELS),
  entry_type: z.enum(ENTRY_TYPES),
});

const patchSchema = z
  .object({
    title: z.string().min(1).optional(),
    content: z.string().min(1).optional(),
    sensitivity: z.enum(SENSITIVITY_LEVELS).optional(),
    entry_type: z.enum(ENTRY_TYPES).optional(),
  })
  .refine((body) => Object.keys(body).length > 0, {
    message: 'No fields to update.',
  });

type EntryBody = z.infer<typeof patchSchema>;

/**
 * Parse `"3"` (or bare 3, or W/"3") into a version number
 */
export function parseIfMatch(header: string | undefined): number | null {
  if (header === undefined) {
    return null;
  }
  const value = header.trim().replace(/^W\//, '').replace(/^"(.*)"$/, '$1');
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

function formatEtag(version: number): string {
  return `"${version}"`;
}

const conflictDetailsSchema = z.object({ currentVersion: z.number().int() });

/**
 * Version the store reported on a lost write, when it reported one
 */
function currentVersionOf(details: unknown): number | null {
  const parsed = conflictDetailsSchema.safeParse(details);
  return parsed.success ? parsed.data.currentVersion : null;
}

function parseEntryId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : null;
}

function toUpdate(body: EntryBody): MemoryEntryUpdate {
  return {
    ...(body.title !== undefined && { title: body.title }),
    ...(body.content !== undefined && { content: body.content }),
    ...(body.sensitivity !== undefined && { sensitivity: body.sensitivity }),
    ...(body.entry_type !== undefined && { entryType: body.entry_type }),
  };
}

function formatListItem(entry: MemoryEntry): {
  id: number;
  title: string;
  sensitivity: string;
  entry_type: string;
  version: number;
  updated_at: string;
} {
  return {
    id: entry.id,
    title: entry.title,
    sensitivity: entry.sensitivity,
    entry_type: entry.entryType,
    version: entry.version,
    updated_at: entry.updatedAt.toISOString(),
  };
}

/**
 * Create memory entry routes
 */
export function createMemoryEntryRoutes(deps: MemoryEntryRoutesDeps): Hono {
  const { memory, policy, subjects } = deps;
  const app = new Hono();

  /**
   * Resolve the acting principal, or the response that ends the request
   */
  async function resolvePrincipal(
    c: Context
  ): Promise<Principal | Response> {
    const requestId = c.get('requestId');
    const subjectId = c.req.header('X-Subject-ID')?.trim();
    const agentIdentifier = c.req.header('X-Agent-ID')?.trim();

    if (
      subjectId === undefined ||
      subjectId === '' ||
      agentIdentifier === undefined ||
      agentIdentifier === ''
    ) {
      return errorResponse(
        c,
        {
          code: 'PERMISSION_DENIED',
          message: 'X-Subject-ID and X-Agent-ID headers are required.',
        },
        requestId
      );
    }

    const subject = await subjects.findSubject(subjectId);
    if (subject === null) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Subject not found.' },
        requestId
      );
    }

    return { subjectId: subject.id, agentIdentifier };
  }

  async function readJson(c: Context): Promise<unknown> {
    try {
      return await c.req.json();
    } catch {
      return undefined;
    }
  }

  function validationError(c: Context, message: string): Response {
    return errorResponse(
      c,
      { code: 'VALIDATION_ERROR', message },
      c.get('requestId')
    );
  }

  /**
   * Load the entry a path refers to, or the 404 response
   */
  async function loadEntry(c: Context): Promise<MemoryEntry | Response> {
    const requestId = c.get('requestId');
    const entryId = parseEntryId(c.req.param('id') ?? '');
    if (entryId === null) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Memory entry not found' },
        requestId
      );
    }

    const loaded = await memory.getEntry(entryId);
    if (!loaded.success) {
      return errorResponse(c, loaded.error, requestId);
    }
    return loaded.data;
  }

  function preconditionRequired(c: Context): Response {
    return errorResponse(
      c,
      {
        code: 'PRECONDITION_REQUIRED',
        message: 'Missing or invalid If-Match header.',
      },
      c.get('requestId')
    );
  }

  function preconditionFailed(c: Context, currentVersion: number): Response {
    c.header('ETag', formatEtag(currentVersion));
    return errorResponse(
      c,
      { code: 'PRECONDITION_FAILED', message: 'Version conflict.' },
      c.get('requestId')
    );
  }

  /**
   * GET /memory/entries
   */
  app.get('/memory/entries', async (c) => {
    const requestId = c.get('requestId');
    const principal = await resolvePrincipal(c);
    if (principal instanceof Response) {
      return principal;
    }

    const sensitivity = c.req.query('sensitivity');
    const entryType = c.req.query('entry_type');
    if (sensitivity !== undefined && !isSensitivity(sensitivity)) {
      return validationError(c, 'Invalid sensitivity filter.');
    }
    if (entryType !== undefined && !isEntryType(entryType)) {
      return validationError(c, 'Invalid entry_type filter.');
    }

    const listed = await memory.listEntries({
      ...(sensitivity !== undefined && { sensitivity }),
      ...(entryType !== undefined && { entryType }),
    });
    if (!listed.success) {
      return errorResponse(c, listed.error, requestId);
    }

    const decision = await policy.enforceMultiple({
      ...principal,
      action: 'memory:list',
      sensitivities: new Set(listed.data.map((entry) => entry.sensitivity)),
    });
    if (!decision.success) {
      return errorResponse(c, decision.error, requestId);
    }

    return successResponse(
      c,
      {
        count: listed.data.length,
        results: listed.data.map(formatListItem),
      },
      requestId
    );
  });

  /**
   * POST /memory/entries
   */
  app.post('/memory/entries', async (c) => {
    const requestId = c.get('requestId');
    const principal = await resolvePrincipal(c);
    if (principal instanceof Response) {
      return principal;
    }

    const validation = createSchema.safeParse((await readJson(c)) ?? {});
    if (!validation.success) {
      return validationError(
        c,
        validation.error.issues[0]?.message ?? 'Invalid entry data'
      );
    }
    const body = validation.data;

    const decision = await policy.enforce({
      ...principal,
      action: 'memory:create',
      sensitivity: body.sensitivity,
    });
    if (!decision.success) {
      return errorResponse(c, decision.error, requestId);
    }

    const created = await memory.createEntry(
      {
        type: 'agent',
        userId: principal.subjectId,
        agentIdentifier: principal.agentIdentifier,
        requestId,
      },
      {
        title: body.title,
        content: body.content,
        sensitivity: body.sensitivity,
        entryType: body.entry_type,
      }
    );
    if (!created.success) {
      return errorResponse(c, created.error, requestId);
    }

    c.header('ETag', formatEtag(created.data.version));
    return successResponse(
      c,
      { id: created.data.id, version: created.data.version },
      requestId,
      201
    );
  });

  /**
   * GET /memory/entries/:id
   */
  app.get('/memory/entries/:id', async (c) => {
    const requestId = c.get('requestId');
    const principal = await resolvePrincipal(c);
    if (principal instanceof Response) {
      return principal;
    }
    const entry = await loadEntry(c);
    if (entry instanceof Response) {
      return entry;
    }

    const decision = await policy.enforce({
      ...principal,
      action: 'memory:retrieve',
      sensitivity: entry.sensitivity,
    });
    if (!decision.success) {
      return errorResponse(c, decision.error, requestId);
    }

    c.header('ETag', formatEtag(entry.version));
    return successResponse(c, serializeMemoryEntry(entry), requestId);
  });

  /**
   * PUT replaces every mutable field, PATCH any subset
   */
  async function handleUpdate(c: Context, replace: boolean): Promise<Response> {
    const requestId = c.get('requestId');
    const principal = await resolvePrincipal(c);
    if (principal instanceof Response) {
      return principal;
    }
    const entry = await loadEntry(c);
    if (entry instanceof Response) {
      return entry;
    }

    const expectedVersion = parseIfMatch(c.req.header('If-Match'));
    if (expectedVersion === null) {
      return preconditionRequired(c);
    }

    const raw = (await readJson(c)) ?? {};
    const validation = replace
      ? replaceSchema.safeParse(raw)
      : patchSchema.safeParse(raw);
    if (!validation.success) {
      return validationError(
        c,
        validation.error.issues[0]?.message ?? 'Invalid entry data'
      );
    }
    const updates = toUpdate(validation.data);

    // The caller needs write access at both the current and the new level
    const levels = new Set([entry.sensitivity]);
    if (updates.sensitivity !== undefined) {
      levels.add(updates.sensitivity);
    }
    for (const sensitivity of levels) {
      const decision = await policy.enforce({
        ...principal,
        action: 'memory:update',
        sensitivity,
      });
      if (!decision.success) {
        return errorResponse(c, decision.error, requestId);
      }
    }

    if (entry.version !== expectedVersion) {
      return preconditionFailed(c, entry.version);
    }

    const updated = await memory.updateEntry(
      {
        type: 'agent',
        userId: principal.subjectId,
        agentIdentifier: principal.agentIdentifier,
        requestId,
      },
      entry.id,
      expectedVersion,
      updates
    );
    if (!updated.success) {
      if (updated.error.code === 'CONFLICT') {
        return preconditionFailed(
          c,
          currentVersionOf(updated.error.details) ?? entry.version
        );
      }
      return errorResponse(c, updated.error, requestId);
    }

    c.header('ETag', formatEtag(updated.data.version));
    return successResponse(
      c,
      { id: updated.data.id, version: updated.data.version },
      requestId
    );
  }

  /**
   * PUT /memory/entries/:id
   */
  app.put('/memory/entries/:id', (c) => handleUpdate(c, true));

  /**
   * PATCH /memory/entries/:id
   */
  app.patch('/memory/entries/:id', (c) => handleUpdate(c, false));

  /**
   * DELETE /memory/entries/:id
   */
  app.delete('/memory/entries/:id', async (c) => {
    const requestId = c.get('requestId');
    const principal = await resolvePrincipal(c);
    if (principal instanceof Response) {
      return principal;
    }
    const entry = await loadEntry(c);
    if (entry instanceof Response) {
      return entry;
    }

    const expectedVersion = parseIfMatch(c.req.header('If-Match'));
    if (expectedVersion === null) {
      return preconditionRequired(c);
    }

    const decision = await policy.enforce({
      ...principal,
      action: 'memory:delete',
      sensitivity: entry.sensitivity,
    });
    if (!decision.success) {
      return errorResponse(c, decision.error, requestId);
    }

    if (entry.version !== expectedVersion) {
      return preconditionFailed(c, entry.version);
    }

    const deleted = await memory.deleteEntry(
      {
        type: 'agent',
        userId: principal.subjectId,
        agentIdentifier: principal.agentIdentifier,
        requestId,
      },
      entry.id,
      expectedVersion
    );
    if (!deleted.success) {
      if (deleted.error.code === 'CONFLICT') {
        return preconditionFailed(
          c,
          currentVersionOf(deleted.error.details) ?? entry.version
        );
      }
      return errorResponse(c, deleted.error, requestId);
    }

    return c.body(null, 204);
  });

  return app;
}
