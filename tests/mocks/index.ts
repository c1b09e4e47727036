/**
 * Test Mocks
 * In-memory implementations of the *Db interfaces and external backends
 */

import pino from 'pino';

import type { Logger } from '@/lib/logger.js';
import type { ApiKeyServiceDb } from '@/services/api-key.service.js';
import { hashApiKey } from '@/services/api-key.service.js';
import type { AuditServiceDb } from '@/services/audit.service.js';
import type { CondensationServiceDb } from '@/services/condensation.service.js';
import type { ConsentServiceDb } from '@/services/consent.service.js';
import type {
  EmbeddingServiceClient,
  EmbeddingServiceDb,
} from '@/services/embedding.service.js';
import type { GraphServiceDb } from '@/services/graph.service.js';
import type { MemoryServiceDb } from '@/services/memory.service.js';
import type { QueryServiceDb, StoredVector } from '@/services/query.service.js';
import type { SubjectDirectory } from '@/services/token-auth.service.js';
import type { WebhookServiceDb } from '@/services/webhook.service.js';
import type {
  ApiKey,
  AuditRecord,
  BatchEmbeddingResult,
  CondensationJob,
  CondensationJobStatus,
  Consent,
  ConsentStatus,
  CreateMemoryEntryParams,
  DomainEventName,
  GraphEdge,
  GraphNode,
  GraphNodeRef,
  InsertConsentParams,
  ListMemoryEntriesParams,
  MemoryEmbedding,
  MemoryEntry,
  MemoryEntryUpdate,
  QueryEncoder,
  WebhookDeliveryState,
  WebhookSubscription,
} from '@/types/index.js';

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Let other pending promises run, the way a database round trip would
 */
function yieldTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ─────────────────────────────────────────────────────────────
// CONSENTS
// ─────────────────────────────────────────────────────────────

export interface InMemoryConsentDb extends ConsentServiceDb {
  readonly rows: Map<number, Consent>;
}

/**
 * Enforces (userId, agentIdentifier, version) uniqueness like the table does
 */
export function createInMemoryConsentDb(
  now: () => Date = () => new Date()
): InMemoryConsentDb {
  const rows = new Map<number, Consent>();
  let nextId = 1;

  return {
    rows,

    async getLatestVersion(userId, agentIdentifier) {
      await yieldTurn();
      let latest = 0;
      for (const consent of rows.values()) {
        if (
          consent.userId === userId &&
          consent.agentIdentifier === agentIdentifier
        ) {
          latest = Math.max(latest, consent.version);
        }
      }
      return latest;
    },

    async insertConsent(params: InsertConsentParams) {
      await yieldTurn();
      for (const consent of rows.values()) {
        if (
          consent.userId === params.userId &&
          consent.agentIdentifier === params.agentIdentifier &&
          consent.version === params.version
        ) {
          return null;
        }
      }
      const at = now();
      const consent: Consent = {
        id: nextId++,
        userId: params.userId,
        agentIdentifier: params.agentIdentifier,
        scopes: [...params.scopes],
        sensitivityLevels: [...params.sensitivityLevels],
        status: params.status,
        version: params.version,
        createdAt: at,
        updatedAt: at,
        revokedAt: null,
      };
      rows.set(consent.id, consent);
      return { ...consent };
    },

    async getConsent(consentId) {
      const consent = rows.get(consentId);
      return consent === undefined ? null : { ...consent };
    },

    async updateConsentStatus(
      consentId: number,
      params: { status: ConsentStatus; revokedAt: Date | null }
    ) {
      const consent = rows.get(consentId);
      if (consent === undefined) {
        return null;
      }
      const updated: Consent = {
        ...consent,
        status: params.status,
        revokedAt: params.revokedAt,
        updatedAt: now(),
      };
      rows.set(consentId, updated);
      return { ...updated };
    },

    async markRevoked(consentId: number, revokedAt: Date) {
      await yieldTurn();
      const consent = rows.get(consentId);
      if (consent === undefined || consent.status === 'revoked') {
        return null;
      }
      const updated: Consent = {
        ...consent,
        status: 'revoked',
        revokedAt,
        updatedAt: now(),
      };
      rows.set(consentId, updated);
      return { ...updated };
    },

    async findActiveConsent(userId, agentIdentifier) {
      let best: Consent | null = null;
      for (const consent of rows.values()) {
        if (
          consent.userId === userId &&
          consent.agentIdentifier === agentIdentifier &&
          consent.status === 'active' &&
          (best === null || consent.version > best.version)
        ) {
          best = consent;
        }
      }
      return best === null ? null : { ...best };
    },
  };
}

// ─────────────────────────────────────────────────────────────
// MEMORY ENTRIES (also serves the query service)
// ─────────────────────────────────────────────────────────────

export interface InMemoryMemoryDb extends MemoryServiceDb, QueryServiceDb {
  readonly entries: Map<number, MemoryEntry>;
  readonly vectors: Map<number, number[]>;
  seed(params: Partial<MemoryEntry> & Pick<MemoryEntry, 'title' | 'content'>): MemoryEntry;
}

/**
 * Each call to now() should return a later instant for updatedAt ordering.
 * The default clock advances one second per call from a fixed origin.
 */
export function createSteppingClock(
  start: Date = new Date('2024-01-01T00:00:00.000Z'),
  stepMs = 1000
): () => Date {
  let current = start.getTime();
  return () => {
    const at = new Date(current);
    current += stepMs;
    return at;
  };
}

export function createInMemoryMemoryDb(
  now: () => Date = createSteppingClock()
): InMemoryMemoryDb {
  const entries = new Map<number, MemoryEntry>();
  const vectors = new Map<number, number[]>();
  let nextId = 1;

  function insert(entry: MemoryEntry): MemoryEntry {
    entries.set(entry.id, entry);
    nextId = Math.max(nextId, entry.id + 1);
    return { ...entry };
  }

  return {
    entries,
    vectors,

    seed(params) {
      const at = now();
      return insert({
        id: params.id ?? nextId,
        title: params.title,
        content: params.content,
        sensitivity: params.sensitivity ?? 'public',
        entryType: params.entryType ?? 'note',
        version: params.version ?? 1,
        createdAt: params.createdAt ?? at,
        updatedAt: params.updatedAt ?? at,
      });
    },

    async createEntry(params: CreateMemoryEntryParams) {
      const at = now();
      return insert({
        id: nextId,
        ...params,
        version: 1,
        createdAt: at,
        updatedAt: at,
      });
    },

    async getEntry(entryId) {
      const entry = entries.get(entryId);
      return entry === undefined ? null : { ...entry };
    },

    async listEntries(params: ListMemoryEntriesParams) {
      return [...entries.values()]
        .filter(
          (entry) =>
            (params.sensitivity === undefined ||
              entry.sensitivity === params.sensitivity) &&
            (params.entryType === undefined ||
              entry.entryType === params.entryType)
        )
        .sort(
          (a, b) =>
            b.updatedAt.getTime() - a.updatedAt.getTime() ||
            a.title.localeCompare(b.title)
        )
        .map((entry) => ({ ...entry }));
    },

    async compareAndSwapEntry(
      entryId: number,
      expectedVersion: number,
      updates: MemoryEntryUpdate
    ) {
      await yieldTurn();
      const entry = entries.get(entryId);
      if (entry === undefined || entry.version !== expectedVersion) {
        return null;
      }
      const updated: MemoryEntry = {
        ...entry,
        ...updates,
        version: expectedVersion + 1,
        updatedAt: now(),
      };
      entries.set(entryId, updated);
      return { ...updated };
    },

    async deleteEntryIfVersion(entryId, expectedVersion) {
      await yieldTurn();
      const entry = entries.get(entryId);
      if (entry === undefined || entry.version !== expectedVersion) {
        return false;
      }
      entries.delete(entryId);
      vectors.delete(entryId);
      return true;
    },

    async getModificationMarker() {
      let latest = 0;
      for (const entry of entries.values()) {
        latest = Math.max(latest, entry.updatedAt.getTime());
      }
      return `${latest}|${entries.size}`;
    },

    async listIndexableEntries() {
      return [...entries.values()].map((entry) => ({
        id: entry.id,
        title: entry.title,
        content: entry.content,
      }));
    },

    async listEmbeddings(): Promise<StoredVector[]> {
      return [...vectors.entries()].map(([entryId, vector]) => ({
        entryId,
        vector,
      }));
    },

    async getEntriesByIds(entryIds: number[]) {
      return entryIds.flatMap((id) => {
        const entry = entries.get(id);
        return entry === undefined ? [] : [{ ...entry }];
      });
    },
  };
}

// ─────────────────────────────────────────────────────────────
// EMBEDDINGS
// ─────────────────────────────────────────────────────────────

export interface InMemoryEmbeddingDb extends EmbeddingServiceDb {
  readonly stored: Map<number, MemoryEmbedding>;
}

export function createInMemoryEmbeddingDb(): InMemoryEmbeddingDb {
  const stored = new Map<number, MemoryEmbedding>();
  return {
    stored,
    async upsertEmbeddings(embeddings) {
      for (const embedding of embeddings) {
        stored.set(embedding.entryId, embedding);
      }
      return embeddings.length;
    },
  };
}

/**
 * Deterministic embedding backend: each text maps to the vector
 * registered for it, or to [length, 1] otherwise
 */
export function createFakeEmbeddingClient(
  known: Record<string, number[]> = {}
): EmbeddingServiceClient & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    async createBatchEmbeddings(texts: string[]): Promise<BatchEmbeddingResult> {
      calls.push(texts);
      return {
        embeddings: texts.map((text) => known[text] ?? [text.length, 1]),
        model: 'fake-embedding',
        totalTokens: texts.length,
      };
    },
  };
}

/**
 * Encoder returning a fixed value for every query
 */
export function createFixedEncoder(output: unknown): QueryEncoder {
  return {
    async encode(): Promise<unknown> {
      return output;
    },
  };
}

// ─────────────────────────────────────────────────────────────
// AUDIT / WEBHOOKS / CONDENSATION / API KEYS / SUBJECTS
// ─────────────────────────────────────────────────────────────

export interface InMemoryAuditDb extends AuditServiceDb {
  readonly records: AuditRecord[];
}

export function createInMemoryAuditDb(): InMemoryAuditDb {
  const records: AuditRecord[] = [];
  return {
    records,
    async insertLog(record: AuditRecord) {
      records.push(record);
      return { id: `audit-${records.length}` };
    },
  };
}

export interface InMemoryWebhookDb extends WebhookServiceDb {
  readonly subscriptions: Map<string, WebhookSubscription>;
}

export function createWebhookSubscription(
  overrides: Partial<WebhookSubscription> = {}
): WebhookSubscription {
  return {
    id: 'sub-1',
    companyId: 'company-1',
    targetUrl: 'https://hooks.example.test/memory',
    secret: 'test-secret',
    events: ['memory.entry.created'],
    status: 'active',
    failureCount: 0,
    lastSuccessAt: null,
    lastFailureAt: null,
    lastError: '',
    ...overrides,
  };
}

export function createInMemoryWebhookDb(
  subscriptions: WebhookSubscription[] = []
): InMemoryWebhookDb {
  const byId = new Map(subscriptions.map((sub) => [sub.id, sub]));
  return {
    subscriptions: byId,
    async listActiveSubscriptions(event: DomainEventName) {
      return [...byId.values()].filter(
        (sub) => sub.status === 'active' && sub.events.includes(event)
      );
    },
    async saveDeliveryState(subscriptionId: string, state: WebhookDeliveryState) {
      const current = byId.get(subscriptionId);
      if (current !== undefined) {
        byId.set(subscriptionId, { ...current, ...state });
      }
    },
  };
}

/**
 * fetch stand-in that records requests and answers with the given statuses
 * in turn (the last one repeats). A status of 0 rejects like a network error.
 */
export function createFakeFetch(statuses: number[] = [200]): {
  fetch: typeof fetch;
  requests: Array<{ url: string; body: string }>;
} {
  const requests: Array<{ url: string; body: string }> = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url =
      typeof input === 'string'
        ? input
        : input instanceof URL
          ? input.toString()
          : input.url;
    const body = typeof init?.body === 'string' ? init.body : '';
    requests.push({ url, body });
    const status = statuses[Math.min(requests.length - 1, statuses.length - 1)] ?? 200;
    if (status === 0) {
      throw new Error('connect ECONNREFUSED');
    }
    return new Response(null, { status });
  };
  return { fetch: fakeFetch, requests };
}

export interface InMemoryCondensationDb extends CondensationServiceDb {
  readonly jobs: Map<number, CondensationJob>;
}

export function createInMemoryCondensationDb(): InMemoryCondensationDb {
  const jobs = new Map<number, CondensationJob>();
  let nextId = 1;

  return {
    jobs,

    async insertJob(entryId: number, scheduledFor: Date) {
      const job: CondensationJob = {
        id: nextId++,
        entryId,
        status: 'pending',
        scheduledFor,
        startedAt: null,
        completedAt: null,
        attempts: 0,
        summary: '',
        errorMessage: '',
        createdAt: scheduledFor,
      };
      jobs.set(job.id, job);
      return { ...job };
    },

    async getJob(jobId: number) {
      const job = jobs.get(jobId);
      return job === undefined ? null : { ...job };
    },

    async listDueJobs(now: Date, limit: number) {
      return [...jobs.values()]
        .filter(
          (job) =>
            job.status === 'pending' &&
            job.scheduledFor.getTime() <= now.getTime()
        )
        .sort(
          (a, b) =>
            a.scheduledFor.getTime() - b.scheduledFor.getTime() ||
            a.createdAt.getTime() - b.createdAt.getTime()
        )
        .slice(0, limit)
        .map((job) => ({ ...job }));
    },

    async saveJobIfStatus(job: CondensationJob, expected: CondensationJobStatus) {
      const current = jobs.get(job.id);
      if (current === undefined || current.status !== expected) {
        return false;
      }
      jobs.set(job.id, { ...job });
      return true;
    },
  };
}

export function createInMemoryApiKeyDb(
  keys: Array<{ raw: string; key: ApiKey; active?: boolean }>
): ApiKeyServiceDb {
  const byHash = new Map(
    keys
      .filter((entry) => entry.active ?? true)
      .map((entry) => [hashApiKey(entry.raw), entry.key])
  );
  return {
    async findActiveKeyByHash(keyHash: string) {
      return byHash.get(keyHash) ?? null;
    },
  };
}

export function createInMemorySubjectDirectory(
  subjectIds: string[]
): SubjectDirectory & { readonly ids: Set<string> } {
  const ids = new Set(subjectIds);
  return {
    ids,
    async findSubject(subjectId: string) {
      return ids.has(subjectId) ? { id: subjectId } : null;
    },
  };
}

// ─────────────────────────────────────────────────────────────
// GRAPH
// ─────────────────────────────────────────────────────────────

export interface InMemoryGraphDb extends GraphServiceDb {
  readonly nodes: Map<number, GraphNode>;
  readonly edges: GraphEdge[];
  /** Look a node up by its natural key */
  nodeFor(ref: GraphNodeRef): GraphNode | undefined;
  /** Relations leaving the node, as "relation->nodeType:referenceId" */
  describeEdgesFrom(ref: GraphNodeRef): string[];
}

export function createInMemoryGraphDb(): InMemoryGraphDb {
  const nodes = new Map<number, GraphNode>();
  const edges: GraphEdge[] = [];
  let nextId = 1;

  function nodeFor(ref: GraphNodeRef): GraphNode | undefined {
    return [...nodes.values()].find(
      (node) => node.nodeType === ref.nodeType && node.referenceId === ref.referenceId
    );
  }

  function removeEdges(predicate: (edge: GraphEdge) => boolean): void {
    for (let index = edges.length - 1; index >= 0; index--) {
      const edge = edges[index];
      if (edge !== undefined && predicate(edge)) {
        edges.splice(index, 1);
      }
    }
  }

  return {
    nodes,
    edges,
    nodeFor,

    describeEdgesFrom(ref) {
      const source = nodeFor(ref);
      if (source === undefined) {
        return [];
      }
      return edges
        .filter((edge) => edge.sourceId === source.id)
        .map((edge) => {
          const target = nodes.get(edge.targetId);
          return `${edge.relationType}->${target?.nodeType}:${target?.referenceId}`;
        })
        .sort();
    },

    async upsertNode(ref, metadata) {
      await yieldTurn();
      const existing = nodeFor(ref);
      const node: GraphNode = { id: existing?.id ?? nextId++, ...ref, metadata };
      nodes.set(node.id, node);
      return { ...node };
    },

    async findNode(ref) {
      const node = nodeFor(ref);
      return node === undefined ? null : { ...node };
    },

    async findNodes(nodeType, referenceIds) {
      return [...nodes.values()]
        .filter(
          (node) => node.nodeType === nodeType && referenceIds.includes(node.referenceId)
        )
        .map((node) => ({ ...node }));
    },

    async deleteNode(ref) {
      const node = nodeFor(ref);
      if (node === undefined) {
        return;
      }
      nodes.delete(node.id);
      removeEdges((edge) => edge.sourceId === node.id || edge.targetId === node.id);
    },

    async upsertEdge(edge) {
      await yieldTurn();
      removeEdges(
        (existing) =>
          existing.sourceId === edge.sourceId &&
          existing.targetId === edge.targetId &&
          existing.relationType === edge.relationType
      );
      edges.push({ ...edge });
    },

    async pruneEdges(nodeId, relationTypes, keepNodeIds) {
      removeEdges((edge) => {
        if (!relationTypes.includes(edge.relationType)) {
          return false;
        }
        if (edge.sourceId === nodeId) {
          return !keepNodeIds.includes(edge.targetId);
        }
        if (edge.targetId === nodeId) {
          return !keepNodeIds.includes(edge.sourceId);
        }
        return false;
      });
    },

    async listEdgesTouching(nodeIds) {
      return edges
        .filter((edge) => nodeIds.includes(edge.sourceId) || nodeIds.includes(edge.targetId))
        .map((edge) => ({ ...edge }));
    },
  };
}
