/**
 * GraphService Implementation
 *
 * SCOPE: Knowledge-graph projection of memory entries and consents, and
 * proximity ranking over it
 * Owns: graph_nodes, graph_edges
 *
 * GUARDRAILS:
 * - Fed only by the event bus; never written inside a request
 * - Sync tasks run one at a time, in publish order, so a later event for
 *   the same entry or consent always wins
 * - Every relation is stored in both directions
 * - Only active consents keep edges; pending and revoked ones are bare nodes
 */

import type { DomainEventBus } from '@/lib/event-bus.js';
import type { Logger } from '@/lib/logger.js';
import type {
  ConsentChangedData,
  GraphEdge,
  GraphNode,
  GraphNodeRef,
  GraphNodeType,
  GraphRelation,
  MemoryEntryChangedData,
  RelatedNode,
  RelatedQuery,
  RelatedResult,
  Result,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/**
 * Database abstraction interface for GraphService
 */
export interface GraphServiceDb {
  /** Insert or refresh the metadata of the node keyed by ref */
  upsertNode: (
    ref: GraphNodeRef,
    metadata: Record<string, unknown>
  ) => Promise<GraphNode>;
  findNode: (ref: GraphNodeRef) => Promise<GraphNode | null>;
  findNodes: (
    nodeType: GraphNodeType,
    referenceIds: string[]
  ) => Promise<GraphNode[]>;
  /** Removes the node together with every edge touching it */
  deleteNode: (ref: GraphNodeRef) => Promise<void>;
  /** Insert, or update the weight of, the edge keyed by source, target and relation */
  upsertEdge: (edge: GraphEdge) => Promise<void>;
  /**
   * Delete edges touching nodeId whose relation is one of relationTypes and
   * whose other end is not in keepNodeIds
   */
  pruneEdges: (
    nodeId: number,
    relationTypes: readonly GraphRelation[],
    keepNodeIds: number[]
  ) => Promise<void>;
  /** Every edge with either end in nodeIds */
  listEdgesTouching: (nodeIds: number[]) => Promise<GraphEdge[]>;
}

export interface GraphService {
  syncEntry(data: MemoryEntryChangedData): Promise<Result<void>>;
  removeEntry(entryId: number): Promise<Result<void>>;
  syncConsent(data: ConsentChangedData): Promise<Result<void>>;
  related(query: RelatedQuery): Promise<Result<RelatedResult>>;
}

export const GRAPH_MAX_DEPTH = 4;
export const DEFAULT_RELATED_LIMIT = 5;
export const MAX_RELATED_LIMIT = 100;

const ENTRY_RELATIONS: readonly GraphRelation[] = [
  'has_type',
  'type_of',
  'has_sensitivity',
  'sensitivity_of',
];

const CONSENT_RELATIONS: readonly GraphRelation[] = [
  'grants',
  'granted_by',
  'granted_to',
  'receives',
  'permits_sensitivity',
  'permitted_by',
];

// ─────────────────────────────────────────────────────────────
// Ranking
// ─────────────────────────────────────────────────────────────

/**
 * Undirected weighted neighbours per node id
 */
export type Adjacency = Map<number, Array<{ nodeId: number; weight: number }>>;

/**
 * Adjacency from a set of edges, each arc listed once per direction
 */
export function buildAdjacency(edges: readonly GraphEdge[]): Adjacency {
  const adjacency: Adjacency = new Map();
  const seen = new Set<string>();

  function addArc(from: number, to: number, weight: number): void {
    const key = `${from}:${to}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    const neighbours = adjacency.get(from) ?? [];
    neighbours.push({ nodeId: to, weight });
    adjacency.set(from, neighbours);
  }

  for (const edge of edges) {
    addArc(edge.sourceId, edge.targetId, edge.weight);
    addArc(edge.targetId, edge.sourceId, edge.weight);
  }
  return adjacency;
}

/**
 * Best score over paths from anchor to candidate of at most maxDepth hops.
 * A path scores the product of its edge weights divided by (hops + 1).
 */
export function computeCloseness(
  adjacency: Adjacency,
  anchorId: number,
  candidateId: number,
  maxDepth: number = GRAPH_MAX_DEPTH
): number {
  if (anchorId === candidateId) {
    return 1;
  }

  const bestWeight = new Map<number, number>([[anchorId, 1]]);
  const open: Array<{ nodeId: number; weight: number; depth: number }> = [
    { nodeId: anchorId, weight: 1, depth: 0 },
  ];
  let bestScore = 0;

  while (open.length > 0) {
    // Heaviest path first
    let top = 0;
    open.forEach((step, index) => {
      if (step.weight > (open[top]?.weight ?? 0)) {
        top = index;
      }
    });
    const [current] = open.splice(top, 1);
    if (current === undefined || current.depth >= maxDepth) {
      continue;
    }

    const depth = current.depth + 1;
    for (const neighbour of adjacency.get(current.nodeId) ?? []) {
      const weight = current.weight * neighbour.weight;
      if (neighbour.nodeId === candidateId) {
        bestScore = Math.max(bestScore, weight / (depth + 1));
      }
      if (weight <= (bestWeight.get(neighbour.nodeId) ?? 0)) {
        continue;
      }
      bestWeight.set(neighbour.nodeId, weight);
      open.push({ nodeId: neighbour.nodeId, weight, depth });
    }
  }

  return bestScore;
}

function roundScore(score: number): number {
  return Math.round(score * 1e6) / 1e6;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create GraphService instance
 */
export function createGraphService(deps: { db: GraphServiceDb }): GraphService {
  const { db } = deps;
  let queue: Promise<unknown> = Promise.resolve();

  function serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    // The caller sees the failure through run; the queue moves on
    queue = run.catch(() => undefined);
    return run;
  }

  async function link(
    from: GraphNode,
    to: GraphNode,
    relation: GraphRelation,
    inverse: GraphRelation,
    weight: number
  ): Promise<void> {
    await db.upsertEdge({
      sourceId: from.id,
      targetId: to.id,
      relationType: relation,
      weight,
    });
    await db.upsertEdge({
      sourceId: to.id,
      targetId: from.id,
      relationType: inverse,
      weight,
    });
  }

  async function writeEntry(data: MemoryEntryChangedData): Promise<void> {
    const node = await db.upsertNode(
      { nodeType: 'memory_entry', referenceId: String(data.entryId) },
      { sensitivity: data.sensitivity, entry_type: data.entryType }
    );
    const typeNode = await db.upsertNode(
      { nodeType: 'memory_entry_type', referenceId: data.entryType },
      { label: data.entryType }
    );
    const sensitivityNode = await db.upsertNode(
      { nodeType: 'sensitivity_level', referenceId: data.sensitivity },
      { label: data.sensitivity }
    );

    await link(node, typeNode, 'has_type', 'type_of', 0.9);
    await link(node, sensitivityNode, 'has_sensitivity', 'sensitivity_of', 0.7);
    // Drop links left over from the previous type or sensitivity
    await db.pruneEdges(node.id, ENTRY_RELATIONS, [typeNode.id, sensitivityNode.id]);
  }

  async function writeConsent(data: ConsentChangedData): Promise<void> {
    const consentNode = await db.upsertNode(
      { nodeType: 'consent', referenceId: String(data.consentId) },
      {
        status: data.status,
        version: data.version,
        scopes: data.scopes,
        sensitivity_levels: data.sensitivityLevels,
      }
    );
    const userNode = await db.upsertNode(
      { nodeType: 'user', referenceId: data.userId },
      {}
    );
    const agentNode = await db.upsertNode(
      { nodeType: 'agent', referenceId: data.agentIdentifier },
      { identifier: data.agentIdentifier }
    );

    if (data.status !== 'active') {
      await db.pruneEdges(consentNode.id, CONSENT_RELATIONS, []);
      return;
    }

    await link(userNode, consentNode, 'grants', 'granted_by', 1.0);
    await link(consentNode, agentNode, 'granted_to', 'receives', 0.8);
    const keep = [userNode.id, agentNode.id];
    for (const level of data.sensitivityLevels) {
      const levelNode = await db.upsertNode(
        { nodeType: 'sensitivity_level', referenceId: level },
        { label: level }
      );
      await link(consentNode, levelNode, 'permits_sensitivity', 'permitted_by', 0.6);
      keep.push(levelNode.id);
    }
    await db.pruneEdges(consentNode.id, CONSENT_RELATIONS, keep);
  }

  /**
   * Edges within GRAPH_MAX_DEPTH hops of the anchor
   */
  async function collectEdges(anchorId: number): Promise<GraphEdge[]> {
    const collected: GraphEdge[] = [];
    const visited = new Set<number>();
    let frontier = new Set<number>([anchorId]);

    for (let depth = 0; frontier.size > 0 && depth < GRAPH_MAX_DEPTH; depth++) {
      const edges = await db.listEdgesTouching([...frontier]);
      const next = new Set<number>();
      for (const edge of edges) {
        collected.push(edge);
        for (const nodeId of [edge.sourceId, edge.targetId]) {
          if (!visited.has(nodeId) && !frontier.has(nodeId)) {
            next.add(nodeId);
          }
        }
      }
      for (const nodeId of frontier) {
        visited.add(nodeId);
      }
      frontier = next;
    }
    return collected;
  }

  return {
    async syncEntry(data: MemoryEntryChangedData): Promise<Result<void>> {
      try {
        await serialized(() => writeEntry(data));
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to sync memory entry to graph');
      }
    },

    async removeEntry(entryId: number): Promise<Result<void>> {
      try {
        await serialized(() =>
          db.deleteNode({ nodeType: 'memory_entry', referenceId: String(entryId) })
        );
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to remove memory entry from graph');
      }
    },

    async syncConsent(data: ConsentChangedData): Promise<Result<void>> {
      try {
        await serialized(() => writeConsent(data));
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to sync consent to graph');
      }
    },

    /**
     * Rank candidate nodes by proximity to the anchor
     */
    async related(query: RelatedQuery): Promise<Result<RelatedResult>> {
      if (!Number.isInteger(query.limit) || query.limit <= 0) {
        return failure('VALIDATION_ERROR', 'limit must be a positive integer.');
      }
      if (query.candidates.length === 0) {
        return failure(
          'VALIDATION_ERROR',
          'At least one candidate reference must be provided.'
        );
      }
      const limit = Math.min(query.limit, MAX_RELATED_LIMIT);

      try {
        const anchor = await db.findNode(query.anchor);
        if (anchor === null) {
          return success({ node: null, count: 0, results: [] });
        }

        const nodes = await db.findNodes(query.candidateType, query.candidates);
        const byReference = new Map(nodes.map((node) => [node.referenceId, node]));
        const candidates = query.candidates.flatMap((referenceId) => {
          const node = byReference.get(referenceId);
          return node === undefined ? [] : [node];
        });
        if (candidates.length === 0) {
          return success({ node: anchor, count: 0, results: [] });
        }

        const adjacency = buildAdjacency(await collectEdges(anchor.id));
        const ranked: RelatedNode[] = candidates
          .map((candidate) => ({
            id: candidate.id,
            nodeType: candidate.nodeType,
            referenceId: candidate.referenceId,
            score: roundScore(computeCloseness(adjacency, anchor.id, candidate.id)),
          }))
          .sort((a, b) => b.score - a.score);

        const results = ranked.slice(0, limit);
        return success({ node: anchor, count: results.length, results });
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to rank related nodes');
      }
    },
  };
}

/**
 * Keep the graph in step with entry and consent events
 */
export function registerGraphSync(
  bus: Pick<DomainEventBus, 'subscribe'>,
  graph: GraphService,
  logger: Logger
): () => void {
  const log = logger.child({ component: 'graph' });

  function report(event: string, result: Result<void>): void {
    if (!result.success) {
      log.warn({ event, error: result.error.message }, 'Graph sync failed');
    }
  }

  const unsubscribers = [
    bus.subscribe('memory.entry.created', async (event) => {
      report(event.name, await graph.syncEntry(event.data));
    }),
    bus.subscribe('memory.entry.updated', async (event) => {
      report(event.name, await graph.syncEntry(event.data));
    }),
    bus.subscribe('memory.entry.deleted', async (event) => {
      report(event.name, await graph.removeEntry(event.data.entryId));
    }),
    bus.subscribe('consent.created', async (event) => {
      report(event.name, await graph.syncConsent(event.data));
    }),
    bus.subscribe('consent.activated', async (event) => {
      report(event.name, await graph.syncConsent(event.data));
    }),
    bus.subscribe('consent.revoked', async (event) => {
      report(event.name, await graph.syncConsent(event.data));
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
