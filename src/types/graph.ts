/**
 * Knowledge Graph Types
 *
 * A projection of entries and consents into typed nodes joined by weighted
 * edges. Nodes are keyed by (nodeType, referenceId); edges by
 * (source, target, relationType).
 */

export const GRAPH_NODE_TYPES = [
  'memory_entry',
  'memory_entry_type',
  'sensitivity_level',
  'consent',
  'user',
  'agent',
] as const;

export type GraphNodeType = (typeof GRAPH_NODE_TYPES)[number];

export function isGraphNodeType(value: string): value is GraphNodeType {
  return (GRAPH_NODE_TYPES as readonly string[]).includes(value);
}

export type GraphRelation =
  | 'has_type'
  | 'type_of'
  | 'has_sensitivity'
  | 'sensitivity_of'
  | 'grants'
  | 'granted_by'
  | 'granted_to'
  | 'receives'
  | 'permits_sensitivity'
  | 'permitted_by';

export interface GraphNodeRef {
  nodeType: GraphNodeType;
  referenceId: string;
}

export interface GraphNode extends GraphNodeRef {
  id: number;
  metadata: Record<string, unknown>;
}

export interface GraphEdge {
  sourceId: number;
  targetId: number;
  relationType: GraphRelation;
  weight: number;
}

export interface RelatedQuery {
  anchor: GraphNodeRef;
  candidateType: GraphNodeType;
  /** Candidate reference ids, already trimmed and deduplicated */
  candidates: string[];
  limit: number;
}

export interface RelatedNode {
  id: number;
  nodeType: GraphNodeType;
  referenceId: string;
  /** Best depth-discounted product of edge weights; 0 when unreachable */
  score: number;
}

export interface RelatedResult {
  /** null when the anchor has no node yet */
  node: GraphNode | null;
  count: number;
  results: RelatedNode[];
}
