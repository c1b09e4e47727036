/**
 * GraphService Database Adapter
 * Implements GraphServiceDb interface using Supabase
 *
 * Tables: graph_nodes, graph_edges (edges cascade with their nodes)
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { selectAllPages } from '@/lib/supabase.js';
import type {
  GraphEdge,
  GraphNode,
  GraphNodeRef,
  GraphNodeType,
  GraphRelation,
} from '@/types/index.js';
import { isGraphNodeType } from '@/types/index.js';

import type { GraphServiceDb } from './graph.service.js';

interface GraphNodeRow {
  id: number;
  node_type: string;
  reference_id: string;
  metadata: Record<string, unknown> | null;
}

interface GraphEdgeRow {
  source_id: number;
  target_id: number;
  relation_type: GraphRelation;
  weight: number;
}

function mapRowToNode(row: GraphNodeRow): GraphNode {
  if (!isGraphNodeType(row.node_type)) {
    throw new Error(`Unknown graph node type in storage: ${row.node_type}`);
  }
  return {
    id: row.id,
    nodeType: row.node_type,
    referenceId: row.reference_id,
    metadata: row.metadata ?? {},
  };
}

function mapRowToEdge(row: GraphEdgeRow): GraphEdge {
  return {
    sourceId: row.source_id,
    targetId: row.target_id,
    relationType: row.relation_type,
    weight: Number(row.weight),
  };
}

/**
 * Create GraphServiceDb implementation using Supabase
 */
export function createGraphServiceDb(supabase: SupabaseClient): GraphServiceDb {
  async function deleteDirected(
    column: 'source_id' | 'target_id',
    other: 'source_id' | 'target_id',
    nodeId: number,
    relationTypes: readonly GraphRelation[],
    keepNodeIds: number[]
  ): Promise<void> {
    let query = supabase
      .from('graph_edges')
      .delete()
      .eq(column, nodeId)
      .in('relation_type', [...relationTypes]);
    if (keepNodeIds.length > 0) {
      query = query.not(other, 'in', `(${keepNodeIds.join(',')})`);
    }
    const { error } = await query;

    if (error !== null) {
      throw new Error(`Failed to prune graph edges: ${error.message}`);
    }
  }

  return {
    async upsertNode(
      ref: GraphNodeRef,
      metadata: Record<string, unknown>
    ): Promise<GraphNode> {
      const { data, error } = await supabase
        .from('graph_nodes')
        .upsert(
          {
            node_type: ref.nodeType,
            reference_id: ref.referenceId,
            metadata,
            updated_at: new Date().toISOString(),
          },
          { onConflict: 'node_type,reference_id' }
        )
        .select('id, node_type, reference_id, metadata')
        .single();

      if (error !== null) {
        throw new Error(`Failed to upsert graph node: ${error.message}`);
      }

      return mapRowToNode(data as GraphNodeRow);
    },

    async findNode(ref: GraphNodeRef): Promise<GraphNode | null> {
      const { data, error } = await supabase
        .from('graph_nodes')
        .select('id, node_type, reference_id, metadata')
        .eq('node_type', ref.nodeType)
        .eq('reference_id', ref.referenceId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to find graph node: ${error.message}`);
      }

      return data === null ? null : mapRowToNode(data as GraphNodeRow);
    },

    async findNodes(
      nodeType: GraphNodeType,
      referenceIds: string[]
    ): Promise<GraphNode[]> {
      const rows = await selectAllPages('graph nodes', (from, to) =>
        supabase
          .from('graph_nodes')
          .select('id, node_type, reference_id, metadata')
          .eq('node_type', nodeType)
          .in('reference_id', referenceIds)
          .order('id', { ascending: true })
          .range(from, to)
      );

      return (rows as GraphNodeRow[]).map(mapRowToNode);
    },

    async deleteNode(ref: GraphNodeRef): Promise<void> {
      const { error } = await supabase
        .from('graph_nodes')
        .delete()
        .eq('node_type', ref.nodeType)
        .eq('reference_id', ref.referenceId);

      if (error !== null) {
        throw new Error(`Failed to delete graph node: ${error.message}`);
      }
    },

    async upsertEdge(edge: GraphEdge): Promise<void> {
      const { error } = await supabase.from('graph_edges').upsert(
        {
          source_id: edge.sourceId,
          target_id: edge.targetId,
          relation_type: edge.relationType,
          weight: edge.weight,
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'source_id,target_id,relation_type' }
      );

      if (error !== null) {
        throw new Error(`Failed to upsert graph edge: ${error.message}`);
      }
    },

    async pruneEdges(
      nodeId: number,
      relationTypes: readonly GraphRelation[],
      keepNodeIds: number[]
    ): Promise<void> {
      await deleteDirected('source_id', 'target_id', nodeId, relationTypes, keepNodeIds);
      await deleteDirected('target_id', 'source_id', nodeId, relationTypes, keepNodeIds);
    },

    async listEdgesTouching(nodeIds: number[]): Promise<GraphEdge[]> {
      if (nodeIds.length === 0) {
        return [];
      }
      const ids = nodeIds.join(',');
      const rows = await selectAllPages('graph edges', (from, to) =>
        supabase
          .from('graph_edges')
          .select('source_id, target_id, relation_type, weight')
          .or(`source_id.in.(${ids}),target_id.in.(${ids})`)
          .order('id', { ascending: true })
          .range(from, to)
      );

      return (rows as GraphEdgeRow[]).map(mapRowToEdge);
    },
  };
}
