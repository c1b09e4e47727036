/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 *
 * Table: audit_logs
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { AuditRecord } from '@/types/index.js';

import type { AuditServiceDb } from './audit.service.js';

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(record: AuditRecord): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert({
          actor_id: record.actorId,
          actor_type: record.actorType,
          agent_identifier: record.agentIdentifier,
          action: record.action,
          resource_type: record.resourceType,
          resource_id: record.resourceId,
          details: record.details,
          request_id: record.requestId,
        })
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      return { id: String((data as { id: string | number }).id) };
    },
  };
}
