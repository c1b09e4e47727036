/**
 * Audit Types
 * Types for the AuditService
 */

import type { ActorContext } from './auth.js';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'memory.entry.updated', 'consent.revoked'
  resourceType: string; // 'memory_entry' | 'consent'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Row written to audit_logs
 */
export interface AuditRecord {
  actorId: string | null; // NULL for system actions
  actorType: ActorContext['type'];
  agentIdentifier: string | null;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string;
}
