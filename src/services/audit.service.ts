/**
 * AuditService Implementation
 *
 * Purpose: Append-only audit trail of committed domain events.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 *
 * The observer subscribes to every domain event; the actor comes from the
 * event envelope, never from ambient request state.
 */

import type { DomainEventBus } from '@/lib/event-bus.js';
import type { Logger } from '@/lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  AuditRecord,
  DomainEventEnvelope,
  DomainEventName,
  Result,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (record: AuditRecord) => Promise<{ id: string }>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
}

/**
 * Build log entry from actor and event
 */
function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditRecord {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    agentIdentifier: actor.agentIdentifier ?? null,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    requestId: actor.requestId,
  };
}

/**
 * Describe a domain event as an audit event
 */
export function toAuditEvent(
  event: DomainEventEnvelope<DomainEventName>
): AuditEvent {
  const { data } = event;
  if ('consentId' in data) {
    return {
      action: event.name,
      resourceType: 'consent',
      resourceId: String(data.consentId),
      details: {
        agentIdentifier: data.agentIdentifier,
        version: data.version,
        status: data.status,
      },
    };
  }
  if ('version' in data) {
    return {
      action: event.name,
      resourceType: 'memory_entry',
      resourceId: String(data.entryId),
      details: { version: data.version, sensitivity: data.sensitivity },
    };
  }
  return {
    action: event.name,
    resourceType: 'memory_entry',
    resourceId: String(data.entryId),
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },
  };
}

/**
 * Record every domain event after it has been published
 */
export function registerAuditObserver(
  bus: Pick<DomainEventBus, 'subscribeAll'>,
  audit: AuditService,
  logger: Logger
): () => void {
  const log = logger.child({ component: 'audit' });
  return bus.subscribeAll(async (event) => {
    const result = await audit.log(event.actor, toAuditEvent(event));
    if (!result.success) {
      log.warn({ event: event.name, error: result.error.message }, 'Audit write failed');
    }
  });
}
