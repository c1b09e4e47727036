/**
 * Domain Event Types
 *
 * Published after a mutation has been stored. Listeners (webhooks,
 * audit, graph) run outside the mutation and cannot affect its outcome.
 */

import type { ActorContext } from './auth.js';
import type { ConsentScope, ConsentStatus } from './consent.js';
import type { EntryType, Sensitivity } from './memory.js';

export interface MemoryEntryChangedData {
  entryId: number;
  title: string;
  version: number;
  sensitivity: Sensitivity;
  entryType: EntryType;
}

export interface MemoryEntryDeletedData {
  entryId: number;
}

export interface ConsentChangedData {
  consentId: number;
  userId: string;
  agentIdentifier: string;
  version: number;
  status: ConsentStatus;
  scopes: ConsentScope[];
  sensitivityLevels: Sensitivity[];
  revokedAt: Date | null;
}

/**
 * Event name to payload map
 */
export interface DomainEventMap {
  'memory.entry.created': MemoryEntryChangedData;
  'memory.entry.updated': MemoryEntryChangedData;
  'memory.entry.deleted': MemoryEntryDeletedData;
  'consent.created': ConsentChangedData;
  'consent.activated': ConsentChangedData;
  'consent.revoked': ConsentChangedData;
}

export type DomainEventName = keyof DomainEventMap;

export const DOMAIN_EVENT_NAMES: readonly DomainEventName[] = [
  'memory.entry.created',
  'memory.entry.updated',
  'memory.entry.deleted',
  'consent.created',
  'consent.activated',
  'consent.revoked',
];

export interface DomainEventEnvelope<K extends DomainEventName> {
  name: K;
  actor: ActorContext;
  data: DomainEventMap[K];
  occurredAt: Date;
}
