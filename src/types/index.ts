/**
 * Core type definitions for memory-vault
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, denied, isSuccess, isFailure } from './result.js';
export type {
  ActorContext,
  AuthContext,
  PolicyContext,
  Subject,
} from './auth.js';
export { SYSTEM_ACTOR, actorFromAuthContext } from './auth.js';
export type { AuditEvent, AuditRecord } from './audit.js';
export type {
  Sensitivity,
  EntryType,
  MemoryEntry,
  CreateMemoryEntryParams,
  MemoryEntryUpdate,
  ListMemoryEntriesParams,
  MemoryEmbedding,
  HybridSearchResult,
  SerializedSearchResult,
  SerializedMemoryEntry,
} from './memory.js';
export {
  SENSITIVITY_LEVELS,
  ENTRY_TYPES,
  DEFAULT_SENSITIVITY,
  DEFAULT_ENTRY_TYPE,
  isSensitivity,
  isEntryType,
  sensitivityRank,
  serializeSearchResult,
  serializeMemoryEntry,
} from './memory.js';
export type {
  ConsentScope,
  ConsentStatus,
  Consent,
  CreateConsentParams,
  InsertConsentParams,
} from './consent.js';
export {
  CONSENT_SCOPES,
  SCOPE_MEMORY_READ,
  SCOPE_MEMORY_WRITE,
  SCOPE_MEMORY_SEARCH,
  SCOPE_CONSENT_MANAGE,
  isConsentScope,
} from './consent.js';
export type {
  DomainEventMap,
  DomainEventName,
  DomainEventEnvelope,
  MemoryEntryChangedData,
  MemoryEntryDeletedData,
  ConsentChangedData,
} from './events.js';
export { DOMAIN_EVENT_NAMES } from './events.js';
export type {
  WebhookStatus,
  WebhookSubscription,
  WebhookDeliveryState,
  WebhookData,
} from './webhook.js';
export {
  WEBHOOK_FAILURE_THRESHOLD,
  WEBHOOK_REQUIRED_FIELDS,
} from './webhook.js';
export type {
  CondensationJob,
  CondensationJobStatus,
} from './condensation.js';
export type { ApiKey } from './api-key.js';
export type {
  EmbeddingConfig,
  BatchEmbeddingResult,
  QueryEncoder,
} from './embedding.js';
export { DEFAULT_EMBEDDING_CONFIG } from './embedding.js';
export type {
  GraphNodeType,
  GraphRelation,
  GraphNodeRef,
  GraphNode,
  GraphEdge,
  RelatedQuery,
  RelatedNode,
  RelatedResult,
} from './graph.js';
export { GRAPH_NODE_TYPES, isGraphNodeType } from './graph.js';
