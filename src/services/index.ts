/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// ConsentService
export type { ConsentService, ConsentServiceDb } from './consent.service.js';
export {
  createConsentService,
  allowsScope,
  allowsAllScopes,
  allowsSensitivity,
  validateConsentGrant,
} from './consent.service.js';
export { createConsentServiceDb } from './consent.db.js';

// PolicyEngine
export type {
  PolicyEngine,
  PolicyConsentLookup,
  EnforceParams,
  EnforceMultipleParams,
} from './policy.service.js';
export {
  createPolicyEngine,
  maxSensitivity,
  ACTION_SCOPE_MAP,
} from './policy.service.js';

// BearerTokenAuthenticator
export type {
  BearerTokenAuthenticator,
  SubjectDirectory,
  AuthConsentLookup,
} from './token-auth.service.js';
export {
  createBearerTokenAuthenticator,
  normalizeScopes,
} from './token-auth.service.js';
export { createSubjectDirectoryDb } from './subject.db.js';

// MemoryService
export type { MemoryService, MemoryServiceDb } from './memory.service.js';
export { createMemoryService } from './memory.service.js';
export { createMemoryServiceDb } from './memory.db.js';

// HybridQueryService
export type {
  HybridQueryService,
  QueryServiceDb,
  QueryCache,
} from './query.service.js';
export { createHybridQueryService } from './query.service.js';
export { createQueryServiceDb } from './query.db.js';
export {
  createRedisQueryCache,
  createInMemoryQueryCache,
} from './query.cache.js';

// EmbeddingService
export type {
  EmbeddingService,
  EmbeddingServiceClient,
  EmbeddingServiceDb,
} from './embedding.service.js';
export {
  createEmbeddingService,
  createEmbeddingQueryEncoder,
  createNullQueryEncoder,
  createOpenRouterEmbeddingClient,
} from './embedding.service.js';
export { createEmbeddingServiceDb } from './embedding.db.js';

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService, registerAuditObserver } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// WebhookDispatcher
export type { WebhookDispatcher, WebhookServiceDb } from './webhook.service.js';
export {
  createWebhookDispatcher,
  registerWebhookDispatcher,
} from './webhook.service.js';
export { createWebhookServiceDb } from './webhook.db.js';

// CondensationService
export type {
  CondensationService,
  CondensationServiceDb,
} from './condensation.service.js';
export {
  createCondensationService,
  registerCondensationScheduler,
  generateSummary,
} from './condensation.service.js';
export { createCondensationServiceDb } from './condensation.db.js';

// ApiKeyService
export type { ApiKeyService, ApiKeyServiceDb } from './api-key.service.js';
export { createApiKeyService, hashApiKey } from './api-key.service.js';
export { createApiKeyServiceDb } from './api-key.db.js';

// GraphService
export type { GraphService, GraphServiceDb } from './graph.service.js';
export { createGraphService, registerGraphSync } from './graph.service.js';
export { createGraphServiceDb } from './graph.db.js';
