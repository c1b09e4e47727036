/**
 * Composition root
 *
 * Builds every service from an AppConfig. Shared by the HTTP entry point
 * and the operator scripts so both run against the same wiring.
 */

import type { AppConfig, DomainEventBus, LexicalIndex, Logger } from '@/lib/index.js';
import {
  createDomainEventBus,
  createHs256TokenVerifier,
  createRedis,
  createSqliteLexicalIndex,
  createSupabaseAdmin,
} from '@/lib/index.js';
import type {
  ApiKeyService,
  BearerTokenAuthenticator,
  CondensationService,
  ConsentService,
  EmbeddingService,
  GraphService,
  HybridQueryService,
  MemoryService,
  PolicyEngine,
  SubjectDirectory,
} from '@/services/index.js';
import {
  createApiKeyService,
  createApiKeyServiceDb,
  createAuditService,
  createAuditServiceDb,
  createBearerTokenAuthenticator,
  createCondensationService,
  createCondensationServiceDb,
  createConsentService,
  createConsentServiceDb,
  createEmbeddingQueryEncoder,
  createEmbeddingService,
  createEmbeddingServiceDb,
  createGraphService,
  createGraphServiceDb,
  createHybridQueryService,
  createInMemoryQueryCache,
  createMemoryService,
  createMemoryServiceDb,
  createNullQueryEncoder,
  createOpenRouterEmbeddingClient,
  createPolicyEngine,
  createQueryServiceDb,
  createRedisQueryCache,
  createSubjectDirectoryDb,
  createWebhookDispatcher,
  createWebhookServiceDb,
  registerAuditObserver,
  registerCondensationScheduler,
  registerGraphSync,
  registerWebhookDispatcher,
} from '@/services/index.js';
import type { ToolDispatcher } from '@/tools/index.js';
import { createToolDispatcher, createToolRegistry } from '@/tools/index.js';
import { DEFAULT_EMBEDDING_CONFIG } from '@/types/index.js';

import type { RateLimiter } from './api/index.js';
import {
  createInMemoryRateLimiter,
  createRedisRateLimiter,
} from './api/index.js';

export interface Container {
  events: DomainEventBus;
  consents: ConsentService;
  policy: PolicyEngine;
  subjects: SubjectDirectory;
  authenticator: BearerTokenAuthenticator;
  memory: MemoryService;
  query: HybridQueryService;
  /** null when no embedding backend is configured */
  embeddings: EmbeddingService | null;
  graph: GraphService;
  condensation: CondensationService;
  apiKeys: ApiKeyService;
  dispatcher: ToolDispatcher;
  rateLimiter: RateLimiter;
  lexicalIndex: LexicalIndex;
}

export function createContainer(config: AppConfig, logger: Logger): Container {
  const supabase = createSupabaseAdmin(config.supabase);
  const redis = createRedis(config.redis);
  const events = createDomainEventBus({ logger });

  // Consent and authorization
  const consents = createConsentService({
    db: createConsentServiceDb(supabase),
    events,
  });
  const policy = createPolicyEngine({ consents });
  const subjects = createSubjectDirectoryDb(supabase);
  const authenticator = createBearerTokenAuthenticator({
    verifier: createHs256TokenVerifier(config.tokens.signingSecret),
    subjects,
    consents: {
      getConsent: async (consentId) => {
        const result = await consents.getConsent(consentId);
        return result.success ? result.data : null;
      },
    },
    policy,
  });

  // Memory and search
  const memory = createMemoryService({
    db: createMemoryServiceDb(supabase),
    events,
  });

  const embeddingConfig = {
    ...DEFAULT_EMBEDDING_CONFIG,
    model: config.embeddings.model,
  };
  const embeddingClient =
    config.embeddings.apiKey === null
      ? null
      : createOpenRouterEmbeddingClient(config.embeddings.apiKey, {
          timeoutMs: config.outboundTimeoutMs,
        });
  const embeddings =
    embeddingClient === null
      ? null
      : createEmbeddingService({
          client: embeddingClient,
          db: createEmbeddingServiceDb(supabase),
          config: embeddingConfig,
        });

  const lexicalIndex = createSqliteLexicalIndex();
  const query = createHybridQueryService({
    db: createQueryServiceDb(supabase),
    index: lexicalIndex,
    encoder:
      embeddingClient === null
        ? createNullQueryEncoder()
        : createEmbeddingQueryEncoder(embeddingClient, embeddingConfig),
    cache:
      redis === null ? createInMemoryQueryCache() : createRedisQueryCache(redis),
    logger,
    options: config.search,
  });

  // Post-commit observers
  registerAuditObserver(
    events,
    createAuditService({ db: createAuditServiceDb(supabase) }),
    logger
  );
  registerWebhookDispatcher(
    events,
    createWebhookDispatcher({
      db: createWebhookServiceDb(supabase),
      logger,
      timeoutMs: config.outboundTimeoutMs,
    })
  );
  const condensation = createCondensationService({
    db: createCondensationServiceDb(supabase),
  });
  registerCondensationScheduler(events, condensation);
  const graph = createGraphService({ db: createGraphServiceDb(supabase) });
  registerGraphSync(events, graph, logger);

  // Collaborator gate
  const apiKeys = createApiKeyService({ db: createApiKeyServiceDb(supabase) });
  const rateLimitConfig = {
    limit: config.rateLimit.requests,
    window: config.rateLimit.windowSeconds,
  };
  const rateLimiter =
    redis === null
      ? createInMemoryRateLimiter(rateLimitConfig)
      : createRedisRateLimiter(redis, rateLimitConfig);

  const dispatcher = createToolDispatcher({
    handlers: createToolRegistry({ authenticator, memory, query, consents }),
    logger,
  });

  return {
    events,
    consents,
    policy,
    subjects,
    authenticator,
    memory,
    query,
    embeddings,
    graph,
    condensation,
    apiKeys,
    dispatcher,
    rateLimiter,
    lexicalIndex,
  };
}
