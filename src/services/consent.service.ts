/**
 * ConsentService Implementation
 *
 * SCOPE: Versioned user -> agent consents and their lifecycle
 *
 * Lifecycle:
 *   create (pending) -> activate (active) -> revoke (revoked, terminal)
 *
 * GUARDRAILS:
 * - Scopes and sensitivity levels are validated before anything is stored
 * - Versions per (user, agent) strictly increase; the database rejects
 *   duplicates and creation retries with the next version
 * - Revoking twice is a no-op that keeps the first revokedAt
 * - consent.created / consent.activated / consent.revoked are published
 *   after the write
 */

import type { DomainEventPublisher } from '@/lib/event-bus.js';
import type {
  ActorContext,
  Consent,
  ConsentChangedData,
  ConsentScope,
  ConsentStatus,
  CreateConsentParams,
  InsertConsentParams,
  Result,
  Sensitivity,
} from '@/types/index.js';
import {
  failure,
  isConsentScope,
  isSensitivity,
  success,
} from '@/types/index.js';

/**
 * Database abstraction interface for ConsentService
 */
export interface ConsentServiceDb {
  getLatestVersion: (
    userId: string,
    agentIdentifier: string
  ) => Promise<number>;
  /**
   * Returns null when (userId, agentIdentifier, version) already exists
   */
  insertConsent: (params: InsertConsentParams) => Promise<Consent | null>;
  getConsent: (consentId: number) => Promise<Consent | null>;
  updateConsentStatus: (
    consentId: number,
    params: { status: ConsentStatus; revokedAt: Date | null }
  ) => Promise<Consent | null>;
  /**
   * Conditional write: returns null when the consent is missing or
   * already revoked
   */
  markRevoked: (consentId: number, revokedAt: Date) => Promise<Consent | null>;
  /**
   * Highest-version active consent for the pair
   */
  findActiveConsent: (
    userId: string,
    agentIdentifier: string
  ) => Promise<Consent | null>;
}

/**
 * ConsentService interface
 */
export interface ConsentService {
  createConsent(
    actor: ActorContext,
    params: CreateConsentParams
  ): Promise<Result<Consent>>;
  activateConsent(
    actor: ActorContext,
    consent: Consent
  ): Promise<Result<Consent>>;
  revokeConsent(
    actor: ActorContext,
    consent: Consent
  ): Promise<Result<Consent>>;
  /**
   * create + activate
   */
  grantConsent(
    actor: ActorContext,
    params: CreateConsentParams
  ): Promise<Result<Consent>>;
  getConsent(consentId: number): Promise<Result<Consent>>;
  findActiveConsent(
    userId: string,
    agentIdentifier: string
  ): Promise<Consent | null>;
}

/**
 * How many times creation retries after losing a version race
 */
export const MAX_VERSION_ATTEMPTS = 5;

// ─────────────────────────────────────────────────────────────
// CONSENT PREDICATES
// ─────────────────────────────────────────────────────────────

export function allowsScope(consent: Consent, scope: string): boolean {
  return consent.scopes.some((granted) => granted === scope);
}

export function allowsAllScopes(
  consent: Consent,
  scopes: Iterable<string>
): boolean {
  for (const scope of scopes) {
    if (!allowsScope(consent, scope)) {
      return false;
    }
  }
  return true;
}

export function allowsSensitivity(
  consent: Consent,
  sensitivity: string
): boolean {
  return consent.sensitivityLevels.some((level) => level === sensitivity);
}

/**
 * Validate raw scope and sensitivity lists against the closed sets
 */
export function validateConsentGrant(
  scopes: readonly string[],
  sensitivityLevels: readonly string[]
): Result<{ scopes: ConsentScope[]; sensitivityLevels: Sensitivity[] }> {
  if (scopes.length === 0) {
    return failure('VALIDATION_ERROR', 'At least one scope must be granted');
  }
  const invalidScopes = scopes.filter((scope) => !isConsentScope(scope));
  if (invalidScopes.length > 0) {
    return failure('VALIDATION_ERROR', 'Unsupported scopes requested', {
      scopes: invalidScopes,
    });
  }

  if (sensitivityLevels.length === 0) {
    return failure(
      'VALIDATION_ERROR',
      'At least one sensitivity level must be granted'
    );
  }
  const invalidLevels = sensitivityLevels.filter(
    (level) => !isSensitivity(level)
  );
  if (invalidLevels.length > 0) {
    return failure('VALIDATION_ERROR', 'Unsupported sensitivity levels', {
      sensitivityLevels: invalidLevels,
    });
  }

  return success({
    scopes: [...new Set(scopes.filter(isConsentScope))],
    sensitivityLevels: [...new Set(sensitivityLevels.filter(isSensitivity))],
  });
}

function toEventData(consent: Consent): ConsentChangedData {
  return {
    consentId: consent.id,
    userId: consent.userId,
    agentIdentifier: consent.agentIdentifier,
    version: consent.version,
    status: consent.status,
    scopes: [...consent.scopes],
    sensitivityLevels: [...consent.sensitivityLevels],
    revokedAt: consent.revokedAt,
  };
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create ConsentService instance
 */
export function createConsentService(deps: {
  db: ConsentServiceDb;
  events: DomainEventPublisher;
}): ConsentService {
  const { db, events } = deps;

  async function createConsent(
    actor: ActorContext,
    params: CreateConsentParams
  ): Promise<Result<Consent>> {
    if (params.userId.trim() === '') {
      return failure('VALIDATION_ERROR', 'User ID is required');
    }
    if (params.agentIdentifier.trim() === '') {
      return failure('VALIDATION_ERROR', 'Agent identifier is required');
    }

    const validated = validateConsentGrant(
      params.scopes,
      params.sensitivityLevels
    );
    if (!validated.success) {
      return validated;
    }

    try {
      for (let attempt = 0; attempt < MAX_VERSION_ATTEMPTS; attempt++) {
        const latest = await db.getLatestVersion(
          params.userId,
          params.agentIdentifier
        );
        const consent = await db.insertConsent({
          userId: params.userId,
          agentIdentifier: params.agentIdentifier,
          scopes: validated.data.scopes,
          sensitivityLevels: validated.data.sensitivityLevels,
          status: 'pending',
          version: latest + 1,
        });
        if (consent !== null) {
          events.publish('consent.created', actor, toEventData(consent));
          return success(consent);
        }
      }
    } catch {
      return failure('INTERNAL_ERROR', 'Failed to create consent');
    }

    return failure(
      'CONFLICT',
      'Could not allocate a consent version; too many concurrent grants'
    );
  }

  async function activateConsent(
    actor: ActorContext,
    consent: Consent
  ): Promise<Result<Consent>> {
    try {
      const updated = await db.updateConsentStatus(consent.id, {
        status: 'active',
        revokedAt: null,
      });
      if (updated === null) {
        return failure('NOT_FOUND', 'Consent not found');
      }
      events.publish('consent.activated', actor, toEventData(updated));
      return success(updated);
    } catch {
      return failure('INTERNAL_ERROR', 'Failed to activate consent');
    }
  }

  return {
    createConsent,
    activateConsent,

    /**
     * Revoke a consent; no-op when it is already revoked
     */
    async revokeConsent(
      actor: ActorContext,
      consent: Consent
    ): Promise<Result<Consent>> {
      if (consent.status === 'revoked') {
        return success(consent);
      }

      try {
        const revoked = await db.markRevoked(consent.id, new Date());
        if (revoked === null) {
          // Lost the race, or it was revoked before this snapshot was read
          const current = await db.getConsent(consent.id);
          if (current === null) {
            return failure('NOT_FOUND', 'Consent not found');
          }
          return success(current);
        }
        events.publish('consent.revoked', actor, toEventData(revoked));
        return success(revoked);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to revoke consent');
      }
    },

    async grantConsent(
      actor: ActorContext,
      params: CreateConsentParams
    ): Promise<Result<Consent>> {
      const created = await createConsent(actor, params);
      if (!created.success) {
        return created;
      }
      return activateConsent(actor, created.data);
    },

    async getConsent(consentId: number): Promise<Result<Consent>> {
      try {
        const consent = await db.getConsent(consentId);
        if (consent === null) {
          return failure('NOT_FOUND', 'Consent not found');
        }
        return success(consent);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to load consent');
      }
    },

    async findActiveConsent(
      userId: string,
      agentIdentifier: string
    ): Promise<Consent | null> {
      return db.findActiveConsent(userId, agentIdentifier);
    },
  };
}
