/**
 * Policy Engine
 *
 * Decides whether an agent may perform an action for a subject, given the
 * subject's highest-version active consent for that agent.
 *
 * Order of checks (first failure wins):
 *   1. an active consent exists
 *   2. the action's required scope is granted
 *   3. the sensitivity is recognized and covered by the consent
 */

import type {
  Consent,
  ConsentScope,
  PolicyContext,
  Result,
  Sensitivity,
} from '@/types/index.js';
import {
  SCOPE_MEMORY_READ,
  SCOPE_MEMORY_SEARCH,
  SCOPE_MEMORY_WRITE,
  denied,
  isSensitivity,
  sensitivityRank,
  success,
} from '@/types/index.js';

import { allowsScope, allowsSensitivity } from './consent.service.js';

/**
 * Action -> scope table. Actions not listed need no scope.
 */
export const ACTION_SCOPE_MAP: ReadonlyMap<string, ConsentScope> = new Map([
  ['memory:list', SCOPE_MEMORY_READ],
  ['memory:retrieve', SCOPE_MEMORY_READ],
  ['memory:create', SCOPE_MEMORY_WRITE],
  ['memory:update', SCOPE_MEMORY_WRITE],
  ['memory:delete', SCOPE_MEMORY_WRITE],
  ['memory:query', SCOPE_MEMORY_SEARCH],
]);

/**
 * Where the engine finds consents
 */
export interface PolicyConsentLookup {
  findActiveConsent: (
    userId: string,
    agentIdentifier: string
  ) => Promise<Consent | null>;
}

export interface EnforceParams {
  subjectId: string;
  agentIdentifier: string;
  action: string;
  sensitivity?: string | null;
}

export interface EnforceMultipleParams {
  subjectId: string;
  agentIdentifier: string;
  action: string;
  sensitivities: Iterable<string>;
}

export interface PolicyEngine {
  enforce(params: EnforceParams): Promise<Result<PolicyContext>>;
  enforceMultiple(params: EnforceMultipleParams): Promise<Result<PolicyContext>>;
}

/**
 * Highest-ranked sensitivity in a collection.
 * Fails on any unrecognized value; an empty collection yields null.
 */
export function maxSensitivity(
  sensitivities: Iterable<string>
): Result<Sensitivity | null> {
  let highest: Sensitivity | null = null;
  for (const value of sensitivities) {
    if (!isSensitivity(value)) {
      return denied(`Unknown sensitivity level: ${value}`);
    }
    if (highest === null || sensitivityRank(value) > sensitivityRank(highest)) {
      highest = value;
    }
  }
  return success(highest);
}

/**
 * Create PolicyEngine instance
 */
export function createPolicyEngine(deps: {
  consents: PolicyConsentLookup;
}): PolicyEngine {
  const { consents } = deps;

  async function enforce(params: EnforceParams): Promise<Result<PolicyContext>> {
    const consent = await consents.findActiveConsent(
      params.subjectId,
      params.agentIdentifier
    );
    if (consent === null) {
      return denied('No active consent found for agent.');
    }

    const requiredScope = ACTION_SCOPE_MAP.get(params.action);
    if (requiredScope !== undefined && !allowsScope(consent, requiredScope)) {
      return denied(
        `Consent does not grant scope '${requiredScope}' for action '${params.action}'.`
      );
    }

    const sensitivity = params.sensitivity ?? null;
    if (sensitivity === null) {
      return success({ consent, action: params.action, sensitivity: null });
    }
    if (!isSensitivity(sensitivity)) {
      return denied(`Unknown sensitivity level: ${sensitivity}`);
    }
    if (!allowsSensitivity(consent, sensitivity)) {
      return denied(
        `Consent does not permit '${sensitivity}' data for action '${params.action}'.`
      );
    }

    return success({ consent, action: params.action, sensitivity });
  }

  return {
    enforce,

    async enforceMultiple(
      params: EnforceMultipleParams
    ): Promise<Result<PolicyContext>> {
      const highest = maxSensitivity(params.sensitivities);
      if (!highest.success) {
        return highest;
      }
      return enforce({
        subjectId: params.subjectId,
        agentIdentifier: params.agentIdentifier,
        action: params.action,
        sensitivity: highest.data,
      });
    },
  };
}
