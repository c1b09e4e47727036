/**
 * Bearer Token Authenticator
 *
 * Turns a raw bearer token into an AuthContext and re-checks the policy
 * engine for each action an agent attempts.
 *
 * parse():
 *   - strips an optional "Bearer " prefix (any case)
 *   - verifies the token (signature, expiry) via the injected verifier
 *   - resolves subject, agent, and scopes from the claims
 *   - optionally requires the consent named by consent_id to be active
 *     and bound to the same (subject, agent) pair
 *   - requires the requested scopes in both the token and the consent
 *
 * Every failure is PERMISSION_DENIED with an internal message.
 */

import type { TokenClaims, TokenVerifier } from '@/lib/jwt.js';
import type {
  AuthContext,
  Consent,
  PolicyContext,
  Result,
  Subject,
} from '@/types/index.js';
import { denied, success } from '@/types/index.js';

import { allowsAllScopes } from './consent.service.js';
import type { PolicyEngine } from './policy.service.js';

/**
 * Subject directory (users table)
 */
export interface SubjectDirectory {
  findSubject: (subjectId: string) => Promise<Subject | null>;
}

/**
 * Consent lookup by id
 */
export interface AuthConsentLookup {
  getConsent: (consentId: number) => Promise<Consent | null>;
}

export interface ParseOptions {
  requiredScopes?: Iterable<string>;
  requireConsent?: boolean;
}

export interface PermissionCheck {
  action: string;
  sensitivity?: string | null;
  sensitivities?: Iterable<string>;
}

export interface ValidateOptions extends ParseOptions, PermissionCheck {}

export interface BearerTokenAuthenticator {
  parse(rawToken: string, options?: ParseOptions): Promise<Result<AuthContext>>;
  ensurePermissions(
    context: AuthContext,
    check: PermissionCheck
  ): Promise<Result<PolicyContext>>;
  validate(
    rawToken: string,
    options: ValidateOptions
  ): Promise<Result<AuthContext>>;
}

const BEARER_PREFIX = /^bearer\s+/i;

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Claim value -> non-empty string identifier, or null
 */
function claimToIdentifier(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * First claim that is neither absent nor empty
 */
function firstClaim(claims: TokenClaims, names: readonly string[]): unknown {
  for (const name of names) {
    const value = claims[name];
    if (value === undefined || value === null || value === '' || value === false) {
      continue;
    }
    if (Array.isArray(value) && value.length === 0) {
      continue;
    }
    return value;
  }
  return undefined;
}

/**
 * Normalize a scope claim into a set.
 * Strings are space-delimited, collections are stringified element-wise,
 * and any other scalar becomes a one-element set.
 */
export function normalizeScopes(value: unknown): Set<string> {
  if (value === undefined || value === null) {
    return new Set();
  }
  if (typeof value === 'string') {
    return new Set(value.split(/\s+/).filter((scope) => scope !== ''));
  }
  if (isIterable(value)) {
    return new Set(
      Array.from(value, (scope) => String(scope)).filter((scope) => scope !== '')
    );
  }
  return new Set([String(value)]);
}

/**
 * consent_id claim -> integer id, or null
 */
function parseConsentId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

export function stripBearerPrefix(rawToken: string): string {
  const trimmed = rawToken.trim();
  return trimmed.replace(BEARER_PREFIX, '').trim();
}

/**
 * Create BearerTokenAuthenticator instance
 */
export function createBearerTokenAuthenticator(deps: {
  verifier: TokenVerifier;
  subjects: SubjectDirectory;
  consents: AuthConsentLookup;
  policy: PolicyEngine;
}): BearerTokenAuthenticator {
  const { verifier, subjects, consents, policy } = deps;

  async function parse(
    rawToken: string,
    options: ParseOptions = {}
  ): Promise<Result<AuthContext>> {
    const token = stripBearerPrefix(rawToken);
    if (token === '') {
      return denied('Missing bearer token.');
    }

    const verified = await verifier.verify(token);
    if (!verified.success) {
      return denied(`Invalid access token: ${verified.error.message}`);
    }
    const claims = verified.data;

    const subjectId = claimToIdentifier(firstClaim(claims, ['sub', 'user_id']));
    if (subjectId === null) {
      return denied('Token is missing subject information.');
    }
    const agentIdentifier = claimToIdentifier(
      firstClaim(claims, ['agent_id', 'agent'])
    );
    if (agentIdentifier === null) {
      return denied('Token is missing agent identifier.');
    }

    const subject = await subjects.findSubject(subjectId);
    if (subject === null) {
      return denied('Token subject no longer exists.');
    }

    const scopes = normalizeScopes(firstClaim(claims, ['scopes', 'scope']));
    const requiredScopes = [...(options.requiredScopes ?? [])];

    let consent: Consent | null = null;
    if (options.requireConsent ?? true) {
      const consentId = parseConsentId(claims.consent_id);
      if (consentId === null) {
        return denied('Token is missing consent reference.');
      }
      consent = await consents.getConsent(consentId);
      if (
        consent === null ||
        consent.status !== 'active' ||
        consent.userId !== subject.id ||
        consent.agentIdentifier !== agentIdentifier
      ) {
        return denied('Consent is no longer active for this agent.');
      }
    }

    const missing = requiredScopes.filter((scope) => !scopes.has(scope));
    if (missing.length > 0) {
      return denied(`Token is missing required scopes: ${missing.join(', ')}`);
    }
    if (consent !== null && !allowsAllScopes(consent, requiredScopes)) {
      return denied('Consent does not include required scopes.');
    }

    return success({
      subjectId: subject.id,
      agentIdentifier,
      scopes,
      consent,
      claims,
    });
  }

  async function ensurePermissions(
    context: AuthContext,
    check: PermissionCheck
  ): Promise<Result<PolicyContext>> {
    if (context.consent === null) {
      return denied('Consent context missing from token.');
    }

    const decision =
      check.sensitivities !== undefined
        ? await policy.enforceMultiple({
            subjectId: context.subjectId,
            agentIdentifier: context.agentIdentifier,
            action: check.action,
            sensitivities: check.sensitivities,
          })
        : await policy.enforce({
            subjectId: context.subjectId,
            agentIdentifier: context.agentIdentifier,
            action: check.action,
            sensitivity: check.sensitivity ?? null,
          });
    if (!decision.success) {
      return decision;
    }

    if (decision.data.consent.id !== context.consent.id) {
      return denied('Token consent no longer matches the active policy.');
    }
    return decision;
  }

  return {
    parse,
    ensurePermissions,

    async validate(
      rawToken: string,
      options: ValidateOptions
    ): Promise<Result<AuthContext>> {
      const parsed = await parse(rawToken, options);
      if (!parsed.success) {
        return parsed;
      }
      const permitted = await ensurePermissions(parsed.data, options);
      if (!permitted.success) {
        return permitted;
      }
      return parsed;
    },
  };
}
