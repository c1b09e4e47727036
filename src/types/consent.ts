/**
 * Consent Domain Types
 *
 * A consent is a versioned grant from a user to an agent naming which
 * scopes and which sensitivity levels the agent may touch.
 */

import type { Sensitivity } from './memory.js';

/**
 * Scopes a consent can grant
 */
export const CONSENT_SCOPES = [
  'memory.read',
  'memory.write',
  'memory.search',
] as const;

export type ConsentScope = (typeof CONSENT_SCOPES)[number];

export const SCOPE_MEMORY_READ: ConsentScope = 'memory.read';
export const SCOPE_MEMORY_WRITE: ConsentScope = 'memory.write';
export const SCOPE_MEMORY_SEARCH: ConsentScope = 'memory.search';

/**
 * Token-only scope; consents never carry it
 */
export const SCOPE_CONSENT_MANAGE = 'consent.manage';

export function isConsentScope(value: unknown): value is ConsentScope {
  return CONSENT_SCOPES.some((scope) => scope === value);
}

export type ConsentStatus = 'pending' | 'active' | 'revoked' | 'expired';

/**
 * Consent entity
 * (userId, agentIdentifier, version) is unique
 */
export interface Consent {
  id: number;
  userId: string;
  agentIdentifier: string;
  scopes: ConsentScope[];
  sensitivityLevels: Sensitivity[];
  status: ConsentStatus;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  revokedAt: Date | null;
}

/**
 * Input for creating a consent. Values are checked against the
 * closed scope and sensitivity sets before anything is stored.
 */
export interface CreateConsentParams {
  userId: string;
  agentIdentifier: string;
  scopes: string[];
  sensitivityLevels: string[];
}

/**
 * Row values handed to the database once validated
 */
export interface InsertConsentParams {
  userId: string;
  agentIdentifier: string;
  scopes: ConsentScope[];
  sensitivityLevels: Sensitivity[];
  status: ConsentStatus;
  version: number;
}
