/**
 * Authorization Types
 */

import type { Consent } from './consent.js';
import type { Sensitivity } from './memory.js';

/**
 * Actor Context - who is performing the action
 * Services receive it for event attribution and audit
 */
export interface ActorContext {
  type: 'agent' | 'user' | 'system';
  userId?: string;
  agentIdentifier?: string;
  requestId: string;
}

/**
 * System actor for background jobs
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};

/**
 * Result of a successful policy check
 */
export interface PolicyContext {
  consent: Consent;
  action: string;
  sensitivity: Sensitivity | null;
}

/**
 * Identity carried by a verified bearer token
 * consent is null only when the token was parsed without requiring one
 */
export interface AuthContext {
  subjectId: string;
  agentIdentifier: string;
  scopes: ReadonlySet<string>;
  consent: Consent | null;
  claims: Readonly<Record<string, unknown>>;
}

/**
 * Build the actor that attributes mutations to a token holder
 */
export function actorFromAuthContext(
  context: AuthContext,
  requestId: string
): ActorContext {
  return {
    type: 'agent',
    userId: context.subjectId,
    agentIdentifier: context.agentIdentifier,
    requestId,
  };
}

/**
 * Subject (end user) as far as authorization cares
 */
export interface Subject {
  id: string;
}
