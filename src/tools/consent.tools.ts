/**
 * Consent tools: consent.grant, consent.revoke
 *
 * Both need the administrative consent.manage scope on the token but no
 * consent reference, and both act only for the token's own subject.
 */

import type { Result } from '@/types/index.js';
import {
  SCOPE_CONSENT_MANAGE,
  actorFromAuthContext,
  denied,
  success,
} from '@/types/index.js';

import { pickField, readInteger, readStringList } from './payload.js';
import type { ToolDeps, ToolHandler, ToolOutput, ToolRequest } from './types.js';

export function createConsentTools(
  deps: Pick<ToolDeps, 'authenticator' | 'consents'>
): Record<string, ToolHandler> {
  const { authenticator, consents } = deps;

  async function grant({
    bearerToken,
    payload,
    requestId,
  }: ToolRequest): Promise<Result<ToolOutput>> {
    const userId = payload.user_id;
    const agentIdentifier = pickField(payload, ['agent_identifier', 'agent_id']);
    const rawScopes = payload.scopes;
    const rawLevels = pickField(payload, ['sensitivity_levels', 'sensitivities']);

    if (typeof userId !== 'string') {
      return denied('user_id must be provided as a string.');
    }
    if (typeof agentIdentifier !== 'string') {
      return denied('agent_identifier must be provided as a string.');
    }
    const scopes = readStringList(rawScopes);
    if (scopes === null || scopes.length === 0) {
      return denied('At least one scope must be granted.');
    }
    const sensitivityLevels = readStringList(rawLevels);
    if (sensitivityLevels === null || sensitivityLevels.length === 0) {
      return denied('At least one sensitivity level must be provided.');
    }

    const parsed = await authenticator.parse(bearerToken, {
      requiredScopes: [SCOPE_CONSENT_MANAGE],
      requireConsent: false,
    });
    if (!parsed.success) {
      return parsed;
    }
    if (parsed.data.subjectId !== userId) {
      return denied('Tokens may only grant consent for the authenticated user.');
    }

    const granted = await consents.grantConsent(
      actorFromAuthContext(parsed.data, requestId),
      {
        userId: parsed.data.subjectId,
        agentIdentifier,
        scopes,
        sensitivityLevels,
      }
    );
    if (!granted.success) {
      return granted;
    }

    return success({ consent_id: granted.data.id, version: granted.data.version });
  }

  async function revoke({
    bearerToken,
    payload,
    requestId,
  }: ToolRequest): Promise<Result<ToolOutput>> {
    const consentId = readInteger(payload.consent_id);
    if (consentId === null) {
      return denied('consent_id must be provided as an integer.');
    }

    const parsed = await authenticator.parse(bearerToken, {
      requiredScopes: [SCOPE_CONSENT_MANAGE],
      requireConsent: false,
    });
    if (!parsed.success) {
      return parsed;
    }

    const consent = await consents.getConsent(consentId);
    if (!consent.success || consent.data.userId !== parsed.data.subjectId) {
      return denied('Consent not found for this user.');
    }

    const revoked = await consents.revokeConsent(
      actorFromAuthContext(parsed.data, requestId),
      consent.data
    );
    if (!revoked.success) {
      return revoked;
    }

    return success({ ok: true, status: revoked.data.status });
  }

  return {
    'consent.grant': grant,
    'consent.revoke': revoke,
  };
}
