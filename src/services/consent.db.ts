/**
 * ConsentService Database Adapter
 * Implements ConsentServiceDb interface using Supabase
 *
 * Table: consents
 *   unique (user_id, agent_identifier, version)
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { UNIQUE_VIOLATION } from '@/lib/supabase.js';
import type {
  Consent,
  ConsentStatus,
  InsertConsentParams,
} from '@/types/index.js';
import { isConsentScope, isSensitivity } from '@/types/index.js';

import type { ConsentServiceDb } from './consent.service.js';

/**
 * Database row type
 */
interface ConsentRow {
  id: number;
  user_id: string;
  agent_identifier: string;
  scopes: string[];
  sensitivity_levels: string[];
  status: string;
  version: number;
  created_at: string;
  updated_at: string;
  revoked_at: string | null;
}

const CONSENT_STATUSES: readonly ConsentStatus[] = [
  'pending',
  'active',
  'revoked',
  'expired',
];

function parseStatus(value: string): ConsentStatus {
  const status = CONSENT_STATUSES.find((candidate) => candidate === value);
  if (status === undefined) {
    throw new Error(`Unknown consent status: ${value}`);
  }
  return status;
}

/**
 * Map database row to Consent entity
 * Unknown scope or sensitivity values in storage are dropped, never widened
 */
function mapRowToConsent(row: ConsentRow): Consent {
  return {
    id: row.id,
    userId: row.user_id,
    agentIdentifier: row.agent_identifier,
    scopes: row.scopes.filter(isConsentScope),
    sensitivityLevels: row.sensitivity_levels.filter(isSensitivity),
    status: parseStatus(row.status),
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    revokedAt: row.revoked_at !== null ? new Date(row.revoked_at) : null,
  };
}

/**
 * Create ConsentServiceDb implementation using Supabase
 */
export function createConsentServiceDb(
  supabase: SupabaseClient
): ConsentServiceDb {
  return {
    async getLatestVersion(
      userId: string,
      agentIdentifier: string
    ): Promise<number> {
      const { data, error } = await supabase
        .from('consents')
        .select('version')
        .eq('user_id', userId)
        .eq('agent_identifier', agentIdentifier)
        .order('version', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to read consent version: ${error.message}`);
      }
      if (data === null) {
        return 0;
      }
      return (data as { version: number }).version;
    },

    async insertConsent(params: InsertConsentParams): Promise<Consent | null> {
      const { data, error } = await supabase
        .from('consents')
        .insert({
          user_id: params.userId,
          agent_identifier: params.agentIdentifier,
          scopes: params.scopes,
          sensitivity_levels: params.sensitivityLevels,
          status: params.status,
          version: params.version,
        })
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return null;
        }
        throw new Error(`Failed to create consent: ${error.message}`);
      }

      return mapRowToConsent(data as ConsentRow);
    },

    async getConsent(consentId: number): Promise<Consent | null> {
      const { data, error } = await supabase
        .from('consents')
        .select('*')
        .eq('id', consentId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get consent: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToConsent(data as ConsentRow);
    },

    async updateConsentStatus(
      consentId: number,
      params: { status: ConsentStatus; revokedAt: Date | null }
    ): Promise<Consent | null> {
      const { data, error } = await supabase
        .from('consents')
        .update({
          status: params.status,
          revoked_at:
            params.revokedAt !== null ? params.revokedAt.toISOString() : null,
          updated_at: new Date().toISOString(),
        })
        .eq('id', consentId)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to update consent: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToConsent(data as ConsentRow);
    },

    async markRevoked(consentId: number, revokedAt: Date): Promise<Consent | null> {
      const { data, error } = await supabase
        .from('consents')
        .update({
          status: 'revoked',
          revoked_at: revokedAt.toISOString(),
          updated_at: new Date().toISOString(),
        })
        .eq('id', consentId)
        .neq('status', 'revoked')
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to revoke consent: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToConsent(data as ConsentRow);
    },

    async findActiveConsent(
      userId: string,
      agentIdentifier: string
    ): Promise<Consent | null> {
      const { data, error } = await supabase
        .from('consents')
        .select('*')
        .eq('user_id', userId)
        .eq('agent_identifier', agentIdentifier)
        .eq('status', 'active')
        .order('version', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to find active consent: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return mapRowToConsent(data as ConsentRow);
    },
  };
}
