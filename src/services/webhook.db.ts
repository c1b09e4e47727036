/**
 * WebhookService Database Adapter
 * Implements WebhookServiceDb interface using Supabase
 *
 * Table: webhook_subscriptions (events is a text[] column)
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  DomainEventName,
  WebhookDeliveryState,
  WebhookStatus,
  WebhookSubscription,
} from '@/types/index.js';

import type { WebhookServiceDb } from './webhook.service.js';

interface WebhookSubscriptionRow {
  id: string;
  company_id: string;
  target_url: string;
  secret: string;
  events: string[] | null;
  status: string;
  failure_count: number;
  last_success_at: string | null;
  last_failure_at: string | null;
  last_error: string | null;
}

function parseStatus(value: string): WebhookStatus {
  if (value === 'active' || value === 'paused' || value === 'error') {
    return value;
  }
  throw new Error(`Unknown webhook status in storage: ${value}`);
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function mapRowToSubscription(row: WebhookSubscriptionRow): WebhookSubscription {
  return {
    id: row.id,
    companyId: row.company_id,
    targetUrl: row.target_url,
    secret: row.secret,
    events: row.events ?? [],
    status: parseStatus(row.status),
    failureCount: row.failure_count,
    lastSuccessAt: toDate(row.last_success_at),
    lastFailureAt: toDate(row.last_failure_at),
    lastError: row.last_error ?? '',
  };
}

/**
 * Create WebhookServiceDb implementation using Supabase
 */
export function createWebhookServiceDb(
  supabase: SupabaseClient
): WebhookServiceDb {
  return {
    async listActiveSubscriptions(
      event: DomainEventName
    ): Promise<WebhookSubscription[]> {
      const { data, error } = await supabase
        .from('webhook_subscriptions')
        .select('*')
        .eq('status', 'active')
        .contains('events', [event]);

      if (error !== null) {
        throw new Error(`Failed to list webhook subscriptions: ${error.message}`);
      }

      return (data as WebhookSubscriptionRow[]).map(mapRowToSubscription);
    },

    async saveDeliveryState(
      subscriptionId: string,
      state: WebhookDeliveryState
    ): Promise<void> {
      const { error } = await supabase
        .from('webhook_subscriptions')
        .update({
          status: state.status,
          failure_count: state.failureCount,
          last_success_at: state.lastSuccessAt?.toISOString() ?? null,
          last_failure_at: state.lastFailureAt?.toISOString() ?? null,
          last_error: state.lastError,
          updated_at: new Date().toISOString(),
        })
        .eq('id', subscriptionId);

      if (error !== null) {
        throw new Error(`Failed to save webhook delivery state: ${error.message}`);
      }
    },
  };
}
