/**
 * Webhook Types
 */

import type { DomainEventName } from './events.js';

export type WebhookStatus = 'active' | 'paused' | 'error';

/**
 * Consecutive failures after which a subscription is parked in 'error'
 */
export const WEBHOOK_FAILURE_THRESHOLD = 3;

/**
 * Outbound HTTP subscription owned by a company
 */
export interface WebhookSubscription {
  id: string;
  companyId: string;
  targetUrl: string;
  secret: string;
  events: string[];
  status: WebhookStatus;
  failureCount: number;
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
  lastError: string;
}

/**
 * Delivery bookkeeping persisted after each attempt
 */
export interface WebhookDeliveryState {
  status: WebhookStatus;
  failureCount: number;
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
  lastError: string;
}

/**
 * Flat JSON payload fields merged into the signed body
 */
export type WebhookData = Record<
  string,
  string | number | boolean | null
>;

/**
 * Fields a payload must carry (non-null) before it is delivered
 */
export const WEBHOOK_REQUIRED_FIELDS: Readonly<
  Record<DomainEventName, readonly string[]>
> = {
  'memory.entry.created': ['entry_id'],
  'memory.entry.updated': ['entry_id'],
  'memory.entry.deleted': ['entry_id'],
  'consent.created': ['consent_id', 'agent_identifier'],
  'consent.activated': ['consent_id', 'agent_identifier'],
  'consent.revoked': ['consent_id', 'agent_identifier'],
};
