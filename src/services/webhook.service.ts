/**
 * WebhookService Implementation
 *
 * SCOPE: Signed outbound delivery of domain events to subscribed companies
 *
 * GUARDRAILS:
 * - Runs as an event-bus listener, so delivery happens only after the
 *   mutation that produced the event has been stored
 * - Each subscription is isolated: one failing endpoint does not stop the rest
 * - A failed request is recorded, never retried in place
 * - WEBHOOK_FAILURE_THRESHOLD consecutive failures park the subscription in 'error'
 */

import { createHmac } from 'node:crypto';

import { OUTBOUND_TIMEOUT_MS } from '@/lib/config.js';
import type { DomainEventBus } from '@/lib/event-bus.js';
import type { Logger } from '@/lib/logger.js';
import type {
  DomainEventEnvelope,
  DomainEventName,
  WebhookData,
  WebhookDeliveryState,
  WebhookSubscription,
} from '@/types/index.js';
import {
  WEBHOOK_FAILURE_THRESHOLD,
  WEBHOOK_REQUIRED_FIELDS,
} from '@/types/index.js';

/**
 * Database abstraction interface for WebhookService
 */
export interface WebhookServiceDb {
  listActiveSubscriptions: (
    event: DomainEventName
  ) => Promise<WebhookSubscription[]>;
  saveDeliveryState: (
    subscriptionId: string,
    state: WebhookDeliveryState
  ) => Promise<void>;
}

export interface DispatchSummary {
  delivered: number;
  failed: number;
  skipped: number;
}

export interface WebhookDispatcher {
  dispatch(event: DomainEventName, data: WebhookData): Promise<DispatchSummary>;
}

// ─────────────────────────────────────────────────────────────
// Payload helpers
// ─────────────────────────────────────────────────────────────

export function hasRequiredFields(
  event: DomainEventName,
  data: WebhookData
): boolean {
  return WEBHOOK_REQUIRED_FIELDS[event].every(
    (field) => data[field] !== undefined && data[field] !== null
  );
}

/**
 * Compact JSON with keys in sorted order (payloads are flat)
 */
export function canonicalJson(payload: WebhookData): string {
  const sorted: WebhookData = {};
  for (const key of Object.keys(payload).sort()) {
    const value = payload[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return JSON.stringify(sorted);
}

export function signPayload(secret: string, payload: WebhookData): string {
  return createHmac('sha256', secret)
    .update(canonicalJson(payload))
    .digest('hex');
}

/**
 * Flatten a domain event into the snake_case webhook body
 */
export function toWebhookData(
  event: DomainEventEnvelope<DomainEventName>
): WebhookData {
  const { data } = event;
  if ('consentId' in data) {
    const body: WebhookData = {
      consent_id: data.consentId,
      user_id: data.userId,
      agent_identifier: data.agentIdentifier,
      status: data.status,
    };
    if (event.name === 'consent.revoked') {
      body.revoked_at = data.revokedAt?.toISOString() ?? null;
    }
    return body;
  }
  if ('title' in data) {
    return {
      entry_id: data.entryId,
      title: data.title,
      sensitivity: data.sensitivity,
      entry_type: data.entryType,
    };
  }
  return { entry_id: data.entryId };
}

// ─────────────────────────────────────────────────────────────
// Delivery bookkeeping
// ─────────────────────────────────────────────────────────────

export function recordSuccess(
  subscription: WebhookSubscription,
  at: Date
): WebhookDeliveryState {
  return {
    status: 'active',
    failureCount: 0,
    lastSuccessAt: at,
    lastFailureAt: subscription.lastFailureAt,
    lastError: '',
  };
}

export function recordFailure(
  subscription: WebhookSubscription,
  message: string,
  at: Date
): WebhookDeliveryState {
  const failureCount = subscription.failureCount + 1;
  return {
    status:
      failureCount >= WEBHOOK_FAILURE_THRESHOLD ? 'error' : subscription.status,
    failureCount,
    lastSuccessAt: subscription.lastSuccessAt,
    lastFailureAt: at,
    lastError: message,
  };
}

/**
 * Create the webhook dispatcher
 */
export function createWebhookDispatcher(deps: {
  db: WebhookServiceDb;
  logger: Logger;
  fetch?: typeof fetch;
  timeoutMs?: number;
  now?: () => Date;
}): WebhookDispatcher {
  const { db } = deps;
  const log = deps.logger.child({ component: 'webhooks' });
  const fetchImpl = deps.fetch ?? fetch;
  const timeoutMs = deps.timeoutMs ?? OUTBOUND_TIMEOUT_MS;
  const now = deps.now ?? (() => new Date());

  async function deliver(
    subscription: WebhookSubscription,
    body: WebhookData
  ): Promise<void> {
    const response = await fetchImpl(subscription.targetUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Webhook endpoint responded ${response.status}`);
    }
  }

  return {
    async dispatch(
      event: DomainEventName,
      data: WebhookData
    ): Promise<DispatchSummary> {
      const summary: DispatchSummary = { delivered: 0, failed: 0, skipped: 0 };
      const subscriptions = await db.listActiveSubscriptions(event);

      for (const subscription of subscriptions) {
        if (!hasRequiredFields(event, data)) {
          log.debug(
            { event, subscriptionId: subscription.id },
            'Skipping webhook dispatch due to incomplete payload'
          );
          summary.skipped++;
          continue;
        }

        const payload: WebhookData = {
          event,
          ts: now().toISOString(),
          ...data,
        };
        const body: WebhookData = {
          ...payload,
          signature: signPayload(subscription.secret, payload),
        };

        let outcome: 'delivered' | 'failed';
        let state: WebhookDeliveryState;
        try {
          await deliver(subscription, body);
          outcome = 'delivered';
          state = recordSuccess(subscription, now());
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          log.warn(
            { event, subscriptionId: subscription.id, err: error },
            'Webhook delivery failed'
          );
          outcome = 'failed';
          state = recordFailure(subscription, message, now());
        }
        summary[outcome]++;

        // A failed bookkeeping write must not stop the remaining subscriptions
        try {
          await db.saveDeliveryState(subscription.id, state);
        } catch (error) {
          log.error(
            { event, subscriptionId: subscription.id, err: error },
            'Failed to record webhook delivery state'
          );
        }
      }

      return summary;
    },
  };
}

/**
 * Forward every domain event to the dispatcher
 */
export function registerWebhookDispatcher(
  bus: Pick<DomainEventBus, 'subscribeAll'>,
  dispatcher: WebhookDispatcher
): () => void {
  return bus.subscribeAll(async (event) => {
    await dispatcher.dispatch(event.name, toWebhookData(event));
  });
}
