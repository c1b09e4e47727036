/**
 * event-bus.ts - Typed domain event bus
 *
 * Services publish after their write has been stored. Listeners run
 * asynchronously and in isolation: a failing listener is logged and
 * never reaches the publisher or the other listeners.
 */

import type {
  ActorContext,
  DomainEventEnvelope,
  DomainEventMap,
  DomainEventName,
} from '@/types/index.js';

import { logger as rootLogger, type Logger } from './logger.js';

export type DomainEventListener<K extends DomainEventName> = (
  event: DomainEventEnvelope<K>
) => void | Promise<void>;

export type AnyDomainEventListener = DomainEventListener<DomainEventName>;

export interface DomainEventBus {
  subscribe<K extends DomainEventName>(
    name: K,
    listener: DomainEventListener<K>
  ): () => void;
  subscribeAll(listener: AnyDomainEventListener): () => void;
  publish<K extends DomainEventName>(
    name: K,
    actor: ActorContext,
    data: DomainEventMap[K]
  ): void;
  /**
   * Resolves once every listener started so far has settled
   */
  flush(): Promise<void>;
}

/**
 * Publisher side only; what services depend on
 */
export type DomainEventPublisher = Pick<DomainEventBus, 'publish'>;

type ListenerRegistry = {
  [K in DomainEventName]: Set<DomainEventListener<K>>;
};

export function createDomainEventBus(
  options: { logger?: Logger } = {}
): DomainEventBus {
  const log = (options.logger ?? rootLogger).child({ component: 'event-bus' });
  const listeners: ListenerRegistry = {
    'memory.entry.created': new Set(),
    'memory.entry.updated': new Set(),
    'memory.entry.deleted': new Set(),
    'consent.created': new Set(),
    'consent.activated': new Set(),
    'consent.revoked': new Set(),
  };
  const catchAll = new Set<AnyDomainEventListener>();
  const pending = new Set<Promise<void>>();

  function run(
    eventName: DomainEventName,
    invoke: () => void | Promise<void>
  ): void {
    const task: Promise<void> = Promise.resolve()
      .then(invoke)
      .catch((err: unknown) => {
        log.error({ err, event: eventName }, 'Event listener failed');
      })
      .finally(() => {
        pending.delete(task);
      });
    pending.add(task);
  }

  return {
    subscribe<K extends DomainEventName>(
      name: K,
      listener: DomainEventListener<K>
    ): () => void {
      const registered: Set<DomainEventListener<K>> = listeners[name];
      registered.add(listener);
      return () => {
        registered.delete(listener);
      };
    },

    subscribeAll(listener: AnyDomainEventListener): () => void {
      catchAll.add(listener);
      return () => {
        catchAll.delete(listener);
      };
    },

    publish<K extends DomainEventName>(
      name: K,
      actor: ActorContext,
      data: DomainEventMap[K]
    ): void {
      const envelope: DomainEventEnvelope<K> = {
        name,
        actor,
        data,
        occurredAt: new Date(),
      };
      const registered: Set<DomainEventListener<K>> = listeners[name];
      for (const listener of registered) {
        run(name, () => listener(envelope));
      }
      for (const listener of catchAll) {
        run(name, () => listener(envelope));
      }
    },

    async flush(): Promise<void> {
      while (pending.size > 0) {
        await Promise.all([...pending]);
      }
    },
  };
}
