/**
 * Domain event bus
 */

import { describe, it, expect, vi } from 'vitest';

import { createDomainEventBus } from '@/lib/event-bus.js';
import type { DomainEventEnvelope } from '@/types/index.js';

import { createSilentLogger } from '../../mocks/index.js';
import { createTestActor } from '../../helpers/test-utils.js';

const entryData = {
  entryId: 1,
  title: 'Coffee order',
  version: 1,
  sensitivity: 'public',
  entryType: 'note',
} as const;

describe('createDomainEventBus', () => {
  it('should deliver to listeners of the published event only', async () => {
    const bus = createDomainEventBus({ logger: createSilentLogger() });
    const created: Array<DomainEventEnvelope<'memory.entry.created'>> = [];
    const deleted = vi.fn();
    bus.subscribe('memory.entry.created', (event) => {
      created.push(event);
    });
    bus.subscribe('memory.entry.deleted', deleted);

    bus.publish('memory.entry.created', createTestActor(), entryData);
    await bus.flush();

    expect(created).toHaveLength(1);
    expect(created[0]?.name).toBe('memory.entry.created');
    expect(created[0]?.data).toEqual(entryData);
    expect(created[0]?.actor.agentIdentifier).toBe('agent-alpha');
    expect(deleted).not.toHaveBeenCalled();
  });

  it('should not run listeners synchronously with publish', async () => {
    const bus = createDomainEventBus({ logger: createSilentLogger() });
    const listener = vi.fn();
    bus.subscribe('memory.entry.created', listener);

    bus.publish('memory.entry.created', createTestActor(), entryData);
    expect(listener).not.toHaveBeenCalled();

    await bus.flush();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should deliver every event to catch-all listeners', async () => {
    const bus = createDomainEventBus({ logger: createSilentLogger() });
    const names: string[] = [];
    bus.subscribeAll((event) => {
      names.push(event.name);
    });

    bus.publish('memory.entry.created', createTestActor(), entryData);
    bus.publish('memory.entry.deleted', createTestActor(), { entryId: 1 });
    await bus.flush();

    expect(names).toEqual(['memory.entry.created', 'memory.entry.deleted']);
  });

  it('should isolate a failing listener from the others', async () => {
    const bus = createDomainEventBus({ logger: createSilentLogger() });
    const survivor = vi.fn();
    bus.subscribe('memory.entry.created', async () => {
      throw new Error('listener exploded');
    });
    bus.subscribe('memory.entry.created', survivor);

    expect(() =>
      bus.publish('memory.entry.created', createTestActor(), entryData)
    ).not.toThrow();
    await bus.flush();

    expect(survivor).toHaveBeenCalledTimes(1);
  });

  it('should stop delivering after unsubscribe', async () => {
    const bus = createDomainEventBus({ logger: createSilentLogger() });
    const listener = vi.fn();
    const unsubscribe = bus.subscribe('memory.entry.created', listener);
    unsubscribe();

    bus.publish('memory.entry.created', createTestActor(), entryData);
    await bus.flush();

    expect(listener).not.toHaveBeenCalled();
  });

  it('should wait for listeners started by other listeners', async () => {
    const bus = createDomainEventBus({ logger: createSilentLogger() });
    const deleted = vi.fn();
    bus.subscribe('memory.entry.created', () => {
      bus.publish('memory.entry.deleted', createTestActor(), { entryId: 1 });
    });
    bus.subscribe('memory.entry.deleted', deleted);

    bus.publish('memory.entry.created', createTestActor(), entryData);
    await bus.flush();

    expect(deleted).toHaveBeenCalledTimes(1);
  });
});
