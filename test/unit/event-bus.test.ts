/**
 * EventBus Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../src/core/EventBus';
import type { TransitionEvent, TransitionKind } from '../../src/core/types';

function event(kind: TransitionKind, itemId = 'item-1'): TransitionEvent {
  return { kind, itemId, priority: 'normal', from: 'pending', to: 'running', at: 0, attempts: 1 };
}

describe('EventBus', () => {
  it('should deliver after publish returns', async () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.subscribe('dispatched', listener);

    bus.publish(event('dispatched'));
    expect(listener).not.toHaveBeenCalled();

    await bus.drain();
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(event('dispatched'));
  });

  it('should only deliver subscribed kinds', async () => {
    const bus = new EventBus();
    const seen: TransitionKind[] = [];
    bus.subscribe(['succeeded', 'failed'], (e) => {
      seen.push(e.kind);
    });

    bus.publish(event('dispatched'));
    bus.publish(event('failed'));
    bus.publish(event('succeeded'));
    await bus.drain();

    expect(seen).toEqual(['failed', 'succeeded']);
  });

  it('should deliver every kind to a wildcard subscriber', async () => {
    const bus = new EventBus();
    const seen: TransitionKind[] = [];
    bus.subscribe('*', (e) => {
      seen.push(e.kind);
    });

    bus.publish(event('submitted'));
    bus.publish(event('recovered'));
    await bus.drain();

    expect(seen).toEqual(['submitted', 'recovered']);
  });

  it('should isolate a failing listener from the others', async () => {
    const bus = new EventBus();
    const healthy = vi.fn();
    bus.subscribe('failed', () => {
      throw new Error('listener broke');
    });
    bus.subscribe('failed', async () => {
      throw new Error('async listener broke');
    });
    bus.subscribe('failed', healthy);

    expect(() => bus.publish(event('failed'))).not.toThrow();
    await bus.drain();

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(bus.deliveryFailures).toBe(2);
  });

  it('should stop delivering after unsubscribe', async () => {
    const bus = new EventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(['submitted', 'cancelled'], listener);

    unsubscribe();

    bus.publish(event('submitted'));
    await bus.drain();
    expect(listener).not.toHaveBeenCalled();
  });

  it('should wait for slow listeners in drain', async () => {
    const bus = new EventBus();
    let finished = false;
    bus.subscribe('succeeded', async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      finished = true;
    });

    bus.publish(event('succeeded'));
    await bus.drain();

    expect(finished).toBe(true);
  });
});
