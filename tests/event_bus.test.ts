import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBus, type TransitionPayload } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { createLogStub, flushPromises } from './helpers/fakes.js';

const activation: TransitionPayload = {
  type: 'activated',
  ts: 3000,
  context: 'garden',
  interaction: 'PersonPettingPet',
  slots: ['person', 'cat'],
  firstObservedAt: 0,
  lastObservedAt: 3000
};

describe('EventBus', () => {
  let log: ReturnType<typeof createLogStub>;
  let metrics: MetricsRegistry;
  let bus: EventBus;

  beforeEach(() => {
    log = createLogStub();
    metrics = new MetricsRegistry();
    bus = new EventBus({ log, metrics });
  });

  it('delivers transitions to every listener and logs them', () => {
    const first = vi.fn();
    const second = vi.fn();
    bus.onTransition(first);
    bus.onTransition(second);

    const delivered = bus.emitTransition(activation);

    expect(delivered).toEqual(activation);
    expect(first).toHaveBeenCalledWith(activation);
    expect(second).toHaveBeenCalledWith(activation);
    expect(log.info).toHaveBeenCalledWith(
      { context: 'garden', interaction: 'PersonPettingPet', slots: ['person', 'cat'], sustainedMs: 3000 },
      'Interaction activated'
    );
  });

  it('records transitions in metrics', () => {
    bus.emitTransition(activation);
    bus.emitTransition({ ...activation, type: 'cleared', ts: 9000 });

    const snapshot = metrics.snapshot();
    expect(snapshot.transitions.total).toBe(2);
    expect(snapshot.transitions.byType).toEqual({ activated: 1, cleared: 1 });
    expect(snapshot.transitions.byInteraction).toEqual({ PersonPettingPet: 2 });
    expect(snapshot.transitions.lastAt).toBe(new Date(9000).toISOString());
    expect(snapshot.contexts.garden?.counters).toEqual({
      'transitions.activated': 1,
      'transitions.cleared': 1
    });
  });

  it('normalizes Date and missing timestamps', () => {
    expect(bus.emitTransition({ ...activation, ts: new Date(1234) }).ts).toBe(1234);

    vi.spyOn(Date, 'now').mockReturnValue(5555);
    try {
      expect(bus.emitTransition({ ...activation, ts: undefined }).ts).toBe(5555);
    } finally {
      vi.restoreAllMocks();
    }
  });

  it('stops delivering after unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = bus.onTransition(listener);
    expect(bus.listenerCount()).toBe(1);
    unsubscribe();
    bus.emitTransition(activation);
    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount()).toBe(0);
  });

  it('ListenerIsolation keeps delivering when a listener throws', () => {
    const healthy = vi.fn();
    bus.onTransition(() => {
      throw new Error('listener broke');
    });
    bus.onTransition(healthy);

    expect(() => bus.emitTransition(activation)).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(metrics.snapshot().publish.failures).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ context: 'garden', interaction: 'PersonPettingPet' }),
      'Transition listener failed'
    );
  });

  it('catches rejected listener promises', async () => {
    bus.onTransition(async () => {
      throw new Error('async failure');
    });

    bus.emitTransition(activation);
    await flushPromises();

    expect(metrics.snapshot().publish.lastError?.message).toBe('async failure');
    expect(log.error).toHaveBeenCalledTimes(1);
  });
});
