import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { InteractionTransition } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LatencyState = Omit<LatencyStats, 'averageMs'>;

type ContextMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
};

type PublishErrorRecord = {
  message: string;
  topic: string | null;
  at: number;
};

export type ContextMetricsSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    level: string;
    byLevel: CounterMap;
    byContext: Record<string, CounterMap>;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  transitions: {
    total: number;
    byType: CounterMap;
    byInteraction: CounterMap;
    lastAt: string | null;
  };
  publish: {
    failures: number;
    lastError: { message: string; topic: string | null; at: string } | null;
  };
  contexts: Record<string, ContextMetricsSnapshot>;
  latencies: Record<string, LatencyStats>;
};

function toIso(value: number | null): string | null {
  return typeof value === 'number' ? new Date(value).toISOString() : null;
}

function mapToObject(map: Map<string, number>): CounterMap {
  return Object.fromEntries(map.entries());
}

function getContextState(store: Map<string, ContextMetricState>, context: string) {
  const existing = store.get(context);
  if (existing) {
    return existing;
  }
  const created: ContextMetricState = {
    counters: new Map(),
    gauges: new Map(),
    lastRunAt: null
  };
  store.set(context, created);
  return created;
}

class MetricsRegistry {
  private readonly events = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByContext = new Map<string, Map<string, number>>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private totalTransitions = 0;
  private readonly transitionsByType = new Map<string, number>();
  private readonly transitionsByInteraction = new Map<string, number>();
  private lastTransitionAt: number | null = null;
  private publishFailures = 0;
  private lastPublishError: PublishErrorRecord | null = null;
  private readonly contextMetrics = new Map<string, ContextMetricState>();
  private readonly latencyStats = new Map<string, LatencyState>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByContext.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.totalTransitions = 0;
    this.transitionsByType.clear();
    this.transitionsByInteraction.clear();
    this.lastTransitionAt = null;
    this.publishFailures = 0;
    this.lastPublishError = null;
    this.contextMetrics.clear();
    this.latencyStats.clear();
    this.events.emit('reset');
  }

  onReset(listener: () => void) {
    this.events.on('reset', listener);
    return () => {
      this.events.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; context?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.context) {
      const byLevel = this.logLevelByContext.get(context.context) ?? new Map<string, number>();
      byLevel.set(normalized, (byLevel.get(normalized) ?? 0) + 1);
      this.logLevelByContext.set(context.context, byLevel);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordTransition(transition: InteractionTransition) {
    this.totalTransitions += 1;
    this.lastTransitionAt = transition.ts;
    this.transitionsByType.set(
      transition.type,
      (this.transitionsByType.get(transition.type) ?? 0) + 1
    );
    this.transitionsByInteraction.set(
      transition.interaction,
      (this.transitionsByInteraction.get(transition.interaction) ?? 0) + 1
    );
    this.incrementContextCounter(transition.context, `transitions.${transition.type}`);
  }

  recordPublishFailure(error: unknown, topic?: string) {
    this.publishFailures += 1;
    this.lastPublishError = {
      message: error instanceof Error ? error.message : String(error),
      topic: topic ?? null,
      at: Date.now()
    };
  }

  incrementContextCounter(context: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getContextState(this.contextMetrics, context);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
    state.lastRunAt = Date.now();
  }

  setContextGauge(context: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getContextState(this.contextMetrics, context);
    state.gauges.set(gauge, value);
    state.lastRunAt = Date.now();
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  async time<T>(metric: string, fn: () => T | Promise<T>): Promise<T> {
    const started = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - started);
    }
  }

  snapshot(): MetricsSnapshot {
    const contexts: Record<string, ContextMetricsSnapshot> = {};
    for (const [name, state] of this.contextMetrics) {
      contexts[name] = {
        counters: mapToObject(state.counters),
        gauges: mapToObject(state.gauges),
        lastRunAt: toIso(state.lastRunAt)
      };
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        ...stats,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    const byContext: Record<string, CounterMap> = {};
    for (const [context, counters] of this.logLevelByContext) {
      byContext[context] = mapToObject(counters);
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        level: this.currentLogLevel,
        byLevel: mapToObject(this.logLevelCounters),
        byContext,
        lastErrorAt: toIso(this.lastErrorAt),
        lastErrorMessage: this.lastErrorMessage
      },
      transitions: {
        total: this.totalTransitions,
        byType: mapToObject(this.transitionsByType),
        byInteraction: mapToObject(this.transitionsByInteraction),
        lastAt: toIso(this.lastTransitionAt)
      },
      publish: {
        failures: this.publishFailures,
        lastError: this.lastPublishError
          ? { ...this.lastPublishError, at: new Date(this.lastPublishError.at).toISOString() }
          : null
      },
      contexts,
      latencies
    };
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
