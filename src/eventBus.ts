import logger, { type LogSink } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { InteractionTransition, TransitionType } from './types.js';

export type TransitionPayload = Omit<InteractionTransition, 'ts'> & {
  ts?: number | Date;
};

export type TransitionListener = (transition: InteractionTransition) => void | Promise<void>;

interface EventBusDependencies {
  log: Pick<LogSink, 'info' | 'error'>;
  metrics?: Pick<MetricsRegistry, 'recordTransition' | 'recordPublishFailure'>;
}

/**
 * Carries interaction transitions from the engine to whoever delivers them.
 *
 * Listener failures, thrown or rejected, are logged and counted here so the engine's
 * state change always stands.
 */
class EventBus {
  private readonly listeners = new Set<TransitionListener>();
  private readonly log: EventBusDependencies['log'];
  private readonly metrics: NonNullable<EventBusDependencies['metrics']>;

  constructor(dependencies: EventBusDependencies = { log: logger }) {
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;
  }

  emitTransition(payload: TransitionPayload): InteractionTransition {
    const transition: InteractionTransition = {
      type: payload.type,
      ts: normalizeTimestamp(payload.ts),
      context: payload.context,
      interaction: payload.interaction,
      slots: [...payload.slots],
      firstObservedAt: payload.firstObservedAt,
      lastObservedAt: payload.lastObservedAt
    };

    this.metrics.recordTransition(transition);
    this.log.info(
      {
        context: transition.context,
        interaction: transition.interaction,
        slots: transition.slots,
        sustainedMs: transition.lastObservedAt - transition.firstObservedAt
      },
      describeTransition(transition.type)
    );

    for (const listener of [...this.listeners]) {
      this.dispatch(listener, transition);
    }

    return transition;
  }

  onTransition(listener: TransitionListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listenerCount() {
    return this.listeners.size;
  }

  private dispatch(listener: TransitionListener, transition: InteractionTransition) {
    let result: void | Promise<void>;
    try {
      result = listener(transition);
    } catch (error) {
      this.reportFailure(error, transition);
      return;
    }
    if (result instanceof Promise) {
      result.catch(error => {
        this.reportFailure(error, transition);
      });
    }
  }

  private reportFailure(error: unknown, transition: InteractionTransition) {
    this.metrics.recordPublishFailure(error);
    this.log.error(
      { err: error, context: transition.context, interaction: transition.interaction },
      'Transition listener failed'
    );
  }
}

function describeTransition(type: TransitionType) {
  return type === 'activated' ? 'Interaction activated' : 'Interaction cleared';
}

function normalizeTimestamp(ts: number | Date | undefined): number {
  if (ts instanceof Date) {
    return ts.getTime();
  }
  if (typeof ts === 'number' && Number.isFinite(ts)) {
    return ts;
  }
  return Date.now();
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
