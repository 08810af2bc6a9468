import { performance } from 'node:perf_hooks';
import defaultBus, { type EventBus } from '../eventBus.js';
import logger, { type LogSink } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { RunningStats, type RunningStatsSnapshot } from '../stats/runningStats.js';
import { toWireBox } from '../tracking/geometry.js';
import {
  EntityPayloadError,
  TrackedEntity,
  parseEntityRecord
} from '../tracking/trackedEntity.js';
import { InteractionTemplate, InteractionTransition, TransitionType, WireBox } from '../types.js';
import { OverlapMatcher, SlotDepthError } from './overlapMatcher.js';

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export interface EventRecord {
  firstObservedAt: number;
  lastObservedAt: number;
  published: boolean;
}

type TrackedEvent = EventRecord & {
  interaction: string;
  slots: string[];
};

type InteractionContext = {
  name: string;
  entities: Map<string, TrackedEntity>;
  events: Map<string, TrackedEvent>;
  tickMs: RunningStats;
  entityCount: RunningStats;
};

export type IngestResult = 'updated' | 'removed' | 'rejected';

export type EntitySummary = {
  id: string;
  label: string | null;
  confidence: number;
  age: number;
  missingStreak: number;
  box: WireBox | null;
};

export type EventSummary = EventRecord & {
  key: string;
  interaction: string;
  slots: string[];
  state: 'pending' | 'active';
};

export type ContextSnapshot = {
  name: string;
  entities: EntitySummary[];
  events: EventSummary[];
};

export type EngineDiagnostics = {
  contexts: Record<
    string,
    { entities: number; events: number; tickMs: RunningStatsSnapshot; entityCount: RunningStatsSnapshot }
  >;
  combined: { tickMs: RunningStatsSnapshot; entityCount: RunningStatsSnapshot };
};

export interface InteractionEngineOptions {
  templates: Iterable<InteractionTemplate>;
  bus?: Pick<EventBus, 'emitTransition'>;
  log?: LogSink;
  metrics?: MetricsRegistry;
  matcher?: OverlapMatcher;
  maxSlotDepth?: number;
  tickIntervalMs?: number;
  now?: () => number;
  debug?: boolean;
  onFatal?: (error: Error) => void;
}

/** Canonical event identity: interaction name followed by the ordered slot labels. */
export function eventKeyOf(interaction: string, slots: readonly string[]): string {
  return [interaction, ...slots].join('/');
}

function toTemplateMap(templates: Iterable<InteractionTemplate>) {
  const map = new Map<string, InteractionTemplate>();
  for (const template of templates) {
    map.set(template.name, template);
  }
  return map;
}

/**
 * Per-context debounce state machine.
 *
 * A candidate key moves UNSEEN -> PENDING on its first sighting, PENDING -> ACTIVE once it
 * has recurred for `minSustainMs`, and is removed after `expireAfterMs` without a
 * sighting. Only ACTIVE keys emit anything; a PENDING key that expires disappears
 * silently.
 *
 * Ingestion and evaluation are both synchronous, so on the event loop each call runs to
 * completion before the other can touch the same context.
 */
export class InteractionEngine {
  private templates: Map<string, InteractionTemplate>;
  private readonly contexts = new Map<string, InteractionContext>();
  private readonly bus: Pick<EventBus, 'emitTransition'>;
  private readonly log: LogSink;
  private readonly metrics: MetricsRegistry;
  private readonly matcher: OverlapMatcher;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private readonly debug: boolean;
  private readonly onFatal?: (error: Error) => void;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: InteractionEngineOptions) {
    this.templates = toTemplateMap(options.templates);
    this.bus = options.bus ?? defaultBus;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.matcher = options.matcher ?? new OverlapMatcher({ maxSlotDepth: options.maxSlotDepth });
    this.tickIntervalMs = Math.max(1, options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS);
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;
    this.onFatal = options.onFatal;
  }

  upsertEntity(contextName: string, entity: TrackedEntity) {
    const context = this.ensureContext(contextName);
    const isNew = !context.entities.has(entity.id);
    context.entities.set(entity.id, entity);
    if (isNew) {
      this.log.info(
        { context: contextName, entityId: entity.id, tracked: context.entities.size },
        'Entity added'
      );
    }
  }

  removeEntity(contextName: string, entityId: string): boolean {
    const context = this.contexts.get(contextName);
    if (!context || !context.entities.delete(entityId)) {
      return false;
    }
    this.log.info(
      { context: contextName, entityId, tracked: context.entities.size },
      'Entity removed'
    );
    return true;
  }

  /**
   * Applies one detection feed message. An empty payload drops the entity; anything else
   * must decode to an entity record or it is logged and discarded.
   */
  ingest(contextName: string, entityId: string, payload: string | Uint8Array): IngestResult {
    const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf-8');
    if (text.trim().length === 0) {
      this.removeEntity(contextName, entityId);
      this.metrics.incrementContextCounter(contextName, 'detections.removed');
      return 'removed';
    }

    let entity: TrackedEntity;
    try {
      const record = parseEntityRecord(JSON.parse(text));
      entity = TrackedEntity.deserialize(entityId, record);
    } catch (error) {
      if (!(error instanceof EntityPayloadError) && !(error instanceof SyntaxError)) {
        throw error;
      }
      this.metrics.incrementContextCounter(contextName, 'detections.malformed');
      this.log.warn(
        { context: contextName, entityId, err: error },
        'Dropping malformed detection payload'
      );
      return 'rejected';
    }

    this.upsertEntity(contextName, entity);
    this.metrics.incrementContextCounter(contextName, 'detections.updated');
    return 'updated';
  }

  updateTemplates(templates: Iterable<InteractionTemplate>) {
    this.templates = toTemplateMap(templates);
    this.log.info({ interactions: Array.from(this.templates.keys()) }, 'Interaction templates updated');
  }

  getTemplates(): InteractionTemplate[] {
    return Array.from(this.templates.values());
  }

  /** Runs one pass over every context with a single clock sample. */
  evaluate(now = this.now()): InteractionTransition[] {
    const transitions: InteractionTransition[] = [];
    for (const context of this.contexts.values()) {
      transitions.push(...this.evaluateInContext(context, now));
    }
    return transitions;
  }

  evaluateContext(contextName: string, now = this.now()): InteractionTransition[] {
    const context = this.contexts.get(contextName);
    if (!context) {
      return [];
    }
    return this.evaluateInContext(context, now);
  }

  start() {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick();
    }, this.tickIntervalMs);
    this.log.info({ tickIntervalMs: this.tickIntervalMs }, 'Interaction engine started');
  }

  stop() {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.log.info({}, 'Interaction engine stopped');
  }

  isRunning() {
    return this.timer !== null;
  }

  listContexts(): string[] {
    return Array.from(this.contexts.keys());
  }

  getContextSnapshot(contextName: string): ContextSnapshot | undefined {
    const context = this.contexts.get(contextName);
    if (!context) {
      return undefined;
    }

    const entities = Array.from(context.entities.values()).map(entity => {
      const box = entity.lastBox;
      return {
        id: entity.id,
        label: entity.bestLabel,
        confidence: entity.bestConfidence,
        age: entity.age,
        missingStreak: entity.missingStreak,
        box: box ? toWireBox(box) : null
      };
    });

    const events = Array.from(context.events.entries()).map(([key, record]) => ({
      key,
      interaction: record.interaction,
      slots: [...record.slots],
      firstObservedAt: record.firstObservedAt,
      lastObservedAt: record.lastObservedAt,
      published: record.published,
      state: record.published ? ('active' as const) : ('pending' as const)
    }));

    return { name: context.name, entities, events };
  }

  diagnostics(): EngineDiagnostics {
    const contexts: EngineDiagnostics['contexts'] = {};
    let tickMs = new RunningStats();
    let entityCount = new RunningStats();
    for (const context of this.contexts.values()) {
      contexts[context.name] = {
        entities: context.entities.size,
        events: context.events.size,
        tickMs: context.tickMs.toJSON(),
        entityCount: context.entityCount.toJSON()
      };
      tickMs = RunningStats.combine(tickMs, context.tickMs);
      entityCount = RunningStats.combine(entityCount, context.entityCount);
    }
    return {
      contexts,
      combined: { tickMs: tickMs.toJSON(), entityCount: entityCount.toJSON() }
    };
  }

  private tick() {
    try {
      this.evaluate();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (err instanceof SlotDepthError) {
        this.stop();
        this.log.fatal({ err, interaction: err.interaction }, 'Slot matching depth exceeded');
        this.onFatal?.(err);
        return;
      }
      this.log.error({ err }, 'Interaction evaluation failed');
    }
  }

  private ensureContext(name: string): InteractionContext {
    const existing = this.contexts.get(name);
    if (existing) {
      return existing;
    }
    const created: InteractionContext = {
      name,
      entities: new Map(),
      events: new Map(),
      tickMs: new RunningStats(),
      entityCount: new RunningStats()
    };
    this.contexts.set(name, created);
    this.log.info({ context: name }, 'Context created');
    return created;
  }

  private evaluateInContext(context: InteractionContext, now: number): InteractionTransition[] {
    const started = performance.now();
    const entities = Array.from(context.entities.values());
    const candidates = this.matcher.findCandidates(this.templates.values(), entities);

    const pending: InteractionTransition[] = [];
    const seen = new Set<string>();

    for (const candidate of candidates) {
      const key = eventKeyOf(candidate.interaction, candidate.slots);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const record = context.events.get(key);
      if (!record) {
        context.events.set(key, {
          interaction: candidate.interaction,
          slots: [...candidate.slots],
          firstObservedAt: now,
          lastObservedAt: now,
          published: false
        });
        this.metrics.incrementContextCounter(context.name, 'events.pending');
        continue;
      }

      record.lastObservedAt = now;
      const template = this.templates.get(record.interaction);
      if (!record.published && template && now - record.firstObservedAt >= template.minSustainMs) {
        record.published = true;
        pending.push(this.buildTransition('activated', context.name, record, now));
      }
    }

    for (const [key, record] of context.events) {
      if (seen.has(key)) {
        continue;
      }
      const template = this.templates.get(record.interaction);
      const expired = !template || now - record.lastObservedAt > template.expireAfterMs;
      if (!expired) {
        continue;
      }
      if (record.published) {
        pending.push(this.buildTransition('cleared', context.name, record, now));
      } else {
        this.metrics.incrementContextCounter(context.name, 'events.discarded');
      }
      context.events.delete(key);
    }

    const elapsed = performance.now() - started;
    context.tickMs.addValue(elapsed);
    context.entityCount.addValue(context.entities.size);
    this.metrics.observeLatency('engine.tick', elapsed);
    this.metrics.setContextGauge(context.name, 'entities', context.entities.size);
    this.metrics.setContextGauge(context.name, 'events', context.events.size);

    if (this.debug) {
      this.log.debug(
        { context: context.name, snapshot: this.getContextSnapshot(context.name) },
        'Context evaluated'
      );
    }

    return this.publish(pending);
  }

  private buildTransition(
    type: TransitionType,
    contextName: string,
    record: TrackedEvent,
    now: number
  ): InteractionTransition {
    return {
      type,
      ts: now,
      context: contextName,
      interaction: record.interaction,
      slots: [...record.slots],
      firstObservedAt: record.firstObservedAt,
      lastObservedAt: record.lastObservedAt
    };
  }

  private publish(transitions: InteractionTransition[]): InteractionTransition[] {
    for (const transition of transitions) {
      try {
        this.bus.emitTransition(transition);
      } catch (error) {
        this.metrics.recordPublishFailure(error);
        this.log.error(
          { err: error, context: transition.context, interaction: transition.interaction },
          'Failed to emit interaction transition'
        );
      }
    }
    return transitions;
  }
}

export default InteractionEngine;
