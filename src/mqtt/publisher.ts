import type { EventBus } from '../eventBus.js';
import logger, { type LogSink } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { DiscoverySettings } from '../config/index.js';
import type { InteractionTransition } from '../types.js';
import type { BusClient, PublishOptions } from './client.js';

export type DiscoveryConfigPayload = {
  name: string;
  friendly_name: string;
  unique_id: string;
  state_topic: string;
};

export interface TransitionPublisherOptions {
  client: Pick<BusClient, 'publish'>;
  eventsTopic: string;
  discovery: DiscoverySettings;
  log?: LogSink;
  metrics?: Pick<MetricsRegistry, 'recordPublishFailure'>;
}

/** `{interaction}/{slot1}/{slot2}/...`, the event's name under a context. */
export function eventNameOf(interaction: string, slots: readonly string[]) {
  return [interaction, ...slots].join('/');
}

export function eventTopic(
  eventsTopic: string,
  context: string,
  interaction: string,
  slots: readonly string[]
) {
  return `${eventsTopic}/${context}/${eventNameOf(interaction, slots)}`;
}

function stripSeparators(value: string) {
  return value.replace(/[-_]/g, '');
}

export function createEntityId(
  entityPrefix: string,
  context: string,
  interaction: string,
  slots: readonly string[]
) {
  const eventName = stripSeparators(eventNameOf(interaction, slots)).replace(/\//g, '-');
  return `${entityPrefix}-${stripSeparators(context)}-${eventName}`;
}

export function createFriendlyName(
  entityPrefix: string,
  context: string,
  interaction: string,
  slots: readonly string[]
) {
  return `${entityPrefix} - [${eventNameOf(interaction, slots).replace(/\//g, '|')}] [${context}]`;
}

/**
 * Delivers engine transitions to the broker: the event topic under the configured prefix
 * and, when discovery is enabled, a binary sensor per event identity whose config is
 * sent once before anything else for that identity. Transitions are delivered one at a
 * time in emission order, so the last retained state matches the last transition.
 */
export class TransitionPublisher {
  private readonly client: Pick<BusClient, 'publish'>;
  private readonly eventsTopic: string;
  private readonly discovery: DiscoverySettings;
  private readonly log: LogSink;
  private readonly metrics: Pick<MetricsRegistry, 'recordPublishFailure'>;
  private readonly registered = new Set<string>();
  private queue: Promise<void> = Promise.resolve();

  constructor(options: TransitionPublisherOptions) {
    this.client = options.client;
    this.eventsTopic = options.eventsTopic;
    this.discovery = options.discovery;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  attach(bus: Pick<EventBus, 'onTransition'>): () => void {
    return bus.onTransition(transition => this.handle(transition));
  }

  /**
   * Queues the transition behind those already handed in. Never rejects; each failed
   * publish is logged and counted on its own.
   */
  handle(transition: InteractionTransition): Promise<void> {
    const delivery = this.queue.then(() => this.deliver(transition));
    this.queue = delivery;
    return delivery;
  }

  /** Resolves once every queued transition has been delivered. */
  idle(): Promise<void> {
    return this.queue;
  }

  isRegistered(entityId: string) {
    return this.registered.has(entityId);
  }

  private async deliver(transition: InteractionTransition) {
    const { context, interaction, slots } = transition;

    if (this.discovery.enabled) {
      await this.registerEntity(transition);
    }

    const topic = eventTopic(this.eventsTopic, context, interaction, slots);
    if (transition.type === 'activated') {
      await this.send(topic, JSON.stringify({ name: interaction, slots }), { retain: false });
    } else {
      await this.send(topic, '', { retain: true });
    }

    if (this.discovery.enabled) {
      await this.send(
        this.discoveryTopic(transition, 'state'),
        transition.type === 'activated' ? 'ON' : 'OFF',
        { retain: true, absoluteTopic: true }
      );
    }
  }

  private discoveryTopic(transition: InteractionTransition, leaf: 'config' | 'state') {
    const { context, interaction, slots } = transition;
    const entityId = createEntityId(this.discovery.entityPrefix, context, interaction, slots);
    return `${this.discovery.discoveryPrefix}/binary_sensor/${entityId}/${leaf}`;
  }

  private async registerEntity(transition: InteractionTransition) {
    const { context, interaction, slots } = transition;
    const entityId = createEntityId(this.discovery.entityPrefix, context, interaction, slots);
    if (this.registered.has(entityId)) {
      return;
    }
    this.registered.add(entityId);

    const friendlyName = createFriendlyName(this.discovery.entityPrefix, context, interaction, slots);
    const payload: DiscoveryConfigPayload = {
      name: friendlyName,
      friendly_name: friendlyName,
      unique_id: entityId,
      state_topic: this.discoveryTopic(transition, 'state')
    };
    await this.send(this.discoveryTopic(transition, 'config'), JSON.stringify(payload), {
      retain: true,
      absoluteTopic: true
    });
  }

  private async send(topic: string, payload: string, options: PublishOptions) {
    try {
      await this.client.publish(topic, payload, options);
    } catch (error) {
      this.metrics.recordPublishFailure(error, topic);
      this.log.error({ err: error, topic }, 'Failed to publish MQTT message');
    }
  }
}

export default TransitionPublisher;
