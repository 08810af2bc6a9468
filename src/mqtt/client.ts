import mqtt, { type MqttClient } from 'mqtt';
import logger, { type LogSink } from '../logger.js';
import type { MqttSettings } from '../config/index.js';

export type PublishOptions = {
  retain?: boolean;
  /** Publish the topic as given instead of under the configured prefix. */
  absoluteTopic?: boolean;
};

export type MessageHandler = (topic: string, payload: Buffer) => void;

/** The slice of a broker connection the tracker depends on. */
export interface BusClient {
  readonly prefix: string;
  publish(topic: string, payload: string, options?: PublishOptions): Promise<void>;
  subscribe(topic: string, handler: MessageHandler): Promise<void>;
  isConnected(): boolean;
  end(): Promise<void>;
}

/**
 * MQTT topic filter match: `+` takes exactly one level, a trailing `#` takes the rest
 * (including none).
 */
export function topicMatches(filter: string, topic: string): boolean {
  const filterLevels = filter.split('/');
  const topicLevels = topic.split('/');

  for (let index = 0; index < filterLevels.length; index += 1) {
    const level = filterLevels[index];
    if (level === '#') {
      return index === filterLevels.length - 1;
    }
    const actual = topicLevels[index];
    if (actual === undefined) {
      return false;
    }
    if (level !== '+' && level !== actual) {
      return false;
    }
  }

  return filterLevels.length === topicLevels.length;
}

type Subscription = {
  filter: string;
  handler: MessageHandler;
};

class MqttBusClient implements BusClient {
  readonly prefix: string;
  private readonly client: MqttClient;
  private readonly log: LogSink;
  private readonly subscriptions: Subscription[] = [];

  constructor(client: MqttClient, prefix: string, log: LogSink) {
    this.client = client;
    this.prefix = prefix;
    this.log = log;

    client.on('message', (topic, payload) => {
      for (const subscription of this.subscriptions) {
        if (topicMatches(subscription.filter, topic)) {
          subscription.handler(topic, payload);
        }
      }
    });
  }

  async publish(topic: string, payload: string, options: PublishOptions = {}) {
    const fullTopic = options.absoluteTopic ? topic : `${this.prefix}/${topic}`;
    await this.client.publishAsync(fullTopic, payload, { retain: options.retain ?? false });
  }

  async subscribe(topic: string, handler: MessageHandler) {
    const filter = `${this.prefix}/${topic}`;
    this.subscriptions.push({ filter, handler });
    await this.client.subscribeAsync(filter);
    this.log.info({ topic: filter }, 'Subscribed to MQTT topic');
  }

  isConnected() {
    return this.client.connected;
  }

  async end() {
    await this.client.endAsync();
  }
}

/** Opens a broker connection. Reconnects are left to the mqtt client. */
export function createMqttClient(settings: MqttSettings, log: LogSink = logger): BusClient {
  const client = mqtt.connect(settings.url, {
    clientId: settings.clientId,
    username: settings.username,
    password: settings.password,
    clean: true,
    connectTimeout: 5000,
    reconnectPeriod: 5000
  });

  client.on('connect', () => {
    log.info({ url: settings.url }, 'Connected to MQTT broker');
  });
  client.on('reconnect', () => {
    log.warn({ url: settings.url }, 'Reconnecting to MQTT broker');
  });
  client.on('offline', () => {
    log.warn({ url: settings.url }, 'MQTT broker offline');
  });
  client.on('error', error => {
    log.error({ err: error, url: settings.url }, 'MQTT client error');
  });

  return new MqttBusClient(client, settings.prefix, log);
}
