import { registerShutdownHook } from './app.js';
import defaultBus, { type EventBus } from './eventBus.js';
import loggerModule, { setLogLevel, type LogSink } from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import {
  ConfigManager,
  resolveDiscoverySettings,
  resolveEngineSettings,
  resolveInteractionTemplates,
  resolveMqttSettings,
  type ConfigReloadEvent,
  type MqttSettings,
  type TrackerConfig
} from './config/index.js';
import { InteractionEngine } from './interactions/engine.js';
import { createMqttClient, type BusClient } from './mqtt/client.js';
import { DetectionFeed } from './mqtt/detectionFeed.js';
import { TransitionPublisher } from './mqtt/publisher.js';
import type { InteractionTemplate } from './types.js';

export type ConfigSource = Pick<
  ConfigManager,
  'getConfig' | 'getPath' | 'watch' | 'onReload' | 'onError'
>;

export interface TrackerStartOptions {
  configSource?: ConfigSource;
  configPath?: string;
  createClient?: (settings: MqttSettings, log: LogSink) => BusClient;
  bus?: EventBus;
  log?: LogSink;
  metrics?: MetricsRegistry;
  /** Overrides `logging.level` from the configuration, at start and on every reload. */
  logLevel?: string;
  /** Overrides `engine.debug` from the configuration. */
  debug?: boolean;
  /** Whether to follow configuration file changes. Defaults to true. */
  watchConfig?: boolean;
  onFatal?: (error: Error) => void;
}

export type TrackerRuntime = {
  engine: InteractionEngine;
  client: BusClient;
  publisher: TransitionPublisher;
  feed: DetectionFeed;
  stop: () => Promise<void>;
};

function warnAboutWideTemplates(templates: InteractionTemplate[], log: LogSink) {
  for (const template of templates) {
    if (template.slots.length > 2) {
      log.warn(
        { interaction: template.name, slots: template.slots.length },
        'Only two-slot interactions can match; this template will never fire'
      );
    }
  }
}

/**
 * Wires configuration, broker connection, detection feed, engine and publisher into a
 * running tracker.
 */
export async function startTracker(options: TrackerStartOptions = {}): Promise<TrackerRuntime> {
  const log = options.log ?? loggerModule;
  const metrics = options.metrics ?? defaultMetrics;
  const bus = options.bus ?? defaultBus;
  const source = options.configSource ?? new ConfigManager(options.configPath);
  const createClient = options.createClient ?? createMqttClient;

  const config = source.getConfig();
  applyConfiguredLogLevel(config, log, options.logLevel);

  const mqttSettings = resolveMqttSettings(config);
  const engineSettings = resolveEngineSettings(config);
  const templates = resolveInteractionTemplates(config);
  warnAboutWideTemplates(templates, log);

  const client = createClient(mqttSettings, log);

  const engine = new InteractionEngine({
    templates,
    bus,
    log,
    metrics,
    maxSlotDepth: engineSettings.maxSlotDepth,
    tickIntervalMs: engineSettings.tickIntervalMs,
    debug: options.debug ?? engineSettings.debug,
    onFatal: options.onFatal
  });

  const publisher = new TransitionPublisher({
    client,
    eventsTopic: mqttSettings.events,
    discovery: resolveDiscoverySettings(config),
    log,
    metrics
  });
  const detach = publisher.attach(bus);

  const feed = new DetectionFeed({
    client,
    engine,
    detectionsTopic: mqttSettings.detections,
    log
  });

  const cleanups: Array<() => void> = [detach];

  if (options.watchConfig ?? true) {
    const handleReload = ({ next }: ConfigReloadEvent) => {
      applyConfiguredLogLevel(next, log, options.logLevel);
      const nextTemplates = resolveInteractionTemplates(next);
      warnAboutWideTemplates(nextTemplates, log);
      engine.updateTemplates(nextTemplates);
      log.info(
        { configPath: source.getPath(), interactions: nextTemplates.length },
        'configuration reloaded'
      );
    };
    const handleError = (error: Error) => {
      log.warn(
        { err: error, configPath: source.getPath(), action: 'reload', restored: true },
        'configuration reload failed'
      );
    };
    cleanups.push(source.onReload(handleReload), source.onError(handleError), source.watch());
  }

  try {
    await feed.start();
  } catch (error) {
    for (const cleanup of cleanups) {
      cleanup();
    }
    await client.end();
    throw error;
  }

  engine.start();
  log.info(
    {
      url: mqttSettings.url,
      interactions: templates.map(template => template.name),
      discovery: resolveDiscoverySettings(config).enabled
    },
    'Tracker started'
  );

  let stopped = false;
  const stop = async () => {
    if (stopped) {
      return;
    }
    stopped = true;
    engine.stop();
    for (const cleanup of cleanups) {
      cleanup();
    }
    await client.end();
    log.info({}, 'Tracker stopped');
  };

  cleanups.push(registerShutdownHook('tracker', () => stop()));

  return { engine, client, publisher, feed, stop };
}

function applyConfiguredLogLevel(config: TrackerConfig, log: LogSink, override?: string) {
  const level = override ?? config.logging.level;
  try {
    setLogLevel(level);
  } catch (error) {
    log.warn({ err: error, level }, 'Failed to apply configured log level');
  }
}
