import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { DEFAULT_TICK_INTERVAL_MS } from '../interactions/engine.js';
import { DEFAULT_MAX_SLOT_DEPTH } from '../interactions/overlapMatcher.js';
import { InteractionTemplate } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type MqttConfig = {
  address: string;
  port?: number;
  prefix?: string;
  events?: string;
  detections?: string;
  clientId?: string;
  username?: string;
  password?: string;
};

export type HomeAssistantConfig = {
  discoveryEnabled?: boolean;
  discoveryPrefix?: string;
  entityPrefix?: string;
};

export type EngineConfig = {
  tickIntervalMs?: number;
  maxSlotDepth?: number;
  debug?: boolean;
};

export type InteractionConfig = {
  slots: string[][];
  threshold?: number;
  /** Seconds the overlap must keep recurring before the event is published. */
  minTime?: number;
  /** Seconds without a sighting before the event expires. */
  expireTime?: number;
};

export type TrackerConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  mqtt: MqttConfig;
  homeAssistant?: HomeAssistantConfig;
  engine?: EngineConfig;
  interactions: Record<string, InteractionConfig>;
};

export type MqttSettings = {
  url: string;
  prefix: string;
  events: string;
  detections: string;
  clientId?: string;
  username?: string;
  password?: string;
};

export type DiscoverySettings = {
  enabled: boolean;
  discoveryPrefix: string;
  entityPrefix: string;
};

export type EngineSettings = {
  tickIntervalMs: number;
  maxSlotDepth: number;
  debug: boolean;
};

export const DEFAULT_MQTT_PORT = 1883;
export const DEFAULT_MQTT_PREFIX = 'myhome/ObjectTrackers';
export const DEFAULT_EVENTS_TOPIC = 'events';
export const DEFAULT_DETECTIONS_TOPIC = 'detections';
export const DEFAULT_DISCOVERY_PREFIX = 'homeassistant';
export const DEFAULT_ENTITY_PREFIX = 'Tracker';
export const DEFAULT_OVERLAP_THRESHOLD = 0.5;
export const DEFAULT_MIN_TIME_SECONDS = 3;
export const DEFAULT_EXPIRE_TIME_SECONDS = 5;

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  minItems?: number;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const interactionSchema: JsonSchema = {
  type: 'object',
  required: ['slots'],
  additionalProperties: false,
  properties: {
    slots: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'array',
        minItems: 1,
        items: { type: 'string' }
      }
    },
    threshold: { type: 'number', minimum: 0, maximum: 1 },
    minTime: { type: 'number', minimum: 0 },
    expireTime: { type: 'number', minimum: 0 }
  }
};

const trackerConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'mqtt', 'interactions'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    mqtt: {
      type: 'object',
      required: ['address'],
      additionalProperties: false,
      properties: {
        address: { type: 'string' },
        port: { type: 'number', minimum: 1, maximum: 65535 },
        prefix: { type: 'string' },
        events: { type: 'string' },
        detections: { type: 'string' },
        clientId: { type: 'string' },
        username: { type: 'string' },
        password: { type: 'string' }
      }
    },
    homeAssistant: {
      type: 'object',
      additionalProperties: false,
      properties: {
        discoveryEnabled: { type: 'boolean' },
        discoveryPrefix: { type: 'string' },
        entityPrefix: { type: 'string' }
      }
    },
    engine: {
      type: 'object',
      additionalProperties: false,
      properties: {
        tickIntervalMs: { type: 'number', minimum: 1 },
        maxSlotDepth: { type: 'number', minimum: 1 },
        debug: { type: 'boolean' }
      }
    },
    interactions: {
      type: 'object',
      additionalProperties: interactionSchema
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const obj = value as Record<string, unknown>;
    for (const key of schema.required ?? []) {
      if (!(key in obj)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(obj)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, obj[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in obj)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, obj[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push(`${pathLabel} must contain at least ${schema.minItems} item(s)`);
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is TrackerConfig {
  const errors = validateAgainstSchema(trackerConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as TrackerConfig);
}

export function parseConfig(contents: string): TrackerConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): TrackerConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: TrackerConfig) {
  const messages: string[] = [];

  if (config.mqtt.address.trim().length === 0) {
    messages.push('config.mqtt.address must be a non-empty string');
  }
  for (const key of ['prefix', 'events', 'detections'] as const) {
    const value = config.mqtt[key];
    if (typeof value === 'string' && stripTrailingSlashes(value.trim()).length === 0) {
      messages.push(`config.mqtt.${key} must be a non-empty topic`);
    }
  }

  const maxSlotDepth = config.engine?.maxSlotDepth ?? DEFAULT_MAX_SLOT_DEPTH;
  if (!Number.isInteger(maxSlotDepth)) {
    messages.push('config.engine.maxSlotDepth must be an integer');
  }

  for (const [name, interaction] of Object.entries(config.interactions)) {
    const label = `config.interactions.${name}`;
    if (name.trim().length === 0 || /[/#+]/.test(name)) {
      messages.push(`${label} must have a name without "/", "#" or "+"`);
    }
    if (interaction.slots.length > maxSlotDepth) {
      messages.push(
        `${label}.slots declares ${interaction.slots.length} slots, more than maxSlotDepth ${maxSlotDepth}`
      );
    }
    interaction.slots.forEach((slot, index) => {
      slot.forEach((candidate, labelIndex) => {
        if (candidate.trim().length === 0 || /[/#+]/.test(candidate)) {
          messages.push(
            `${label}.slots[${index}][${labelIndex}] must be a non-empty label without "/", "#" or "+"`
          );
        }
      });
    });
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function stripTrailingSlashes(value: string) {
  return value.replace(/\/+$/, '');
}

export function resolveMqttSettings(config: TrackerConfig): MqttSettings {
  const { mqtt } = config;
  const port = mqtt.port ?? DEFAULT_MQTT_PORT;
  const address = mqtt.address.trim();
  const url = /^[a-z]+:\/\//i.test(address) ? address : `mqtt://${address}:${port}`;
  return {
    url,
    prefix: stripTrailingSlashes((mqtt.prefix ?? DEFAULT_MQTT_PREFIX).trim()),
    events: stripTrailingSlashes((mqtt.events ?? DEFAULT_EVENTS_TOPIC).trim()),
    detections: stripTrailingSlashes((mqtt.detections ?? DEFAULT_DETECTIONS_TOPIC).trim()),
    clientId: mqtt.clientId,
    username: mqtt.username,
    password: mqtt.password
  };
}

export function resolveDiscoverySettings(config: TrackerConfig): DiscoverySettings {
  const homeAssistant = config.homeAssistant ?? {};
  return {
    enabled: homeAssistant.discoveryEnabled ?? false,
    discoveryPrefix: stripTrailingSlashes(
      (homeAssistant.discoveryPrefix ?? DEFAULT_DISCOVERY_PREFIX).trim()
    ),
    entityPrefix: homeAssistant.entityPrefix ?? DEFAULT_ENTITY_PREFIX
  };
}

export function resolveEngineSettings(config: TrackerConfig): EngineSettings {
  const engine = config.engine ?? {};
  return {
    tickIntervalMs: engine.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS,
    maxSlotDepth: engine.maxSlotDepth ?? DEFAULT_MAX_SLOT_DEPTH,
    debug: engine.debug ?? false
  };
}

export function resolveInteractionTemplates(config: TrackerConfig): InteractionTemplate[] {
  return Object.entries(config.interactions).map(([name, interaction]) => ({
    name,
    slots: interaction.slots.map(slot => slot.map(label => label.trim())),
    overlapThreshold: interaction.threshold ?? DEFAULT_OVERLAP_THRESHOLD,
    minSustainMs: (interaction.minTime ?? DEFAULT_MIN_TIME_SECONDS) * 1000,
    expireAfterMs: (interaction.expireTime ?? DEFAULT_EXPIRE_TIME_SECONDS) * 1000
  }));
}

export type ConfigReloadEvent = {
  previous: TrackerConfig;
  next: TrackerConfig;
};

/** The file both `start` and `check-config` read when no path is given. */
export function resolveConfigPath(configPath?: string): string {
  return path.resolve(configPath ?? path.join(process.cwd(), 'config', 'default.json'));
}

/**
 * Holds the validated configuration and reloads it when the file changes. A reload
 * that fails validation keeps the previous configuration and emits `error`.
 */
export class ConfigManager extends EventEmitter {
  private currentConfig: TrackerConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;

  constructor(filePath?: string) {
    super();
    this.filePath = resolveConfigPath(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): TrackerConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): TrackerConfig {
    const next = loadConfigFromFile(this.filePath);
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  onReload(listener: (event: ConfigReloadEvent) => void): () => void {
    this.on('reload', listener);
    return () => {
      this.off('reload', listener);
    };
  }

  onError(listener: (error: Error) => void): () => void {
    this.on('error', listener);
    return () => {
      this.off('error', listener);
    };
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        this.reportError(error);
      }
    }, 100);
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (eventType === 'rename') {
        this.closeWatcher();
        try {
          this.watcher = this.createWatcher();
        } catch (error) {
          this.reportError(error);
          return;
        }
      }
      this.scheduleReload();
    });
  }

  private reportError(error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }
}

export { trackerConfigSchema };
