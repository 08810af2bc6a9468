import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  resolveDiscoverySettings,
  resolveEngineSettings,
  resolveInteractionTemplates,
  resolveConfigPath,
  resolveMqttSettings,
  validateConfig,
  type TrackerConfig
} from '../src/config/index.js';

function baseConfig(): TrackerConfig {
  return {
    app: { name: 'interplay-test' },
    logging: { level: 'silent' },
    mqtt: { address: 'broker.local' },
    interactions: {
      PersonPettingPet: { slots: [['person'], ['cat', 'dog']] }
    }
  };
}

describe('validateConfig', () => {
  it('accepts a minimal configuration', () => {
    expect(() => validateConfig(baseConfig())).not.toThrow();
  });

  it('accepts the shipped default configuration', () => {
    expect(() => loadConfigFromFile(path.resolve('config/default.json'))).not.toThrow();
  });

  it('joins every schema violation into one message', () => {
    const config = {
      ...baseConfig(),
      mqtt: { address: 'broker.local', port: 70000, extra: true },
      interactions: {
        PersonPettingPet: { slots: [], threshold: 1.5 }
      }
    };
    expect(() => validateConfig(config)).toThrow(
      'config.mqtt.extra is not allowed; config.mqtt.port must be <= 65535; ' +
        'config.interactions.PersonPettingPet.slots must contain at least 1 item(s); ' +
        'config.interactions.PersonPettingPet.threshold must be <= 1'
    );
  });

  it('reports missing sections', () => {
    expect(() => validateConfig({ app: { name: 'x' }, logging: { level: 'info' } })).toThrow(
      'config.mqtt is required; config.interactions is required'
    );
  });

  it('rejects topic characters in interaction names and labels', () => {
    const config = baseConfig();
    config.interactions['Bad/Name'] = { slots: [['cat'], ['dog+']] };
    expect(() => validateConfig(config)).toThrow(
      'config.interactions.Bad/Name must have a name without "/", "#" or "+"; ' +
        'config.interactions.Bad/Name.slots[1][0] must be a non-empty label without "/", "#" or "+"'
    );
  });

  it('rejects templates deeper than maxSlotDepth', () => {
    const config = baseConfig();
    config.engine = { maxSlotDepth: 2 };
    config.interactions.Crowd = { slots: [['a'], ['b'], ['c']] };
    expect(() => validateConfig(config)).toThrow(
      'config.interactions.Crowd.slots declares 3 slots, more than maxSlotDepth 2'
    );
  });

  it('rejects blank topics', () => {
    const config = baseConfig();
    config.mqtt.events = '/';
    expect(() => validateConfig(config)).toThrow('config.mqtt.events must be a non-empty topic');
  });

  it('wraps JSON syntax errors', () => {
    expect(() => parseConfig('{ nope')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('resolved settings', () => {
  it('fills MQTT defaults and strips trailing slashes', () => {
    const config = baseConfig();
    config.mqtt.prefix = 'home/trackers/';
    expect(resolveMqttSettings(config)).toEqual({
      url: 'mqtt://broker.local:1883',
      prefix: 'home/trackers',
      events: 'events',
      detections: 'detections',
      clientId: undefined,
      username: undefined,
      password: undefined
    });
  });

  it('keeps a full broker URL as given', () => {
    const config = baseConfig();
    config.mqtt.address = 'mqtts://broker.local:8883';
    config.mqtt.port = 1234;
    expect(resolveMqttSettings(config).url).toBe('mqtts://broker.local:8883');
  });

  it('defaults discovery to disabled', () => {
    expect(resolveDiscoverySettings(baseConfig())).toEqual({
      enabled: false,
      discoveryPrefix: 'homeassistant',
      entityPrefix: 'Tracker'
    });
  });

  it('defaults engine settings', () => {
    expect(resolveEngineSettings(baseConfig())).toEqual({
      tickIntervalMs: 1000,
      maxSlotDepth: 8,
      debug: false
    });
  });

  it('converts template seconds to milliseconds', () => {
    const config = baseConfig();
    config.interactions.PetRidingObject = {
      slots: [['cat'], [' car ']],
      threshold: 0.3,
      minTime: 6,
      expireTime: 4
    };
    expect(resolveInteractionTemplates(config)).toEqual([
      {
        name: 'PersonPettingPet',
        slots: [['person'], ['cat', 'dog']],
        overlapThreshold: 0.5,
        minSustainMs: 3000,
        expireAfterMs: 5000
      },
      {
        name: 'PetRidingObject',
        slots: [['cat'], ['car']],
        overlapThreshold: 0.3,
        minSustainMs: 6000,
        expireAfterMs: 4000
      }
    ]);
  });
});

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'interplay-config-'));
    configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(baseConfig()));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads config/default.json under the working directory unless given a path', () => {
    const defaultPath = path.resolve(process.cwd(), 'config', 'default.json');
    expect(resolveConfigPath()).toBe(defaultPath);
    expect(new ConfigManager().getPath()).toBe(defaultPath);
    expect(resolveConfigPath(configPath)).toBe(configPath);
  });

  it('reloads and notifies listeners', () => {
    const manager = new ConfigManager(configPath);
    const listener = vi.fn();
    manager.onReload(listener);

    const next = baseConfig();
    next.interactions.PersonPettingPet.minTime = 10;
    fs.writeFileSync(configPath, JSON.stringify(next));
    manager.reload();

    expect(manager.getConfig().interactions.PersonPettingPet.minTime).toBe(10);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0].previous.interactions.PersonPettingPet.minTime).toBeUndefined();
  });

  it('keeps the previous configuration when a reload is invalid', () => {
    const manager = new ConfigManager(configPath);
    fs.writeFileSync(configPath, JSON.stringify({ app: { name: 'broken' } }));

    expect(() => manager.reload()).toThrow('config.logging is required');
    expect(manager.getConfig().app.name).toBe('interplay-test');
  });

  it('HotReload picks up file changes while watched', async () => {
    const manager = new ConfigManager(configPath);
    const listener = vi.fn();
    const errors = vi.fn();
    manager.onReload(listener);
    manager.onError(errors);
    const stopWatching = manager.watch();

    try {
      const next = baseConfig();
      next.app.name = 'reloaded';
      fs.writeFileSync(configPath, JSON.stringify(next));

      await vi.waitFor(
        () => {
          expect(manager.getConfig().app.name).toBe('reloaded');
        },
        { timeout: 3000, interval: 50 }
      );
      expect(listener).toHaveBeenCalled();

      fs.writeFileSync(configPath, '{ invalid');
      await vi.waitFor(
        () => {
          expect(errors).toHaveBeenCalled();
        },
        { timeout: 3000, interval: 50 }
      );
      expect(manager.getConfig().app.name).toBe('reloaded');
    } finally {
      stopWatching();
    }
  });
});
