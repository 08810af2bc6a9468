import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { resetAppLifecycle } from '../src/app.js';
import { requestShutdown, runCli } from '../src/cli.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import type { TrackerStartOptions } from '../src/run-tracker.js';

type TestIo = {
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream };
  stdout: () => string;
  stderr: () => string;
};

function createTestIo(): TestIo {
  let stdout = '';
  let stderr = '';

  const makeWritable = (setter: (value: string) => void) =>
    new Writable({
      write(chunk, _enc, callback) {
        setter(typeof chunk === 'string' ? chunk : chunk.toString());
        callback();
      }
    });

  return {
    io: {
      stdout: makeWritable(value => {
        stdout += value;
      }),
      stderr: makeWritable(value => {
        stderr += value;
      })
    },
    stdout: () => stdout,
    stderr: () => stderr
  };
}

describe('runCli', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'interplay-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    resetAppLifecycle();
  });

  it('prints usage for help', async () => {
    const capture = createTestIo();
    expect(await runCli(['--help'], capture.io)).toBe(0);
    expect(capture.stdout().split('\n')[0]).toBe('Interplay CLI');
  });

  it('rejects unknown commands', async () => {
    const capture = createTestIo();
    expect(await runCli(['launch'], capture.io)).toBe(1);
    expect(capture.stderr().split('\n')[0]).toBe('Unknown command: launch');
  });

  it('check-config validates config/default.json like start does', async () => {
    const capture = createTestIo();
    expect(await runCli(['check-config'], capture.io)).toBe(0);
    expect(capture.stdout()).toBe('Configuration OK (2 interaction(s), broker mqtt://mqtt:1883)\n');
  });

  it('check-config reports errors in a given file', async () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        app: { name: 'x' },
        logging: { level: 'info' },
        mqtt: { address: 'broker' },
        interactions: { Pet: { slots: [['cat'], ['dog']], threshold: 2 } }
      })
    );

    const capture = createTestIo();
    expect(await runCli(['check-config', '--config', file], capture.io)).toBe(1);
    expect(capture.stderr()).toBe(
      'Invalid configuration: config.interactions.Pet.threshold must be <= 1\n'
    );
  });

  it('check-config warns about wide templates', async () => {
    const file = path.join(tempDir, 'wide.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        app: { name: 'x' },
        logging: { level: 'info' },
        mqtt: { address: 'broker', port: 1884 },
        interactions: { Crowd: { slots: [['person'], ['cat'], ['dog']] } }
      })
    );

    const capture = createTestIo();
    expect(await runCli(['check-config', '-c', file], capture.io)).toBe(0);
    expect(capture.stdout()).toBe(
      'Configuration OK (1 interaction(s), broker mqtt://broker:1884)\n' +
        'Warning: Crowd has 3 slots and will never match\n'
    );
  });

  it('gets and sets the log level', async () => {
    const defaultLevel = getLogLevel();
    try {
      const get = createTestIo();
      expect(await runCli(['log-level'], get.io)).toBe(0);
      expect(get.stdout()).toBe(`${defaultLevel}\n`);

      const set = createTestIo();
      expect(await runCli(['log-level', 'set', 'warn'], set.io)).toBe(0);
      expect(set.stdout()).toBe('Log level set to warn\n');
      expect(getLogLevel()).toBe('warn');

      const bad = createTestIo();
      expect(await runCli(['log-level', 'set', 'loud'], bad.io)).toBe(1);
      expect(bad.stderr()).toContain('Unknown log level "loud"');

      const missing = createTestIo();
      expect(await runCli(['log-level', 'set'], missing.io)).toBe(1);
      expect(missing.stderr().split('\n')[0]).toBe('Missing value for log level');
    } finally {
      setLogLevel(defaultLevel);
    }
  });

  it('rejects unknown start options', async () => {
    const capture = createTestIo();
    expect(await runCli(['start', '--fast'], capture.io)).toBe(1);
    expect(capture.stderr()).toBe('Unknown option: --fast\n');
  });

  it('starts the tracker and stops it on request', async () => {
    const stop = vi.fn(async () => {});
    let received: TrackerStartOptions | undefined;
    const startTracker = vi.fn(async (options: TrackerStartOptions) => {
      received = options;
      return { stop };
    });

    const capture = createTestIo();
    const running = runCli(['start', '--config', 'custom.json', '--debug', '--verbose'], capture.io, {
      startTracker,
      registerSignals: false
    });

    await vi.waitFor(() => {
      expect(capture.stdout()).toBe('Interplay tracker started\n');
    });
    expect(received?.configPath).toBe('custom.json');
    expect(received?.debug).toBe(true);
    expect(received?.logLevel).toBe('debug');

    expect(requestShutdown()).toBe(true);
    expect(await running).toBe(0);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(capture.stdout()).toBe('Interplay tracker started\nInterplay tracker stopped\n');
    expect(requestShutdown()).toBe(false);
  });

  it('exits non-zero after a fatal engine error', async () => {
    let received: TrackerStartOptions | undefined;
    const startTracker = vi.fn(async (options: TrackerStartOptions) => {
      received = options;
      return { stop: async () => {} };
    });

    const capture = createTestIo();
    const running = runCli(['start'], capture.io, { startTracker, registerSignals: false });
    await vi.waitFor(() => {
      expect(received).toBeDefined();
      expect(received?.logLevel).toBeUndefined();
      expect(capture.stdout()).toContain('started');
    });

    received?.onFatal?.(new Error('slot depth exceeded'));
    expect(await running).toBe(1);
  });

  it('reports start failures', async () => {
    const capture = createTestIo();
    const code = await runCli(['start'], capture.io, {
      startTracker: async () => {
        throw new Error('broker unreachable');
      },
      registerSignals: false
    });

    expect(code).toBe(1);
    expect(capture.stderr()).toBe('Interplay tracker failed to start: broker unreachable\n');
  });
});
