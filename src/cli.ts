#!/usr/bin/env node
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { runShutdownHooks } from './app.js';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import {
  loadConfigFromFile,
  resolveConfigPath,
  resolveInteractionTemplates,
  resolveMqttSettings,
  type TrackerConfig
} from './config/index.js';
import { startTracker, type TrackerRuntime, type TrackerStartOptions } from './run-tracker.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  startTracker?: (options: TrackerStartOptions) => Promise<Pick<TrackerRuntime, 'stop'>>;
  registerSignals?: boolean;
};

type StartArgs = {
  configPath?: string;
  verbose: boolean;
  debug: boolean;
  help: boolean;
  errors: string[];
};

type ServiceState = {
  status: 'idle' | 'running' | 'stopping';
  stopResolver: (() => void) | null;
  exitCode: number;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'Interplay CLI',
  '',
  'Usage:',
  '  interplay start [--config path] [--verbose] [--debug]  Run the interaction tracker',
  '  interplay check-config [--config path]                 Validate a configuration file',
  '  interplay log-level [get | set <level>]                Get or set the active log level',
  '  interplay help                                         Show this help message'
];

const START_USAGE = [
  'Usage: interplay start [options]',
  '',
  'Options:',
  '  -c, --config <path>  Configuration file (default: config/default.json)',
  '  -v, --verbose        Log at debug level',
  '  -d, --debug          Log every context after each evaluation pass',
  '  -h, --help           Show this help message'
].join('\n');

const LOG_LEVEL_USAGE = [
  'Interplay log level commands',
  '',
  'Usage:',
  '  interplay log-level            Show the current log level',
  '  interplay log-level get        Show the current log level',
  '  interplay log-level set <level>  Change the active log level',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const state: ServiceState = {
  status: 'idle',
  stopResolver: null,
  exitCode: 0
};

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start': {
      return runStartCommand(argv.slice(1), io, deps);
    }
    case 'check-config': {
      return runCheckConfigCommand(argv.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

function parseStartArgs(args: string[]): StartArgs {
  const result: StartArgs = { verbose: false, debug: false, help: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--verbose' || token === '-v') {
      result.verbose = true;
      continue;
    }
    if (token === '--debug' || token === '-d') {
      result.debug = true;
      continue;
    }
    if (token === '--config' || token === '-c') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --config');
      } else {
        result.configPath = value;
        index += 1;
      }
      continue;
    }
    result.errors.push(`Unknown option: ${token}`);
  }
  return result;
}

async function runStartCommand(args: string[], io: CliIo, deps: CliDependencies): Promise<number> {
  const parsed = parseStartArgs(args);
  if (parsed.help) {
    io.stdout.write(`${START_USAGE}\n`);
    return 0;
  }
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  if (state.status !== 'idle') {
    io.stdout.write('Interplay tracker is already running\n');
    return 0;
  }

  const start = deps.startTracker ?? startTracker;
  state.exitCode = 0;

  let runtime: Pick<TrackerRuntime, 'stop'>;
  try {
    runtime = await metrics.time('tracker.startup.ms', () =>
      start({
        configPath: parsed.configPath,
        debug: parsed.debug || undefined,
        logLevel: parsed.verbose ? 'debug' : undefined,
        onFatal: error => {
          logger.fatal({ err: error }, 'Interplay tracker stopped on a fatal error');
          state.exitCode = 1;
          requestShutdown();
        }
      })
    );
  } catch (error) {
    logger.error({ err: error }, 'Interplay tracker failed to start');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Interplay tracker failed to start: ${message}\n`);
    return 1;
  }

  state.status = 'running';
  io.stdout.write('Interplay tracker started\n');

  await new Promise<void>(resolve => {
    state.stopResolver = resolve;
    if (deps.registerSignals ?? true) {
      registerSignalHandlers();
    }
  });

  state.status = 'stopping';
  try {
    await runtime.stop();
  } catch (error) {
    logger.error({ err: error }, 'Error during shutdown');
    state.exitCode = 1;
  }
  const hooks = await runShutdownHooks({ reason: 'cli-stop' });
  if (hooks.some(hook => hook.status === 'error')) {
    state.exitCode = 1;
  }

  state.status = 'idle';
  state.stopResolver = null;
  io.stdout.write('Interplay tracker stopped\n');
  return state.exitCode;
}

/** Resolves a running `start` command so it shuts the tracker down. */
export function requestShutdown(): boolean {
  const resolver = state.stopResolver;
  if (!resolver) {
    return false;
  }
  state.stopResolver = null;
  resolver();
  return true;
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Interplay tracker shutting down');
    requestShutdown();
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
}

async function runCheckConfigCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseStartArgs(args);
  if (parsed.errors.length > 0 || parsed.verbose || parsed.debug) {
    io.stderr.write('Usage: interplay check-config [--config path]\n');
    return 1;
  }

  let config: TrackerConfig;
  try {
    config = loadConfigFromFile(resolveConfigPath(parsed.configPath));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }

  const templates = resolveInteractionTemplates(config);
  const mqtt = resolveMqttSettings(config);
  io.stdout.write(`Configuration OK (${templates.length} interaction(s), broker ${mqtt.url})\n`);
  for (const template of templates) {
    if (template.slots.length > 2) {
      io.stdout.write(
        `Warning: ${template.name} has ${template.slots.length} slots and will never match\n`
      );
    }
  }
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  io.stderr.write(`Unknown option: ${first}\n`);
  io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
  return 1;
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Interplay CLI failed');
      process.exit(1);
    }
  );
}
