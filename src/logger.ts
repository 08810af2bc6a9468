import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'interplay';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(level => level.toLowerCase())
);

const levelEvents = new EventEmitter();

type LogContext = {
  message?: string;
  context?: string;
};

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let context: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (value && typeof value === 'object') {
      const candidate = value as Record<string, unknown>;
      if (typeof candidate.context === 'string' && candidate.context.length > 0 && !context) {
        context = candidate.context;
      }
      if (typeof candidate.message === 'string' && candidate.message.length > 0 && !message) {
        message = candidate.message;
      }
    }
  }

  return { message, context };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

type LogMethod = (obj: object, msg?: string) => void;

/** The subset of the logger that components take as an injected dependency. */
export type LogSink = {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
};

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel);
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string) => void) {
  levelEvents.on('change', listener);
  return () => {
    levelEvents.off('change', listener);
  };
}

export default logger;
