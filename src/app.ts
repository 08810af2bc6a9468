import logger from './logger.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = {
  name: string;
  status: 'ok' | 'error';
  error?: Error;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item === entry);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

/** Runs hooks newest first; a failing hook does not stop the rest. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: ShutdownHookResult[] = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err, hook: entry.name, reason: context.reason }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function listShutdownHooks(): string[] {
  return shutdownHooks.map(entry => entry.name);
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}
