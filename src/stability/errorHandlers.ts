// Process-level error handlers and graceful shutdown

import type { Server } from 'http';
import { logger, errorMessage } from '@/services/logger';

type CleanupHook = () => Promise<void>;

let serverInstance: Server | null = null;
const cleanupHooks: Array<{ name: string; run: CleanupHook }> = [];
let shuttingDown = false;

const SHUTDOWN_TIMEOUT_MS = 15000;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs on shutdown, after the HTTP server stops accepting requests. */
export function registerCleanup(name: string, run: CleanupHook): void {
  cleanupHooks.push({ name, run });
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) logger.warn('process:server_close_failed', { error: err.message });
      resolve();
    });
  });
}

export async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  if (serverInstance) await closeServer(serverInstance);

  let code = exitCode;
  for (const hook of cleanupHooks) {
    try {
      await hook.run();
    } catch (err) {
      logger.error('process:cleanup_failed', { hook: hook.name, error: errorMessage(err) });
      code = 1;
    }
  }
  clearTimeout(forced);
  process.exit(code);
}
