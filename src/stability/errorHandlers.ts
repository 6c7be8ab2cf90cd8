// Process-level error handlers and graceful shutdown.

import type { AppLogger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

export interface CleanupTask {
  name: string;
  run: () => Promise<void> | void;
}

export interface ShutdownOptions {
  logger: AppLogger;
  /** Fired first; every long-running loop listens to its signal. */
  controller: AbortController;
  /** Forced exit when cleanup takes longer than this. */
  timeoutMs?: number;
  exit?: (code: number) => void;
}

export interface ShutdownHandler {
  readonly signal: AbortSignal;
  /** Cleanup tasks run in reverse registration order. */
  register(name: string, run: CleanupTask['run']): void;
  shutdown(reason: string, exitCode?: number): Promise<void>;
}

export function createShutdownHandler({
  logger,
  controller,
  timeoutMs = 15000,
  exit = (code) => process.exit(code),
}: ShutdownOptions): ShutdownHandler {
  const tasks: CleanupTask[] = [];
  let inProgress: Promise<void> | null = null;

  async function run(reason: string, exitCode: number): Promise<void> {
    logger.info('shutdown:start', { reason });
    controller.abort();

    const forced = setTimeout(() => {
      logger.error('shutdown:forced', { timeoutMs });
      exit(1);
    }, timeoutMs);
    forced.unref();

    let code = exitCode;
    for (const task of [...tasks].reverse()) {
      try {
        await task.run();
        logger.info('shutdown:closed', { name: task.name });
      } catch (err) {
        code = 1;
        logger.error('shutdown:cleanup_failed', { name: task.name, error: errorMessage(err) });
      }
    }

    clearTimeout(forced);
    logger.info('shutdown:done', { code });
    exit(code);
  }

  return {
    signal: controller.signal,
    register(name, task) {
      tasks.push({ name, run: task });
    },
    shutdown(reason, exitCode = 0) {
      inProgress ??= run(reason, exitCode);
      return inProgress;
    },
  };
}

/**
 * Logs unhandled rejections. Production keeps running; elsewhere the process
 * shuts down so the failure is noticed.
 * @returns removes the handler
 */
export function setupUnhandledRejectionHandler(
  logger: AppLogger,
  handler: ShutdownHandler,
  nodeEnv: string,
): () => void {
  const listener = (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (nodeEnv !== 'production') {
      startShutdown(logger, handler, 'unhandledRejection', 1);
    }
  };
  process.on('unhandledRejection', listener);
  return () => process.off('unhandledRejection', listener);
}

export function setupUncaughtExceptionHandler(logger: AppLogger, handler: ShutdownHandler): () => void {
  const listener = (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    startShutdown(logger, handler, 'uncaughtException', 1);
  };
  process.on('uncaughtException', listener);
  return () => process.off('uncaughtException', listener);
}

export function setupGracefulShutdown(logger: AppLogger, handler: ShutdownHandler): () => void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  const listener = (signal: NodeJS.Signals) => {
    logger.info('process:signal', { signal });
    startShutdown(logger, handler, signal, 0);
  };
  signals.forEach((signal) => process.on(signal, listener));
  return () => signals.forEach((signal) => process.off(signal, listener));
}

function startShutdown(logger: AppLogger, handler: ShutdownHandler, reason: string, exitCode: number): void {
  handler.shutdown(reason, exitCode).catch((err: unknown) => {
    logger.fatal('shutdown:failed', { reason, error: errorMessage(err) });
  });
}
