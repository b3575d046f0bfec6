/**
 * Process lifecycle for long-running services.
 *
 * The first SIGTERM/SIGINT runs `onShutdown` (stop after the current round,
 * drain open liabilities) under a force-exit timer. A second signal while
 * that runs exits at once with 130, abandoning the drain.
 */

import type { ILogger } from '../logging';
import { formatErrorForLog, getErrorMessage } from '../resilience/error-handling';

export interface ServiceShutdownConfig {
  logger: ILogger;
  onShutdown: () => Promise<void>;
  serviceName: string;
  /** @default 10000 */
  shutdownTimeoutMs?: number;
  /** Replaced in tests */
  exit?: (code: number) => void;
}

/** Removes every process handler installed by setupServiceShutdown */
export type ServiceShutdownCleanup = () => void;

export interface RunServiceMainConfig {
  main: () => Promise<void>;
  serviceName: string;
  /** console.error when absent */
  logger?: ILogger;
}

const SIGNALS = ['SIGTERM', 'SIGINT'] as const;
type ShutdownSignal = (typeof SIGNALS)[number];

export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName } = config;
  const timeoutMs = config.shutdownTimeoutMs ?? 10_000;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  let shuttingDown = false;
  let forceExitTimer: NodeJS.Timeout | undefined;

  const finish = (code: number): void => {
    clearTimeout(forceExitTimer);
    exit(code);
  };

  const shutdown = async (reason: string): Promise<void> => {
    shuttingDown = true;
    logger.info(`Received ${reason}, shutting down ${serviceName} gracefully`);

    forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${timeoutMs}ms, forcing exit`);
      exit(1);
    }, timeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      finish(0);
    } catch (error) {
      logger.error(`Error during ${serviceName} shutdown`, formatErrorForLog(error));
      finish(1);
    }
  };

  const onSignal = (signal: ShutdownSignal): void => {
    if (shuttingDown) {
      logger.warn(`Second ${signal}, abandoning ${serviceName} shutdown`);
      finish(130);
      return;
    }
    void shutdown(signal);
  };

  const signalHandlers = SIGNALS.map(signal => [signal, () => onSignal(signal)] as const);
  const uncaughtHandler = (error: Error): void => {
    logger.error(`Uncaught exception in ${serviceName}`, formatErrorForLog(error));
    if (!shuttingDown) void shutdown('uncaughtException');
  };
  const rejectionHandler = (reason: unknown): void => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  for (const [signal, handler] of signalHandlers) process.on(signal, handler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    for (const [signal, handler] of signalHandlers) process.off(signal, handler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
    clearTimeout(forceExitTimer);
  };
}

/**
 * Run `main` with a top-level catch. Does nothing under Jest, so importing
 * an entry point from a test does not start the service.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;
  if (process.env.JEST_WORKER_ID) return;

  main().catch((error: unknown) => {
    if (logger) {
      logger.fatal(`Unhandled error in ${serviceName}`, formatErrorForLog(error));
    } else {
      console.error(`Unhandled error in ${serviceName}:`, error);
    }
    process.exit(1);
  });
}
