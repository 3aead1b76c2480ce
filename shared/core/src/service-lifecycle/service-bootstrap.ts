/**
 * Service Bootstrap Utilities
 *
 * Shutdown handling, signal registration and entry point boilerplate for
 * long-running services.
 */

import type { Server } from 'http';
import type { ILogger } from '../logging';
import { getErrorMessage } from '../resilience/error-handling';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for graceful shutdown setup.
 */
export interface ServiceShutdownConfig {
  /** Logger instance for shutdown messages */
  logger: ILogger;

  /** Async callback to run during shutdown (stop servers, release clients) */
  onShutdown: () => Promise<void>;

  /** Service name for log messages */
  serviceName: string;

  /** Max time (ms) to wait for graceful shutdown before force-exiting (default: 10000) */
  shutdownTimeoutMs?: number;

  /** Process exit hook (default: process.exit) */
  exit?: (code: number) => void;
}

/**
 * Removes every handler registered by setupServiceShutdown.
 */
export type ServiceShutdownCleanup = () => void;

/**
 * Configuration for the runServiceMain wrapper.
 */
export interface RunServiceMainConfig {
  /** The async main function to execute */
  main: () => Promise<void>;

  /** Service name for error logging */
  serviceName: string;

  /** Logger instance (falls back to console.error if not provided) */
  logger?: ILogger;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Sets up graceful shutdown handling for a service.
 *
 * Registers SIGTERM and SIGINT handlers that run `onShutdown` once, an
 * uncaughtException handler that triggers the same shutdown, and an
 * unhandledRejection handler that logs. A second signal during shutdown is
 * ignored; a shutdown that outlives `shutdownTimeoutMs` force-exits with 1.
 *
 * @returns Cleanup function to remove all registered handlers (useful in tests)
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    const forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${shutdownTimeoutMs}ms, forcing exit`);
      exit(1);
    }, shutdownTimeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      clearTimeout(forceExitTimer);
      exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      exit(1);
    }
  };

  const sigtermHandler = () => void shutdown('SIGTERM');
  const sigintHandler = () => void shutdown('SIGINT');
  const uncaughtHandler = (error: Error) => {
    logger.error(`Uncaught exception in ${serviceName}`, {
      error: error.message,
      stack: error.stack,
    });
    void shutdown('uncaughtException');
  };
  const rejectionHandler = (reason: unknown) => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

// =============================================================================
// Service Runner
// =============================================================================

/**
 * Wraps a service's main() function with standard error handling and Jest guard.
 *
 * Skips auto-start when JEST_WORKER_ID is set; a rejected main() is logged
 * and exits the process with 1.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    const message = `Unhandled error in ${serviceName}`;
    if (logger) {
      logger.error(message, { error: getErrorMessage(error) });
    } else {
      console.error(`${message}:`, error);
    }
    process.exit(1);
  });
}

/**
 * Close an HTTP server, resolving after `timeoutMs` even if keep-alive
 * connections hold it open.
 *
 * @param server - HTTP server to close (null is safely handled)
 */
export async function closeServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server) {
    return;
  }

  await new Promise<void>((resolve) => {
    let resolved = false;
    const safeResolve = () => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    const timer = setTimeout(() => {
      server.closeAllConnections();
      safeResolve();
    }, timeoutMs);
    timer.unref();

    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
    server.closeIdleConnections();
  });
}
