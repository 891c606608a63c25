/**
 * Application Lifecycle Management
 *
 * Handles graceful shutdown and cleanup
 */

import { logger } from './logger.js';
import { getErrorMessage } from './errors.js';

type CleanupHandler = () => Promise<void> | void;

const cleanupHandlers: CleanupHandler[] = [];
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════
// Cleanup Registration
// ═══════════════════════════════════════════════════════════════════

/**
 * Register a cleanup handler to run on shutdown
 * Handlers are run in reverse order (LIFO)
 */
export function onShutdown(handler: CleanupHandler): void {
  cleanupHandlers.push(handler);
}

// ═══════════════════════════════════════════════════════════════════
// Graceful Shutdown
// ═══════════════════════════════════════════════════════════════════

export interface ShutdownOptions {
  /** Timeout for graceful shutdown in ms (default: 30000) */
  timeout?: number;
  /** Exit process after shutdown (default: true) */
  exit?: boolean;
  /** Exit code on successful shutdown (default: 0) */
  exitCode?: number;
}

/**
 * Perform graceful shutdown
 */
export async function shutdown(options: ShutdownOptions = {}): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress');
    return;
  }

  isShuttingDown = true;
  const { timeout = 30000, exit = true, exitCode = 0 } = options;

  logger.info('Starting graceful shutdown...');

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timeout, forcing exit');
    if (exit) process.exit(1);
  }, timeout);
  forceExitTimer.unref();

  let failed = false;
  for (const handler of [...cleanupHandlers].reverse()) {
    try {
      await handler();
    } catch (error) {
      failed = true;
      logger.error('Cleanup handler failed', { error: getErrorMessage(error) });
    }
  }

  clearTimeout(forceExitTimer);
  logger.info('Graceful shutdown complete', { failed });

  if (exit) {
    process.exit(failed ? 1 : exitCode);
  }
}

// ═══════════════════════════════════════════════════════════════════
// Signal Handlers
// ═══════════════════════════════════════════════════════════════════

/**
 * Setup signal handlers for graceful shutdown
 * Call this once at application startup
 */
export function setupGracefulShutdown(options: ShutdownOptions = {}): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  for (const signal of signals) {
    process.on(signal, () => {
      logger.info(`Received ${signal}`);
      void shutdown(options);
    });
  }

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    void shutdown({ ...options, exitCode: 1 });
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: getErrorMessage(reason) });
    void shutdown({ ...options, exitCode: 1 });
  });

  logger.debug('Graceful shutdown handlers registered');
}

export function isShutdownInProgress(): boolean {
  return isShuttingDown;
}
