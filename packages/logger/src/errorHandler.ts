/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. They log, flush, and exit with code 1.
 */

import type { Logger } from './types.js';

const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describeReason(reason: unknown): Record<string, unknown> {
  return reason instanceof Error
    ? { name: reason.name, message: reason.message, stack: reason.stack }
    : { message: String(reason) };
}

/**
 * Attach handlers once per process; later calls only log a warning.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeReason(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeReason(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  handlersAttached = true;
  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
}

/**
 * Flush the logger, then exit. Exits anyway once the timeout expires.
 */
export function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
