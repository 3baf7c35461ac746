/**
 * @fileoverview Public API of @crossover/logger: structured logging, request
 * context and timers.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

export { getRequestContext, getRequestId, withRequestContext } from './request-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { redactPII, redactSensitiveFields, isSensitiveFieldName, renderLine, REDACTED } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
