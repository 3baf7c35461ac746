/**
 * @fileoverview Logger factory.
 */

import winston, { format } from 'winston';
import type { Logger, LoggerConfig, LogContext } from './types.js';
import { prettyPrint, redactPII, standardFields } from './formats.js';

/**
 * Create a winston logger with redaction, standard fields and either JSON
 * or pretty output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Batch started', { count: 3 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Redaction first so nothing downstream sees a secret
  const baseFormat = format.combine(redactPII(), standardFields);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    // Everything to stderr: stdout carries the report itself
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? format.json() : prettyPrint,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    // Files are always JSON, whatever the console shows
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.json(),
      })
    );
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    // A logger without transports would warn on every write
    silent: transports.length === 0,
    exitOnError: false,
  });
}

/**
 * Child logger that stamps `context` on every entry.
 *
 * @example
 * ```typescript
 * const tickerLogger = createChildLogger(logger, { component: 'batch', ticker: 'AAPL' });
 * tickerLogger.info('Backtest complete', { duration_ms: 12 });
 * ```
 */
export function createChildLogger(logger: Logger, context: LogContext): Logger {
  return logger.child(context);
}
