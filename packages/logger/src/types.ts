/**
 * @fileoverview Type definitions for the crossover-desk logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/backtest.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON (true) or pretty single-line output (false).
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also write to this file when set */
  filePath?: string;

  /**
   * Write to stderr/stdout.
   * @default true
   */
  console?: boolean;
}

/**
 * Fields that show up on backtest log lines. All optional; anything else
 * may be added through the index signature.
 */
export interface LogContext {
  component?: string;
  ticker?: string;
  policy?: string;
  provider?: string;
  request_id?: string;
  operation?: string;
  duration_ms?: number;
  result?: 'success' | 'error' | 'unavailable' | 'partial';
  count?: number;
  [key: string]: unknown;
}

/**
 * Winston's logger, re-exported so consumers need not depend on winston.
 */
export type Logger = WinstonLogger;
