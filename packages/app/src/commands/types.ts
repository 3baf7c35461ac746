/**
 * Command types and interfaces
 */

import type { AccountingMode, SignalPolicyKind } from '@crossover/contracts';
import type { OutputFormat } from '../formatters/backtest-formatter.js';
import type { CommandError } from './errors.js';

/**
 * Base command interface
 */
export interface Command<TOptions = CommandOptions> {
  name: string;
  description: string;
  aliases?: string[];
  execute(args: string[], options: TOptions): Promise<CommandResult>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
  color?: boolean;
}

/**
 * Options of the backtest command. Anything left out falls back to the
 * loaded configuration.
 */
export interface BacktestCommandOptions extends CommandOptions {
  /** Comma-separated ticker list */
  tickers?: string;
  start?: string;
  end?: string;
  policy?: SignalPolicyKind;
  window?: number;
  shortWindow?: number;
  longWindow?: number;
  threshold?: number;
  initialInvestment?: number;
  accounting?: AccountingMode;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  output: string;
  exitCode: number;
  error?: CommandError;
  duration?: number;
  metadata?: Record<string, unknown>;
}
