/**
 * Backtest command implementation
 */

import type { BatchReport, MarketDataProvider } from '@crossover/contracts';
import { parseTickers, resolveBacktestConfig, runBatch } from '@crossover/backtest';
import type { Logger } from '@crossover/logger';
import type { Config } from '../config/index.js';
import { BacktestFormatter } from '../formatters/backtest-formatter.js';
import { resolveDateRange } from '../utils/dates.js';
import { CommandError, CommandErrorCode, EXIT_CODES, errorLogFields, wrapError } from './errors.js';
import type { BacktestCommandOptions, Command, CommandResult } from './types.js';

export interface BacktestCommandConfig {
  provider: MarketDataProvider;
  logger: Logger;
  defaults: Config['backtest'];
  /** Clock for the default date range */
  now?: () => Date;
}

/**
 * backtest command - runs the signal engine and portfolio simulator for
 * every requested ticker and formats the combined report
 */
export class BacktestCommand implements Command<BacktestCommandOptions> {
  name = 'backtest';
  description = 'Backtest moving-average signals over daily bars';
  aliases = ['bt'];

  private readonly provider: MarketDataProvider;
  private readonly logger: Logger;
  private readonly defaults: Config['backtest'];
  private readonly now: () => Date;

  constructor(config: BacktestCommandConfig) {
    this.provider = config.provider;
    this.logger = config.logger;
    this.defaults = config.defaults;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * @param args - Ticker arguments; each may itself be a comma-separated list
   */
  async execute(args: string[], options: BacktestCommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const report = await this.run(args, options);
      const output = this.render(report, options);
      const succeeded = report.aggregate.tickers.length;
      const unavailable = report.outcomes.filter((outcome) => outcome.status === 'unavailable').length;
      const anyOk = report.outcomes.some((outcome) => outcome.status === 'ok');

      return {
        success: anyOk,
        output,
        exitCode: anyOk ? EXIT_CODES.OK : EXIT_CODES.FAILURE,
        ...(anyOk
          ? {}
          : {
              error: new CommandError(
                CommandErrorCode.PROVIDER_ERROR,
                'No data available for any requested ticker',
                { tickers: report.outcomes.map((outcome) => (outcome.status === 'ok' ? outcome.report.ticker : outcome.ticker)) }
              ),
            }),
        duration: Date.now() - startTime,
        metadata: {
          tickers: report.outcomes.length,
          succeeded,
          unavailable,
          policy: report.config.policy.kind,
          provider: this.provider.id,
        },
      };
    } catch (error) {
      const commandError = wrapError(error, CommandErrorCode.INTERNAL_ERROR);
      this.logger.error('Backtest command failed', {
        code: commandError.code,
        error: errorLogFields(error, options.verbose),
      });

      return {
        success: false,
        output: '',
        exitCode: commandError.exitCode,
        error: commandError,
        duration: Date.now() - startTime,
      };
    }
  }

  private async run(args: string[], options: BacktestCommandOptions): Promise<BatchReport> {
    const source = args.length > 0 ? args.join(',') : options.tickers ?? this.defaults.tickers;
    const tickers = parseTickers(source);
    if (tickers.length === 0) {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, 'No tickers given', { tickers: source });
    }

    const { start, end } = resolveDateRange(options, this.defaults.lookbackDays, this.now());

    const { config, warnings } = resolveBacktestConfig({
      policy: options.policy ?? this.defaults.policy,
      threshold: options.threshold ?? this.defaults.threshold,
      window: options.window ?? this.defaults.window,
      shortWindow: options.shortWindow ?? this.defaults.shortWindow,
      longWindow: options.longWindow ?? this.defaults.longWindow,
      initialInvestment: options.initialInvestment ?? this.defaults.initialInvestment,
      accounting: options.accounting ?? this.defaults.accounting,
    });

    for (const warning of warnings) {
      this.logger.warn('Configuration adjusted', { warning });
    }

    this.logger.info('Executing backtest command', {
      tickers,
      start,
      end,
      policy: config.policy.kind,
      provider: this.provider.id,
    });

    return runBatch({
      provider: this.provider,
      tickers,
      start,
      end,
      config,
      warnings,
      logger: this.logger,
    });
  }

  private render(report: BatchReport, options: BacktestCommandOptions): string {
    try {
      return new BacktestFormatter({ color: options.color ?? false }).format(report, options.format ?? 'text');
    } catch (error) {
      throw wrapError(error, CommandErrorCode.FORMAT_ERROR, { format: options.format ?? 'text' });
    }
  }
}
