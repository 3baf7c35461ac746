/**
 * Multi-ticker batch runner.
 *
 * Fans out one fetch → backtest chain per ticker and fans the results back
 * in, in request order. Chains share no state, so they run concurrently; a
 * failing ticker becomes an `unavailable` outcome and never aborts the batch.
 */

import type {
  BacktestConfig,
  BatchReport,
  MarketDataProvider,
  SeriesResult,
  TickerOutcome,
} from '@crossover/contracts';
import { startTimer, type Logger } from '@crossover/logger';
import { runBacktest } from './run-backtest.js';
import { aggregatePortfolios } from './portfolio.js';

export interface BatchOptions {
  provider: MarketDataProvider;
  tickers: readonly string[];
  /** Inclusive start date (YYYY-MM-DD) */
  start: string;
  /** Inclusive end date (YYYY-MM-DD) */
  end: string;
  config: BacktestConfig;
  /** Adjustments made while resolving the config, carried into the report */
  warnings?: readonly string[];
  logger?: Logger;
}

/**
 * Split a comma-separated ticker list: trimmed, upper-cased, de-duplicated,
 * empty entries dropped.
 *
 * @example
 * ```typescript
 * parseTickers(' aapl, msft,,AAPL '); // ['AAPL', 'MSFT']
 * ```
 */
export function parseTickers(input: string): string[] {
  const seen = new Set<string>();
  for (const part of input.split(',')) {
    const ticker = part.trim().toUpperCase();
    if (ticker !== '') {
      seen.add(ticker);
    }
  }
  return [...seen];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runTicker(ticker: string, options: BatchOptions): Promise<TickerOutcome> {
  const { provider, start, end, config } = options;
  const logger = options.logger?.child({ component: 'batch', ticker, provider: provider.id });
  const timer = startTimer();

  let result: SeriesResult;
  try {
    result = await provider.fetchSeries(ticker, start, end);
  } catch (error) {
    logger?.error('Provider rejected instead of reporting unavailability', {
      error: describeError(error),
      duration_ms: timer.stop(),
      result: 'error',
    });
    return { status: 'unavailable', ticker, reason: 'network', message: describeError(error) };
  }

  if (result.kind === 'unavailable') {
    logger?.warn('Ticker unavailable', {
      reason: result.reason,
      message: result.message,
      duration_ms: timer.stop(),
      result: 'unavailable',
    });
    return { status: 'unavailable', ticker, reason: result.reason, message: result.message };
  }

  try {
    const report = runBacktest(config, result.series);
    logger?.info('Backtest complete', {
      policy: config.policy.kind,
      count: result.series.bars.length,
      events: report.events.length,
      signal: report.latestSignal,
      duration_ms: timer.stop(),
      result: 'success',
    });
    return { status: 'ok', report };
  } catch (error) {
    logger?.error('Backtest failed', {
      error: describeError(error),
      duration_ms: timer.stop(),
      result: 'error',
    });
    return { status: 'unavailable', ticker, reason: 'error', message: describeError(error) };
  }
}

/**
 * Run every ticker and assemble the multi-ticker report.
 *
 * The aggregate only covers tickers that produced a final value.
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const outcomes = await Promise.all(options.tickers.map((ticker) => runTicker(ticker, options)));

  const aggregate = aggregatePortfolios(
    outcomes.flatMap((outcome) =>
      outcome.status === 'ok'
        ? [{ ticker: outcome.report.ticker, portfolio: outcome.report.portfolio }]
        : []
    )
  );

  options.logger?.info('Batch complete', {
    component: 'batch',
    count: outcomes.length,
    succeeded: aggregate.tickers.length,
    unavailable: outcomes.filter((outcome) => outcome.status === 'unavailable').length,
  });

  return {
    start: options.start,
    end: options.end,
    config: options.config,
    outcomes,
    aggregate,
    warnings: [...(options.warnings ?? [])],
  };
}
