/**
 * Single-ticker backtest pipeline.
 *
 * Moving averages → signal engine → portfolio simulator → history reporter,
 * in that order, over one immutable series. Pure: no I/O, no logging, no
 * state retained between calls.
 */

import type { BacktestConfig, Series, TickerReport } from '@crossover/contracts';
import { InsufficientHistoryError } from '@crossover/contracts';
import { runSignalEngine } from './signal-engine.js';
import { summarizePortfolio } from './portfolio.js';
import { toSignalHistory } from './history.js';
import { summarizeSeries, recentBars } from './statistics.js';
import { formatSignalBanner } from './banner.js';

/**
 * Number of trailing bars included in a report.
 */
export const RECENT_BAR_COUNT = 5;

/**
 * Run the full backtest for one normalized series.
 *
 * A series shorter than the windows in use is not an error: the report has
 * an empty (or HOLD-only) history and `insufficientHistory` set.
 *
 * @throws {InsufficientHistoryError} If the series has no bars at all
 * @throws {InvalidWindowConfigurationError} If a window is not a positive integer
 *
 * @example
 * ```typescript
 * const { config } = resolveBacktestConfig({ shortWindow: 20, longWindow: 50 });
 * const report = runBacktest(config, series);
 * console.log(report.banner, report.portfolio.roiPercent);
 * ```
 */
export function runBacktest(config: BacktestConfig, series: Series): TickerReport {
  if (series.bars.length === 0) {
    throw new InsufficientHistoryError(`Series for ${series.ticker} is empty`, {
      ticker: series.ticker,
      bars: 0,
      required: 1,
    });
  }

  const engine = runSignalEngine(series, config);

  return {
    ticker: series.ticker,
    policy: config.policy,
    events: engine.events,
    history: toSignalHistory(engine.events),
    latestSignal: engine.latestSignal,
    finalPosition: engine.finalPosition,
    banner: formatSignalBanner(config.policy, engine.latestSignal, engine.latestClose, engine.latestAverages),
    portfolio: summarizePortfolio(config.initialInvestment, engine.finalValue),
    summary: summarizeSeries(series),
    recentBars: recentBars(series, RECENT_BAR_COUNT),
    insufficientHistory: engine.insufficientHistory,
  };
}
