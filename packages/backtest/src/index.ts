/**
 * @crossover/backtest
 *
 * Moving-average crossover signals and single-position portfolio simulation
 * over daily bars.
 *
 * Everything except {@link runBatch} is a pure function of its inputs: no I/O,
 * deterministic, safe to recompute.
 *
 * @packageDocumentation
 */

// Series normalizer
export {
  normalizeSeries,
  normalizeBars,
  normalizeBar,
  normalizeDate,
  coerceNumber,
  coerceVolume,
} from './normalize.js';
export type { NormalizeResult } from './normalize.js';

// Moving averages
export { simpleMovingAverage, computeMovingAverage, assertWindow } from './moving-average.js';
export type { MovingAverageSeries } from './moving-average.js';

// Signal engine
export { runSignalEngine, isNearAverage } from './signal-engine.js';
export type { SignalEngineResult, LatestAverage } from './signal-engine.js';

// Portfolio simulator
export {
  PortfolioLedger,
  estimateLevelCountValue,
  summarizePortfolio,
  aggregatePortfolios,
} from './portfolio.js';
export type { PortfolioState } from './portfolio.js';

// Signal history reporter
export { toSignalHistory } from './history.js';

// Configuration
export {
  resolveBacktestConfig,
  DEFAULT_BACKTEST_CONFIG,
  DEFAULT_THRESHOLD,
  OPERATIONAL_BOUNDS,
} from './config.js';
export type { BacktestConfigInput, ResolvedBacktestConfig } from './config.js';

// Reports
export { runBacktest, RECENT_BAR_COUNT } from './run-backtest.js';
export { summarizeSeries, recentBars } from './statistics.js';
export { formatSignalBanner, formatPrice } from './banner.js';
export { runBatch, parseTickers } from './batch.js';
export type { BatchOptions } from './batch.js';

export { safeDivide, percentChange } from './math.js';
