/**
 * @fileoverview Main entry point for @crossover/contracts.
 *
 * Exports the data model shared by the backtest core, the providers and the
 * app: bars and series, signal events, portfolio results, batch reports and
 * the error taxonomy.
 *
 * @module @crossover/contracts
 */

// Market data
export type {
  RawBar,
  DailyBar,
  Series,
  SeriesResult,
  UnavailableReason,
  MarketDataProvider,
} from './market.js';

export { seriesOk, seriesUnavailable, isSeriesOk } from './market.js';

// Signals
export type {
  SignalKind,
  Position,
  SignalPolicy,
  SignalPolicyKind,
  AccountingMode,
  SignalEvent,
  SignalHistoryEntry,
} from './signals.js';

// Portfolio
export type { PortfolioResult, AggregatePortfolioResult } from './portfolio.js';

// Backtest config and reports
export type {
  BacktestConfig,
  SeriesSummary,
  TickerReport,
  TickerOutcome,
  BatchReport,
} from './backtest.js';

// Error classes and guards
export {
  CrossoverError,
  ProviderUnavailableError,
  InsufficientHistoryError,
  InvalidWindowConfigurationError,
  isCrossoverError,
  isProviderUnavailableError,
  isInsufficientHistoryError,
  isInvalidWindowConfigurationError,
} from './errors.js';
