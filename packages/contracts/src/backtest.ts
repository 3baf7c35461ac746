/**
 * @fileoverview Backtest configuration and report DTOs.
 *
 * @module @crossover/contracts/backtest
 */

import type { DailyBar, UnavailableReason } from './market.js';
import type { AggregatePortfolioResult, PortfolioResult } from './portfolio.js';
import type {
  AccountingMode,
  Position,
  SignalEvent,
  SignalHistoryEntry,
  SignalKind,
  SignalPolicy,
} from './signals.js';

/**
 * Immutable parameters of one backtest run, passed by value into the core.
 *
 * `window` is used by `level-count`; `shortWindow`/`longWindow` by the
 * crossover policies.
 */
export interface BacktestConfig {
  readonly policy: SignalPolicy;
  readonly window: number;
  readonly shortWindow: number;
  readonly longWindow: number;
  readonly initialInvestment: number;
  readonly accounting: AccountingMode;
}

/**
 * Summary statistics over a series, as shown next to the chart.
 */
export interface SeriesSummary {
  readonly barCount: number;
  readonly currentPrice: number;
  readonly dailyChangePercent: number | null;
  readonly latestVolume: number;
  readonly periodHigh: number;
  readonly periodLow: number;
}

/**
 * Everything the presentation layer needs for one ticker.
 */
export interface TickerReport {
  readonly ticker: string;
  readonly policy: SignalPolicy;
  readonly events: readonly SignalEvent[];
  readonly history: readonly SignalHistoryEntry[];
  readonly latestSignal: SignalKind;
  readonly finalPosition: Position;
  readonly banner: string;
  readonly portfolio: PortfolioResult;
  readonly summary: SeriesSummary;
  readonly recentBars: readonly DailyBar[];
  /** True when the series was shorter than the longest window in use */
  readonly insufficientHistory: boolean;
}

/**
 * Per-ticker outcome of a batch run.
 */
export type TickerOutcome =
  | { readonly status: 'ok'; readonly report: TickerReport }
  | {
      readonly status: 'unavailable';
      readonly ticker: string;
      readonly reason: UnavailableReason | 'error';
      readonly message: string;
    };

/**
 * Multi-ticker report: per-ticker outcomes in request order plus totals over
 * the successful ones.
 */
export interface BatchReport {
  readonly start: string;
  readonly end: string;
  readonly config: BacktestConfig;
  readonly outcomes: readonly TickerOutcome[];
  readonly aggregate: AggregatePortfolioResult;
  /** Configuration adjustments made before running */
  readonly warnings: readonly string[];
}
