/**
 * @fileoverview Market data types and provider contract.
 *
 * Defines the raw bar shape a provider hands over, the validated daily bar and
 * series produced by normalization, and the tagged result a provider returns
 * instead of throwing for ticker-level failures.
 *
 * @module @crossover/contracts/market
 */

/**
 * A daily bar as received from a provider, before any validation.
 *
 * Fields may be missing, null, numeric strings or garbage; the series
 * normalizer decides what survives.
 */
export interface RawBar {
  /** Calendar date (YYYY-MM-DD), ISO timestamp, epoch milliseconds or Date */
  date: unknown;
  open: unknown;
  high: unknown;
  low: unknown;
  close: unknown;
  volume: unknown;
}

/**
 * One trading day's OHLCV record.
 *
 * @invariant open, high, low, close are finite and > 0
 * @invariant volume is a non-negative integer
 * @invariant date is a YYYY-MM-DD calendar date
 *
 * @example
 * ```typescript
 * const bar: DailyBar = {
 *   date: '2024-03-01',
 *   open: 179.55,
 *   high: 180.53,
 *   low: 177.38,
 *   close: 179.66,
 *   volume: 73488000
 * };
 * ```
 */
export interface DailyBar {
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Ordered daily bars for one ticker.
 *
 * @invariant bars.length > 0
 * @invariant bars are strictly increasing by date (no duplicates)
 */
export interface Series {
  readonly ticker: string;
  readonly bars: readonly DailyBar[];
}

/**
 * Why a ticker produced no usable series.
 *
 * - `network`: transport failure or timeout after retries
 * - `not-found`: provider does not know the ticker
 * - `empty`: provider answered but nothing survived normalization
 * - `invalid-response`: payload did not have the expected shape
 */
export type UnavailableReason = 'network' | 'not-found' | 'empty' | 'invalid-response';

/**
 * Outcome of fetching one ticker's series.
 */
export type SeriesResult =
  | { readonly kind: 'ok'; readonly series: Series }
  | {
      readonly kind: 'unavailable';
      readonly ticker: string;
      readonly reason: UnavailableReason;
      readonly message: string;
    };

/**
 * Source of daily bars for a ticker and an inclusive date range.
 *
 * Implementations must resolve (never reject) for ticker-level failures,
 * reporting them as `unavailable` so a batch keeps going.
 */
export interface MarketDataProvider {
  /** Short identifier used in logs (e.g. 'yahoo', 'fixture') */
  readonly id: string;

  /**
   * Fetch the daily series for `ticker` over `[start, end]` (YYYY-MM-DD).
   */
  fetchSeries(ticker: string, start: string, end: string): Promise<SeriesResult>;
}

/**
 * Builds a successful series result.
 */
export function seriesOk(series: Series): SeriesResult {
  return { kind: 'ok', series };
}

/**
 * Builds an unavailable series result.
 */
export function seriesUnavailable(
  ticker: string,
  reason: UnavailableReason,
  message: string
): SeriesResult {
  return { kind: 'unavailable', ticker, reason, message };
}

/**
 * Type guard for the successful branch of a {@link SeriesResult}.
 */
export function isSeriesOk(
  result: SeriesResult
): result is Extract<SeriesResult, { kind: 'ok' }> {
  return result.kind === 'ok';
}
