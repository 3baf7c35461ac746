/**
 * Signal engine.
 *
 * Walks a series once, in date order, and turns the relationship between
 * closes and moving averages into BUY/SELL/HOLD events according to the
 * configured {@link SignalPolicy}.
 *
 * **Policies:**
 * - `level-count`: stateless. At the latest bar only, count how many of the
 *   trailing `window` closes sit below their moving average. Fewer than
 *   `window / 2` is BUY, otherwise SELL (exactly half is SELL).
 * - `plain-crossover`: FLAT → LONG (BUY) on the bar where the short average
 *   first rises above the long one; LONG → FLAT (SELL) on any bar where it is
 *   below. Equal averages never trigger a transition.
 * - `threshold-gated-crossover`: as plain-crossover, but a transition is only
 *   taken while the close is within `threshold` (relative) of either average.
 *
 * Bar 0 never produces a crossover event, and bars where either average is
 * still undefined are skipped with the position unchanged. A position still
 * open after the last bar is summarized by a terminal HOLD event carrying the
 * marked-to-market value, unless the last bar already has its own event.
 */

import type {
  BacktestConfig,
  DailyBar,
  Position,
  Series,
  SignalEvent,
  SignalKind,
} from '@crossover/contracts';
import { computeMovingAverage, assertWindow, type MovingAverageSeries } from './moving-average.js';
import { estimateLevelCountValue, PortfolioLedger } from './portfolio.js';
import { safeDivide } from './math.js';

/**
 * A moving average as seen on the last bar of the series.
 */
export interface LatestAverage {
  window: number;
  value: number | undefined;
}

/**
 * Everything the engine derived from one pass over a series.
 */
export interface SignalEngineResult {
  events: SignalEvent[];
  /** Label for the last bar; HOLD when averages are missing or equal */
  latestSignal: SignalKind;
  finalPosition: Position;
  /** Account value at the end of the run; null when it cannot be computed */
  finalValue: number | null;
  latestClose: number;
  /** Averages in use: the single window, or short then long */
  latestAverages: LatestAverage[];
  /** True when the series is shorter than the longest window in use */
  insufficientHistory: boolean;
}

/**
 * Run the engine for the policy in `config`.
 *
 * @throws {InvalidWindowConfigurationError} If a window in use is not a positive integer
 *
 * @example
 * ```typescript
 * const result = runSignalEngine(series, {
 *   policy: { kind: 'plain-crossover' },
 *   window: 30,
 *   shortWindow: 20,
 *   longWindow: 50,
 *   initialInvestment: 10000,
 *   accounting: 'mark-to-market'
 * });
 * ```
 */
export function runSignalEngine(series: Series, config: BacktestConfig): SignalEngineResult {
  switch (config.policy.kind) {
    case 'level-count':
      return runLevelCount(series, config);
    case 'plain-crossover':
      return runCrossover(series, config, undefined);
    case 'threshold-gated-crossover':
      return runCrossover(series, config, config.policy.threshold);
  }
}

/**
 * Whether the close is within `threshold` (relative to the close) of either average.
 */
export function isNearAverage(
  close: number,
  shortMa: number,
  longMa: number,
  threshold: number
): boolean {
  const shortDistance = safeDivide(Math.abs(close - shortMa), close);
  const longDistance = safeDivide(Math.abs(close - longMa), close);

  return (
    (shortDistance !== null && shortDistance <= threshold) ||
    (longDistance !== null && longDistance <= threshold)
  );
}

/**
 * Level label from the short/long relation on one bar.
 */
function levelLabel(shortMa: number | undefined, longMa: number | undefined): SignalKind {
  if (shortMa === undefined || longMa === undefined) {
    return 'HOLD';
  }
  if (shortMa > longMa) return 'BUY';
  if (shortMa < longMa) return 'SELL';
  return 'HOLD';
}

function lastBarOf(series: Series): { bar: DailyBar | undefined; index: number } {
  const index = series.bars.length - 1;
  return { bar: series.bars[index], index };
}

function runLevelCount(series: Series, config: BacktestConfig): SignalEngineResult {
  const { window, initialInvestment } = config;
  assertWindow(window, 'window');

  const averages = computeMovingAverage(series, window);
  const { bar: last, index: lastIndex } = lastBarOf(series);
  const latestMa = averages[lastIndex];

  if (!last || latestMa === undefined) {
    return {
      events: [],
      latestSignal: 'HOLD',
      finalPosition: 'FLAT',
      finalValue: initialInvestment,
      latestClose: last?.close ?? 0,
      latestAverages: [{ window, value: latestMa }],
      insufficientHistory: true,
    };
  }

  let daysBelow = 0;
  for (let i = Math.max(0, lastIndex - window + 1); i <= lastIndex; i++) {
    const bar = series.bars[i];
    const average = averages[i];
    if (bar && average !== undefined && bar.close < average) {
      daysBelow++;
    }
  }

  const signal: SignalKind = daysBelow < window / 2 ? 'BUY' : 'SELL';
  const position: Position = signal === 'BUY' ? 'LONG' : 'FLAT';
  const value = estimateLevelCountValue(initialInvestment, signal, last.close, latestMa);

  return {
    events: [
      {
        date: last.date,
        index: lastIndex,
        kind: signal,
        price: last.close,
        positionAfter: position,
        portfolioValue: value,
        longMa: latestMa,
      },
    ],
    latestSignal: signal,
    finalPosition: position,
    finalValue: value,
    latestClose: last.close,
    latestAverages: [{ window, value: latestMa }],
    insufficientHistory: false,
  };
}

function runCrossover(
  series: Series,
  config: BacktestConfig,
  threshold: number | undefined
): SignalEngineResult {
  const { shortWindow, longWindow } = config;
  assertWindow(shortWindow, 'shortWindow');
  assertWindow(longWindow, 'longWindow');

  const shortMa = computeMovingAverage(series, shortWindow);
  const longMa = computeMovingAverage(series, longWindow);
  const ledger = new PortfolioLedger(config.initialInvestment, config.accounting);
  const events: SignalEvent[] = [];

  let position: Position = 'FLAT';
  let previousAbove = false;

  for (let i = 0; i < series.bars.length; i++) {
    const bar = series.bars[i];
    if (!bar) continue;

    const previousBar = series.bars[i - 1];
    if (previousBar) {
      ledger.markToMarket(previousBar.close, bar.close);
    }

    const short = shortMa[i];
    const long = longMa[i];
    if (short === undefined || long === undefined) {
      previousAbove = false;
      continue;
    }

    const above = short > long;
    const crossedUp = above && !previousAbove;
    previousAbove = above;

    if (i === 0) continue;
    if (threshold !== undefined && !isNearAverage(bar.close, short, long, threshold)) continue;

    if (crossedUp && position === 'FLAT') {
      position = 'LONG';
      ledger.open(bar.close);
      events.push(crossoverEvent(bar, i, 'BUY', position, ledger.markedValue(bar.close), short, long));
    } else if (short < long && position === 'LONG') {
      position = 'FLAT';
      ledger.close(bar.close);
      events.push(crossoverEvent(bar, i, 'SELL', position, ledger.markedValue(bar.close), short, long));
    }
  }

  const { bar: last, index: lastIndex } = lastBarOf(series);
  const lastShort = shortMa[lastIndex];
  const lastLong = longMa[lastIndex];

  if (last && position === 'LONG' && events[events.length - 1]?.index !== lastIndex) {
    events.push(crossoverEvent(last, lastIndex, 'HOLD', position, ledger.markedValue(last.close), lastShort, lastLong));
  }

  return {
    events,
    latestSignal: levelLabel(lastShort, lastLong),
    finalPosition: position,
    finalValue: ledger.finalValue(),
    latestClose: last?.close ?? 0,
    latestAverages: [
      { window: shortWindow, value: lastShort },
      { window: longWindow, value: lastLong },
    ],
    insufficientHistory: series.bars.length < Math.max(shortWindow, longWindow),
  };
}

function crossoverEvent(
  bar: DailyBar,
  index: number,
  kind: SignalKind,
  positionAfter: Position,
  portfolioValue: number | null,
  shortMa: number | undefined,
  longMa: number | undefined
): SignalEvent {
  return {
    date: bar.date,
    index,
    kind,
    price: bar.close,
    positionAfter,
    portfolioValue,
    ...(shortMa !== undefined ? { shortMa } : {}),
    ...(longMa !== undefined ? { longMa } : {}),
  };
}
