/**
 * Series summary statistics shown alongside the chart.
 */

import type { DailyBar, Series, SeriesSummary } from '@crossover/contracts';
import { InsufficientHistoryError } from '@crossover/contracts';
import { percentChange } from './math.js';

/**
 * Current price, day-over-day change, latest volume and period extremes.
 *
 * @throws {InsufficientHistoryError} If the series has no bars
 */
export function summarizeSeries(series: Series): SeriesSummary {
  const { bars } = series;
  const last = bars[bars.length - 1];

  if (!last) {
    throw new InsufficientHistoryError(`No bars to summarize for ${series.ticker}`, {
      ticker: series.ticker,
      bars: 0,
      required: 1,
    });
  }

  const previous = bars[bars.length - 2];
  let periodHigh = last.high;
  let periodLow = last.low;
  for (const bar of bars) {
    periodHigh = Math.max(periodHigh, bar.high);
    periodLow = Math.min(periodLow, bar.low);
  }

  return {
    barCount: bars.length,
    currentPrice: last.close,
    dailyChangePercent: previous ? percentChange(previous.close, last.close) : null,
    latestVolume: last.volume,
    periodHigh,
    periodLow,
  };
}

/**
 * The most recent `count` bars, oldest first.
 */
export function recentBars(series: Series, count: number = 5): DailyBar[] {
  return count > 0 ? series.bars.slice(-count) : [];
}
