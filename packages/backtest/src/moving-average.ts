/**
 * Trailing simple moving averages over closing prices.
 *
 * Pure functions: the output depends only on the input values and window,
 * so recomputing on the same series always yields identical arrays.
 */

import type { Series } from '@crossover/contracts';
import { InvalidWindowConfigurationError } from '@crossover/contracts';

/**
 * One value per input index; `undefined` where fewer than `window` values
 * are available (insufficient history, never zero).
 */
export type MovingAverageSeries = ReadonlyArray<number | undefined>;

/**
 * Reject windows that cannot define an average.
 *
 * Operational bounds (5..200 and friends) are applied when the config is
 * resolved; here only a positive integer is required.
 *
 * @throws {InvalidWindowConfigurationError} If window is not a positive integer
 */
export function assertWindow(window: number, field: string = 'window'): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidWindowConfigurationError(
      `${field} must be a positive integer, got ${window}`,
      { field, value: window, min: 1 }
    );
  }
}

/**
 * Compute the trailing simple moving average of `values`.
 *
 * For index `i` the average covers `values[i - window + 1 .. i]` and is only
 * defined when `i >= window - 1`.
 *
 * @example
 * ```typescript
 * simpleMovingAverage([1, 2, 3, 4], 2);
 * // [undefined, 1.5, 2.5, 3.5]
 * ```
 */
export function simpleMovingAverage(values: readonly number[], window: number): MovingAverageSeries {
  assertWindow(window);

  const averages: Array<number | undefined> = [];

  for (let i = 0; i < values.length; i++) {
    if (i < window - 1) {
      averages.push(undefined);
      continue;
    }

    let sum = 0;
    for (let j = i - window + 1; j <= i; j++) {
      sum += values[j] ?? 0;
    }
    averages.push(sum / window);
  }

  return averages;
}

/**
 * Moving average of a series' closes, aligned to `series.bars` by index.
 */
export function computeMovingAverage(series: Series, window: number): MovingAverageSeries {
  return simpleMovingAverage(
    series.bars.map((bar) => bar.close),
    window
  );
}
