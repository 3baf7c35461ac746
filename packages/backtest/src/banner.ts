/**
 * One-line signal banners, as shown above each ticker's chart.
 */

import type { SignalKind, SignalPolicy } from '@crossover/contracts';
import type { LatestAverage } from './signal-engine.js';

export function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Build the banner for the latest signal.
 *
 * @example
 * ```typescript
 * formatSignalBanner({ kind: 'level-count' }, 'BUY', 101.5, [{ window: 30, value: 99.25 }]);
 * // 'BUY Signal: Price ($101.50) is trending above 30-day MA ($99.25)'
 * ```
 */
export function formatSignalBanner(
  policy: SignalPolicy,
  signal: SignalKind,
  close: number,
  averages: readonly LatestAverage[]
): string {
  const defined = averages.flatMap((average) =>
    average.value === undefined ? [] : [{ window: average.window, value: average.value }]
  );

  const [first] = defined;
  if (!first || defined.length < averages.length) {
    const longest = Math.max(0, ...averages.map((average) => average.window));
    return `HOLD Signal: insufficient history for ${longest}-day MA`;
  }

  if (policy.kind === 'level-count') {
    const direction = signal === 'BUY' ? 'above' : 'below';
    return `${signal} Signal: Price (${formatPrice(close)}) is trending ${direction} ${first.window}-day MA (${formatPrice(first.value)})`;
  }

  const levels = defined
    .map((average) => `${average.window}-day MA (${formatPrice(average.value)})`)
    .join(', ');
  return `${signal} Signal: Price (${formatPrice(close)}), ${levels}`;
}
