/**
 * Guarded arithmetic for ratios and percentages.
 *
 * Every helper returns `null` where plain division would produce
 * `Infinity` or `NaN`, so nothing non-finite reaches a report.
 */

/**
 * Divide `numerator` by `denominator`, or `null` when the quotient is not finite.
 *
 * @example
 * ```typescript
 * safeDivide(1, 4); // 0.25
 * safeDivide(1, 0); // null
 * ```
 */
export function safeDivide(numerator: number, denominator: number): number | null {
  if (denominator === 0 || !Number.isFinite(numerator) || !Number.isFinite(denominator)) {
    return null;
  }

  const quotient = numerator / denominator;
  return Number.isFinite(quotient) ? quotient : null;
}

/**
 * Percentage change from `from` to `to`, or `null` when `from` is zero.
 */
export function percentChange(from: number, to: number): number | null {
  const ratio = safeDivide(to - from, from);
  return ratio === null ? null : ratio * 100;
}

/**
 * Clamp `value` into `[min, max]`.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
