/**
 * @fileoverview High-resolution timers for `duration_ms` log fields.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start (frozen once stopped) */
  elapsed(): number;

  /** Stop and return the final duration; repeated calls return the same value */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Start a timer based on `performance.now()`.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = await provider.fetchSeries('AAPL', start, end);
 * logger.info('Series fetched', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Await `fn` and report how long it took. Rejections propagate unchanged.
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
