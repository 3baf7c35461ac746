/**
 * @fileoverview Date range helpers shared by the providers.
 */

import type { RawBar } from '@crossover/contracts';
import { normalizeDate } from '@crossover/backtest';

const SECONDS_PER_DAY = 86_400;

/**
 * Seconds since the epoch at UTC midnight of a `YYYY-MM-DD` date.
 *
 * @throws {RangeError} If the date cannot be parsed
 */
export function toEpochSeconds(date: string): number {
  const calendarDate = normalizeDate(date);
  if (calendarDate === undefined) {
    throw new RangeError(`Invalid date: ${date}`);
  }
  return Date.parse(`${calendarDate}T00:00:00.000Z`) / 1000;
}

/**
 * `period1`/`period2` for a chart request covering `[start, end]` inclusive.
 */
export function toPeriod(start: string, end: string): { period1: number; period2: number } {
  return {
    period1: toEpochSeconds(start),
    period2: toEpochSeconds(end) + SECONDS_PER_DAY,
  };
}

/**
 * Keep raw bars whose date falls inside `[start, end]`. Bars without a usable
 * date are kept so the normalizer can count them as dropped.
 */
export function filterToRange(rawBars: readonly RawBar[], start: string, end: string): RawBar[] {
  return rawBars.filter((bar) => {
    const date = normalizeDate(bar.date);
    return date === undefined || (date >= start && date <= end);
  });
}
