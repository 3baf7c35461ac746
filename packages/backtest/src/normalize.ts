/**
 * Series normalizer.
 *
 * Turns whatever a provider returned into a validated, date-ordered,
 * duplicate-free daily series. Bars whose prices or date cannot be parsed
 * are dropped; an unparsable volume becomes zero.
 */

import type { DailyBar, RawBar, SeriesResult } from '@crossover/contracts';
import { seriesOk, seriesUnavailable } from '@crossover/contracts';

/** Calendar date, optionally followed by a time */
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

const EXPLICIT_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Result of normalizing raw bars.
 */
export interface NormalizeResult {
  bars: DailyBar[];
  /** Raw bars rejected for unparsable prices or dates */
  dropped: number;
  /** Bars discarded because an earlier bar had the same date */
  duplicates: number;
}

/**
 * Coerce a numeric field. Accepts finite numbers and numeric strings.
 *
 * @returns The number, or undefined when the value cannot be parsed
 */
export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  return undefined;
}

/**
 * Coerce a volume to a non-negative integer; anything unparsable is 0.
 */
export function coerceVolume(value: unknown): number {
  const parsed = coerceNumber(value);
  if (parsed === undefined || parsed < 0) {
    return 0;
  }
  return Math.trunc(parsed);
}

/**
 * Normalize a date-like value to a UTC calendar date (YYYY-MM-DD).
 *
 * Strings must start with `YYYY-MM-DD`. A time without an offset keeps that
 * calendar date whatever the host timezone; a timestamp with an offset is
 * converted to its UTC date.
 *
 * @returns The calendar date, or undefined when the value is not a date
 */
export function normalizeDate(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const match = DATE_PREFIX.exec(trimmed);
    if (!match) {
      return undefined;
    }

    const [, year, month, day] = match;
    const calendarDate = `${year}-${month}-${day}`;
    const utc = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    // Rejects rollovers such as 2024-02-30
    if (utc.toISOString().slice(0, 10) !== calendarDate) {
      return undefined;
    }

    // Only a timestamp with an explicit offset can fall on another UTC day
    return trimmed.length > calendarDate.length && EXPLICIT_OFFSET.test(trimmed)
      ? toCalendarDate(new Date(trimmed))
      : calendarDate;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? toCalendarDate(new Date(value)) : undefined;
  }

  if (value instanceof Date) {
    return toCalendarDate(value);
  }

  return undefined;
}

function toCalendarDate(date: Date): string | undefined {
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString().slice(0, 10);
}

/**
 * Parse one raw bar. Prices must be finite and positive.
 *
 * @returns The bar, or undefined when it has to be dropped
 */
export function normalizeBar(raw: RawBar): DailyBar | undefined {
  const date = normalizeDate(raw.date);
  const open = coerceNumber(raw.open);
  const high = coerceNumber(raw.high);
  const low = coerceNumber(raw.low);
  const close = coerceNumber(raw.close);

  if (
    date === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined
  ) {
    return undefined;
  }

  if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
    return undefined;
  }

  return { date, open, high, low, close, volume: coerceVolume(raw.volume) };
}

/**
 * Normalize raw bars: parse, drop invalid rows, sort by date, drop duplicate
 * dates (the first occurrence in provider order wins).
 *
 * @example
 * ```typescript
 * const { bars, dropped } = normalizeBars([
 *   { date: '2024-01-03', open: '10', high: 11, low: 9, close: 10.5, volume: 'n/a' },
 *   { date: '2024-01-02', open: null, high: 11, low: 9, close: 10, volume: 5 }
 * ]);
 * // bars: [{ date: '2024-01-03', open: 10, ..., volume: 0 }], dropped: 1
 * ```
 */
export function normalizeBars(rawBars: readonly RawBar[]): NormalizeResult {
  const parsed: DailyBar[] = [];
  let dropped = 0;

  for (const raw of rawBars) {
    const bar = normalizeBar(raw);
    if (bar) {
      parsed.push(bar);
    } else {
      dropped++;
    }
  }

  // Array.prototype.sort is stable, so equal dates keep provider order
  parsed.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  const bars: DailyBar[] = [];
  let duplicates = 0;
  for (const bar of parsed) {
    const previous = bars[bars.length - 1];
    if (previous && previous.date === bar.date) {
      duplicates++;
      continue;
    }
    bars.push(bar);
  }

  return { bars, dropped, duplicates };
}

/**
 * Normalize a provider's raw bars into a series result for `ticker`.
 *
 * An empty result after cleaning marks the ticker unavailable.
 */
export function normalizeSeries(ticker: string, rawBars: readonly RawBar[]): SeriesResult {
  const { bars } = normalizeBars(rawBars);

  if (bars.length === 0) {
    return seriesUnavailable(ticker, 'empty', 'No data available for the selected date range');
  }

  return seriesOk({ ticker, bars });
}
