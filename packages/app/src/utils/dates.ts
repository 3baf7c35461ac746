/**
 * Date range helpers for command arguments.
 */

import { normalizeDate } from '@crossover/backtest';
import { CommandError, CommandErrorCode } from '../commands/errors.js';

const DAY_MS = 86_400_000;

export interface DateRange {
  start: string;
  end: string;
}

/**
 * UTC calendar date of `date`.
 */
export function toCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Calendar date `days` days after `date` (negative moves back).
 */
export function shiftDays(date: string, days: number): string {
  return toCalendarDate(new Date(Date.parse(`${date}T00:00:00.000Z`) + days * DAY_MS));
}

function parseCalendarDate(value: string, field: 'start' | 'end'): string {
  if (normalizeDate(value) !== value) {
    throw new CommandError(
      CommandErrorCode.INVALID_ARGS,
      `Invalid ${field} date '${value}' (expected YYYY-MM-DD)`,
      { [field]: value }
    );
  }
  return value;
}

/**
 * Resolve the requested range. The end defaults to today (UTC) and the
 * start to `lookbackDays` before the end.
 *
 * @throws {CommandError} INVALID_ARGS for malformed dates or start after end
 */
export function resolveDateRange(
  input: { start?: string; end?: string },
  lookbackDays: number,
  now: Date = new Date()
): DateRange {
  const end = input.end !== undefined ? parseCalendarDate(input.end, 'end') : toCalendarDate(now);
  const start =
    input.start !== undefined ? parseCalendarDate(input.start, 'start') : shiftDays(end, -lookbackDays);

  if (start > end) {
    throw new CommandError(
      CommandErrorCode.INVALID_ARGS,
      `Start date ${start} is after end date ${end}`,
      { start, end }
    );
  }

  return { start, end };
}
