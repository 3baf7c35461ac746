/**
 * @fileoverview Parser for Yahoo Finance chart responses.
 *
 * Validates the payload shape with zod and flattens the column-oriented
 * `timestamp` + `indicators.quote[0]` arrays into raw bars. Values are passed
 * through untouched; cleaning is the Series Normalizer's job.
 */

import { z } from 'zod';
import type { RawBar, UnavailableReason } from '@crossover/contracts';

const column = z.array(z.number().nullable()).optional();

const quoteSchema = z.object({
  open: column,
  high: column,
  low: column,
  close: column,
  volume: column,
});

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              quote: z.array(quoteSchema).optional(),
            })
            .optional(),
        })
      )
      .nullable()
      .optional(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().optional(),
      })
      .nullable()
      .optional(),
  }),
});

export type YahooChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * Outcome of parsing a chart payload.
 */
export type ChartParseResult =
  | { kind: 'ok'; bars: RawBar[] }
  | { kind: 'error'; reason: Extract<UnavailableReason, 'not-found' | 'invalid-response'>; message: string };

/**
 * Calendar date (UTC) of a chart timestamp in epoch seconds.
 */
export function timestampToDate(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}

/**
 * Parse a chart API payload into raw bars.
 *
 * A result without timestamps (no trading days in range) parses to no bars.
 *
 * @example
 * ```typescript
 * parseChartResponse({
 *   chart: {
 *     result: [{
 *       timestamp: [1704205800],
 *       indicators: { quote: [{ open: [187.15], high: [188.44], low: [183.89], close: [185.64], volume: [82488700] }] }
 *     }],
 *     error: null
 *   }
 * });
 * // { kind: 'ok', bars: [{ date: '2024-01-02', open: 187.15, ... }] }
 * ```
 */
export function parseChartResponse(payload: unknown): ChartParseResult {
  const parsed = chartResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    return { kind: 'error', reason: 'invalid-response', message: `Malformed chart response (${where})` };
  }

  const { chart } = parsed.data;
  if (chart.error) {
    return {
      kind: 'error',
      reason: 'not-found',
      message: chart.error.description ?? chart.error.code ?? 'Symbol not found',
    };
  }

  const result = chart.result?.[0];
  if (!result) {
    return { kind: 'error', reason: 'invalid-response', message: 'Chart response has no result' };
  }

  const timestamps = result.timestamp ?? [];
  const quote = result.indicators?.quote?.[0];
  if (timestamps.length > 0 && !quote) {
    return { kind: 'error', reason: 'invalid-response', message: 'Chart response is missing quote data' };
  }

  const bars: RawBar[] = timestamps.map((seconds, i) => ({
    date: timestampToDate(seconds),
    open: quote?.open?.[i],
    high: quote?.high?.[i],
    low: quote?.low?.[i],
    close: quote?.close?.[i],
    volume: quote?.volume?.[i],
  }));

  return { kind: 'ok', bars };
}
