import type { HttpClient, HttpResponse, QueryParams } from '../src/types.js';

type Step = HttpResponse | Error;

/**
 * Scripted stand-in for axios: replays one step per request and records
 * every call. The last step repeats once the script runs out.
 */
export class FakeHttpClient implements HttpClient {
  readonly calls: Array<{ url: string; params?: QueryParams; timeout?: number }> = [];

  constructor(private readonly steps: Step[]) {}

  async get(url: string, config?: { params?: QueryParams; timeout?: number }): Promise<HttpResponse> {
    this.calls.push({ url, ...config });
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (!step) {
      throw new Error('FakeHttpClient has no scripted response');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

/** [epochSeconds, open, high, low, close, volume] */
export type ChartRow = [number, number | null, number | null, number | null, number | null, number | null];

export function chartPayload(rows: ChartRow[]): unknown {
  return {
    chart: {
      result: [
        {
          meta: { symbol: 'TEST', currency: 'USD' },
          timestamp: rows.map((row) => row[0]),
          indicators: {
            quote: [
              {
                open: rows.map((row) => row[1]),
                high: rows.map((row) => row[2]),
                low: rows.map((row) => row[3]),
                close: rows.map((row) => row[4]),
                volume: rows.map((row) => row[5]),
              },
            ],
          },
        },
      ],
      error: null,
    },
  };
}

/** 14:30 UTC (US market open) on the given calendar date, in epoch seconds */
export function marketOpen(date: string): number {
  return Date.parse(`${date}T14:30:00.000Z`) / 1000;
}
