import type { DailyBar, MarketDataProvider, Series, SeriesResult } from '@crossover/contracts';
import { seriesOk, seriesUnavailable } from '@crossover/contracts';
import { createLogger, type Logger } from '@crossover/logger';

export interface RecordedRequest {
  ticker: string;
  start: string;
  end: string;
}

/**
 * Provider serving canned series; unknown tickers are not found.
 */
export class InMemoryProvider implements MarketDataProvider {
  readonly id = 'in-memory';
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly series: readonly Series[] = []) {}

  async fetchSeries(ticker: string, start: string, end: string): Promise<SeriesResult> {
    this.requests.push({ ticker, start, end });
    const found = this.series.find((candidate) => candidate.ticker === ticker);
    return found ? seriesOk(found) : seriesUnavailable(ticker, 'not-found', `Ticker ${ticker} not found`);
  }
}

/**
 * Bars on consecutive days from 2024-01-01 at a constant close of 10.
 */
export function flatBars(count: number): DailyBar[] {
  return Array.from({ length: count }, (_, i) => ({
    date: new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10),
    open: 10,
    high: 10,
    low: 10,
    close: 10,
    volume: 500,
  }));
}

export function flatSeries(ticker: string, count = 30): Series {
  return { ticker, bars: flatBars(count) };
}

export function silentLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}
