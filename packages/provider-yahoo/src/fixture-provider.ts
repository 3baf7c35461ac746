/**
 * @fileoverview Offline provider reading daily bars from JSON files.
 *
 * Each `<TICKER>.json` holds an array of raw bars in the same loose shape a
 * network provider produces, so fixtures go through the same normalizer.
 */

import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { MarketDataProvider, RawBar, SeriesResult } from '@crossover/contracts';
import { seriesUnavailable } from '@crossover/contracts';
import { normalizeSeries } from '@crossover/backtest';
import type { Logger } from '@crossover/logger';
import { filterToRange } from './range.js';
import type { FixtureProviderOptions } from './types.js';

// Fields stay loose; the normalizer decides what survives
const fixtureSchema = z.array(
  z.object({
    date: z.unknown(),
    open: z.unknown(),
    high: z.unknown(),
    low: z.unknown(),
    close: z.unknown(),
    volume: z.unknown(),
  })
);

/**
 * Bundled fixtures shipped with this package.
 */
export const DEFAULT_FIXTURE_PATH = join(dirname(fileURLToPath(import.meta.url)), '..', '__fixtures__');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Provider backed by JSON fixture files.
 *
 * @example
 * ```typescript
 * const provider = new FixtureProvider({ fixturePath: './__fixtures__' });
 * const result = await provider.fetchSeries('AAPL', '2024-01-01', '2024-03-31');
 * ```
 */
export class FixtureProvider implements MarketDataProvider {
  readonly id = 'fixture';

  private readonly fixturePath: string;
  private readonly logger?: Logger;

  constructor(options: FixtureProviderOptions = {}) {
    this.fixturePath = options.fixturePath ?? DEFAULT_FIXTURE_PATH;
    this.logger = options.logger?.child({ component: 'provider', provider: this.id });
  }

  async fetchSeries(ticker: string, start: string, end: string): Promise<SeriesResult> {
    const file = join(this.fixturePath, `${ticker.toUpperCase()}.json`);

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger?.warn('Fixture missing', { ticker, file });
        return seriesUnavailable(ticker, 'not-found', `No fixture for ${ticker}`);
      }
      throw error;
    }

    const rawBars = this.parse(content);
    if (!rawBars) {
      this.logger?.warn('Fixture malformed', { ticker, file });
      return seriesUnavailable(ticker, 'invalid-response', `Fixture for ${ticker} is not an array of bars`);
    }

    const result = normalizeSeries(ticker, filterToRange(rawBars, start, end));
    this.logger?.debug('Fixture loaded', {
      ticker,
      raw_count: rawBars.length,
      count: result.kind === 'ok' ? result.series.bars.length : 0,
    });
    return result;
  }

  private parse(content: string): RawBar[] | undefined {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      return undefined;
    }
    const parsed = fixtureSchema.safeParse(json);
    if (!parsed.success) {
      return undefined;
    }
    return parsed.data.map((item) => ({
      date: item.date,
      open: item.open,
      high: item.high,
      low: item.low,
      close: item.close,
      volume: item.volume,
    }));
  }
}
