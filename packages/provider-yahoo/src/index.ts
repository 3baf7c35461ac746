/**
 * @fileoverview Public API for @crossover/provider-yahoo.
 *
 * @module @crossover/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@crossover/provider-yahoo';
 *
 * const provider = new YahooProvider({ timeout: 10_000, retries: 2 });
 * const result = await provider.fetchSeries('MSFT', '2024-01-01', '2024-12-31');
 * ```
 */

export { YahooProvider, YAHOO_CHART_URL } from './yahoo-provider.js';
export { FixtureProvider, DEFAULT_FIXTURE_PATH } from './fixture-provider.js';
export { parseChartResponse, timestampToDate } from './parser.js';
export { toEpochSeconds, toPeriod, filterToRange } from './range.js';

export type { ChartParseResult, YahooChartResponse } from './parser.js';
export type {
  HttpClient,
  HttpResponse,
  QueryParams,
  YahooProviderOptions,
  FixtureProviderOptions,
} from './types.js';
