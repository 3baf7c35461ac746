/**
 * @fileoverview Yahoo Finance daily bar provider.
 *
 * Fetches the chart API over axios, retries transient failures with linear
 * backoff and hands the raw bars to the Series Normalizer. Ticker-level
 * failures resolve as `unavailable`; the provider never rejects for them.
 *
 * @module @crossover/provider-yahoo
 */

import axios from 'axios';
import { setTimeout as delay } from 'node:timers/promises';
import type { MarketDataProvider, SeriesResult } from '@crossover/contracts';
import { ProviderUnavailableError, isProviderUnavailableError, seriesUnavailable } from '@crossover/contracts';
import { normalizeSeries } from '@crossover/backtest';
import { startTimer, type Logger } from '@crossover/logger';
import { parseChartResponse } from './parser.js';
import { filterToRange, toPeriod } from './range.js';
import type { HttpClient, HttpResponse, YahooProviderOptions } from './types.js';

export const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 500;

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Yahoo Finance provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ retries: 2, logger });
 * const result = await provider.fetchSeries('AAPL', '2024-01-01', '2024-06-30');
 * if (result.kind === 'ok') {
 *   console.log(result.series.bars.length);
 * }
 * ```
 */
export class YahooProvider implements MarketDataProvider {
  readonly id = 'yahoo';

  private readonly http: HttpClient;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(options: YahooProviderOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.retries = Math.max(0, Math.trunc(options.retries ?? DEFAULT_RETRIES));
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger?.child({ component: 'provider', provider: this.id });
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_CHART_URL,
        timeout: this.timeout,
        headers: { 'User-Agent': 'Mozilla/5.0 (crossover-desk)' },
        // Statuses are classified below instead of thrown
        validateStatus: () => true,
      });
  }

  /**
   * @throws {RangeError} If `start` or `end` is not a calendar date
   */
  async fetchSeries(ticker: string, start: string, end: string): Promise<SeriesResult> {
    const timer = startTimer();

    try {
      const response = await this.requestWithRetry(ticker, start, end);
      const parsed = parseChartResponse(response.data);

      if (parsed.kind === 'error') {
        throw new ProviderUnavailableError(parsed.message, {
          ticker,
          reason: parsed.reason,
          provider: this.id,
          status: response.status,
        });
      }

      const result = normalizeSeries(ticker, filterToRange(parsed.bars, start, end));
      this.logger?.info('Series fetched', {
        ticker,
        count: result.kind === 'ok' ? result.series.bars.length : 0,
        raw_count: parsed.bars.length,
        duration_ms: timer.stop(),
        result: result.kind === 'ok' ? 'success' : 'empty',
      });
      return result;
    } catch (error) {
      if (!isProviderUnavailableError(error)) {
        throw error;
      }

      this.logger?.warn('Series unavailable', {
        ticker,
        reason: error.reason,
        error: error.message,
        duration_ms: timer.stop(),
        result: 'unavailable',
      });
      return seriesUnavailable(ticker, error.reason, error.message);
    }
  }

  /**
   * GET the chart for `ticker`, retrying network errors, HTTP 429 and 5xx.
   *
   * @throws {ProviderUnavailableError} When the ticker is unknown or every attempt failed
   */
  private async requestWithRetry(ticker: string, start: string, end: string): Promise<HttpResponse> {
    const params = { ...toPeriod(start, end), interval: '1d', events: 'div,splits', includePrePost: false };
    const url = `/${encodeURIComponent(ticker)}`;
    let lastFailure = '';
    let lastStatus: number | undefined;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) {
        const wait = this.retryDelayMs * attempt;
        this.logger?.warn('Retrying chart request', { ticker, attempt, wait_ms: wait, error: lastFailure });
        await this.sleep(wait);
      }

      let response: HttpResponse;
      try {
        this.logger?.debug('Requesting chart', { ticker, attempt, ...params });
        response = await this.http.get(url, { params, timeout: this.timeout });
      } catch (error) {
        lastFailure = describeError(error);
        lastStatus = undefined;
        continue;
      }

      if (response.status === 404) {
        const parsed = parseChartResponse(response.data);
        const detail = parsed.kind === 'error' && parsed.reason === 'not-found' ? `: ${parsed.message}` : '';
        throw new ProviderUnavailableError(`Ticker ${ticker} not found${detail}`, {
          ticker,
          reason: 'not-found',
          provider: this.id,
          status: 404,
        });
      }

      if (isRetryableStatus(response.status)) {
        lastFailure = `HTTP ${response.status}`;
        lastStatus = response.status;
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        const parsed = parseChartResponse(response.data);
        throw new ProviderUnavailableError(
          parsed.kind === 'error' ? parsed.message : `Unexpected HTTP ${response.status}`,
          {
            ticker,
            reason: parsed.kind === 'error' ? parsed.reason : 'invalid-response',
            provider: this.id,
            status: response.status,
          }
        );
      }

      return response;
    }

    const attempts = this.retries + 1;
    throw new ProviderUnavailableError(
      `Failed to fetch ${ticker} after ${attempts} attempt${attempts === 1 ? '' : 's'} (${lastFailure})`,
      {
        ticker,
        reason: 'network',
        provider: this.id,
        ...(lastStatus !== undefined ? { status: lastStatus } : {}),
      }
    );
  }
}
