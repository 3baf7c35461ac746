/**
 * @fileoverview Provider options and the HTTP seam used by the Yahoo provider.
 */

import type { Logger } from '@crossover/logger';

/**
 * Query parameters sent with a chart request.
 */
export type QueryParams = Record<string, string | number | boolean>;

/**
 * The slice of an axios instance the provider uses. Any object with this
 * shape can stand in for axios in tests.
 */
export interface HttpClient {
  get(url: string, config?: { params?: QueryParams; timeout?: number }): Promise<HttpResponse>;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * Options for {@link YahooProvider}.
 */
export interface YahooProviderOptions {
  /** Chart API base URL */
  baseUrl?: string;

  /** Per-request timeout in milliseconds */
  timeout?: number;

  /** Extra attempts after the first for network errors, HTTP 429 and 5xx */
  retries?: number;

  /** Backoff unit; attempt `n` waits `retryDelayMs * n` */
  retryDelayMs?: number;

  /** Replaces the axios instance the provider would otherwise create */
  httpClient?: HttpClient;

  /** Waits between retries; replaced in tests */
  sleep?: (ms: number) => Promise<void>;

  logger?: Logger;
}

/**
 * Options for {@link FixtureProvider}.
 */
export interface FixtureProviderOptions {
  /**
   * Directory holding `<TICKER>.json` files.
   * Defaults to the package's bundled `__fixtures__` directory.
   */
  fixturePath?: string;

  logger?: Logger;
}
