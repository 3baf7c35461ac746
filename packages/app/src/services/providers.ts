/**
 * Market data provider selection
 */

import type { MarketDataProvider } from '@crossover/contracts';
import type { Logger } from '@crossover/logger';
import { FixtureProvider, YahooProvider } from '@crossover/provider-yahoo';
import type { Config } from '../config/index.js';

export type ProviderConfig = Config['provider'];

/**
 * Build the provider named by `config.type`.
 */
export function createProvider(config: ProviderConfig, logger?: Logger): MarketDataProvider {
  switch (config.type) {
    case 'fixture':
      return new FixtureProvider({
        ...(config.fixturePath !== undefined ? { fixturePath: config.fixturePath } : {}),
        ...(logger ? { logger } : {}),
      });
    case 'yahoo':
      return new YahooProvider({
        ...(config.baseUrl !== undefined ? { baseUrl: config.baseUrl } : {}),
        timeout: config.timeout,
        retries: config.retries,
        retryDelayMs: config.retryDelayMs,
        ...(logger ? { logger } : {}),
      });
  }
}
