/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const SIGNAL_POLICIES = ['level-count', 'plain-crossover', 'threshold-gated-crossover'] as const;
export const ACCOUNTING_MODES = ['mark-to-market', 'realized'] as const;
export const PROVIDER_TYPES = ['yahoo', 'fixture'] as const;

/**
 * Application configuration schema.
 *
 * Types only: numeric ranges are clamped later by `resolveBacktestConfig`,
 * so an out-of-range window never aborts a run.
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      verbose: z.boolean().default(false),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(PROVIDER_TYPES).default('yahoo'),
      baseUrl: z.string().url().optional(),
      timeout: z.number().int().positive().default(10000),
      retries: z.number().int().min(0).default(2),
      retryDelayMs: z.number().int().min(0).default(500),
      fixturePath: z.string().optional(),
    })
    .default({}),

  backtest: z
    .object({
      // A lone numeric ticker would arrive as a number
      tickers: z.coerce.string().default('AAPL'),
      lookbackDays: z.number().int().positive().default(365),
      policy: z.enum(SIGNAL_POLICIES).default('plain-crossover'),
      window: z.number().default(30),
      shortWindow: z.number().default(20),
      longWindow: z.number().default(50),
      threshold: z.number().default(0.001),
      initialInvestment: z.number().default(10000),
      accounting: z.enum(ACCOUNTING_MODES).default('mark-to-market'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  VERBOSE: 'app.verbose',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  PROVIDER_TYPE: 'provider.type',
  PROVIDER_BASE_URL: 'provider.baseUrl',
  PROVIDER_TIMEOUT: 'provider.timeout',
  PROVIDER_RETRIES: 'provider.retries',
  PROVIDER_RETRY_DELAY_MS: 'provider.retryDelayMs',
  FIXTURE_PATH: 'provider.fixturePath',
  TICKERS: 'backtest.tickers',
  LOOKBACK_DAYS: 'backtest.lookbackDays',
  SIGNAL_POLICY: 'backtest.policy',
  MA_WINDOW: 'backtest.window',
  SHORT_WINDOW: 'backtest.shortWindow',
  LONG_WINDOW: 'backtest.longWindow',
  TOUCH_THRESHOLD: 'backtest.threshold',
  INITIAL_INVESTMENT: 'backtest.initialInvestment',
  ACCOUNTING: 'backtest.accounting',
};
