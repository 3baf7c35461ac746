/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { getConfigSummary, loadConfig, parseEnvValue } from '../src/config/index.js';
import { CommandError, CommandErrorCode } from '../src/commands/errors.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.app).toEqual({ env: 'development', verbose: false });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.provider).toEqual({ type: 'yahoo', timeout: 10000, retries: 2, retryDelayMs: 500 });
    expect(config.backtest).toEqual({
      tickers: 'AAPL',
      lookbackDays: 365,
      policy: 'plain-crossover',
      window: 30,
      shortWindow: 20,
      longWindow: 50,
      threshold: 0.001,
      initialInvestment: 10000,
      accounting: 'mark-to-market',
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      TICKERS: 'msft,nvda',
      SHORT_WINDOW: '10',
      SIGNAL_POLICY: 'threshold-gated-crossover',
      TOUCH_THRESHOLD: '0.02',
      PROVIDER_TYPE: 'fixture',
      FIXTURE_PATH: '/tmp/bars',
      VERBOSE: 'true',
      LOG_LEVEL: 'debug',
    });

    expect(config.backtest.tickers).toBe('msft,nvda');
    expect(config.backtest.shortWindow).toBe(10);
    expect(config.backtest.policy).toBe('threshold-gated-crossover');
    expect(config.backtest.threshold).toBe(0.02);
    expect(config.provider.type).toBe('fixture');
    expect(config.provider.fixturePath).toBe('/tmp/bars');
    expect(config.app.verbose).toBe(true);
    expect(config.logging.level).toBe('debug');
  });

  it('should keep a numeric-looking ticker as a string', () => {
    expect(loadConfig({ TICKERS: '123' }).backtest.tickers).toBe('123');
  });

  it('should ignore empty variables', () => {
    expect(loadConfig({ LOG_LEVEL: '' }).logging.level).toBe('info');
  });

  it('should reject invalid settings with CONFIG_ERROR', () => {
    let caught: unknown;
    try {
      loadConfig({ LOOKBACK_DAYS: '-3' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CommandError);
    if (caught instanceof CommandError) {
      expect(caught.code).toBe(CommandErrorCode.CONFIG_ERROR);
      expect(caught.exitCode).toBe(2);
      expect(caught.message).toBe(
        'Configuration validation failed:\nbacktest.lookbackDays: Number must be greater than 0'
      );
    }
  });

  it('should list every invalid setting', () => {
    expect(() => loadConfig({ SIGNAL_POLICY: 'bogus', PROVIDER_RETRIES: '-1' })).toThrow(
      /provider\.retries: .*\nbacktest\.policy: /
    );
  });
});

describe('parseEnvValue', () => {
  it('should convert booleans and numbers', () => {
    expect(parseEnvValue('true')).toBe(true);
    expect(parseEnvValue('false')).toBe(false);
    expect(parseEnvValue('42')).toBe(42);
    expect(parseEnvValue('0.5')).toBe(0.5);
  });

  it('should leave other strings alone', () => {
    expect(parseEnvValue('AAPL,MSFT')).toBe('AAPL,MSFT');
    expect(parseEnvValue(' ')).toBe(' ');
  });
});

describe('getConfigSummary', () => {
  it('should report the settings worth logging', () => {
    expect(getConfigSummary(loadConfig({ LOG_FILE: '/tmp/backtest.log' }))).toEqual({
      environment: 'development',
      verbose: false,
      provider: 'yahoo',
      policy: 'plain-crossover',
      logging: { level: 'info', format: 'pretty', file: true },
    });
  });
});
