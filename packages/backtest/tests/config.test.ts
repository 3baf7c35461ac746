import { describe, it, expect } from 'vitest';
import { DEFAULT_BACKTEST_CONFIG, resolveBacktestConfig } from '../src/config.js';

describe('resolveBacktestConfig', () => {
  it('should fall back to defaults without warnings', () => {
    expect(resolveBacktestConfig()).toEqual({ config: DEFAULT_BACKTEST_CONFIG, warnings: [] });
  });

  it('should clamp windows into their operational ranges', () => {
    const { config, warnings } = resolveBacktestConfig({ shortWindow: 2, longWindow: 400 });

    expect(config.shortWindow).toBe(5);
    expect(config.longWindow).toBe(200);
    expect(warnings).toEqual([
      'shortWindow 2 adjusted to 5 (allowed 5-100)',
      'longWindow 400 adjusted to 200 (allowed 20-200)',
    ]);
  });

  it('should round fractional windows', () => {
    const { config, warnings } = resolveBacktestConfig({ window: 12.6 });

    expect(config.window).toBe(13);
    expect(warnings).toEqual(['window 12.6 adjusted to 13 (allowed 5-200)']);
  });

  it('should replace values that are not numbers', () => {
    const { config, warnings } = resolveBacktestConfig({ window: Number.NaN });

    expect(config.window).toBe(30);
    expect(warnings).toEqual(['window NaN is not a number; using 30']);
  });

  it('should clamp the initial investment', () => {
    const { config, warnings } = resolveBacktestConfig({ initialInvestment: 50 });

    expect(config.initialInvestment).toBe(100);
    expect(warnings).toEqual(['initialInvestment 50 adjusted to 100 (allowed 100-1000000)']);
  });

  it('should warn when the short window is not below the long window', () => {
    const { config, warnings } = resolveBacktestConfig({ shortWindow: 60, longWindow: 40 });

    expect(config.shortWindow).toBe(60);
    expect(config.longWindow).toBe(40);
    expect(warnings).toEqual(['shortWindow 60 is not below longWindow 40; crossovers are unlikely']);
  });

  it('should not warn about crossover windows for the level-count policy', () => {
    const { config, warnings } = resolveBacktestConfig({
      policy: 'level-count',
      shortWindow: 60,
      longWindow: 40,
    });

    expect(config.policy).toEqual({ kind: 'level-count' });
    expect(warnings).toEqual([]);
  });

  it('should default the threshold for the gated policy', () => {
    const { config } = resolveBacktestConfig({ policy: 'threshold-gated-crossover' });

    expect(config.policy).toEqual({ kind: 'threshold-gated-crossover', threshold: 0.001 });
  });

  it('should clamp the threshold', () => {
    const { config, warnings } = resolveBacktestConfig({
      policy: 'threshold-gated-crossover',
      threshold: 5,
    });

    expect(config.policy).toEqual({ kind: 'threshold-gated-crossover', threshold: 1 });
    expect(warnings).toEqual(['threshold 5 adjusted to 1 (allowed 0-1)']);
  });

  it('should carry the accounting mode', () => {
    expect(resolveBacktestConfig({ accounting: 'realized' }).config.accounting).toBe('realized');
  });
});
