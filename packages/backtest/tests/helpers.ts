import type { BacktestConfig, DailyBar, Series } from '@crossover/contracts';

/**
 * Consecutive calendar days from 2024-01-01; OHLC all equal to the close.
 */
export function buildSeries(closes: readonly number[], ticker: string = 'TEST'): Series {
  const bars: DailyBar[] = closes.map((close, i) => {
    const date = new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10);
    return { date, open: close, high: close, low: close, close, volume: 1000 + i };
  });
  return { ticker, bars };
}

export function crossoverConfig(overrides: Partial<BacktestConfig> = {}): BacktestConfig {
  return {
    policy: { kind: 'plain-crossover' },
    window: 4,
    shortWindow: 2,
    longWindow: 4,
    initialInvestment: 1000,
    accounting: 'mark-to-market',
    ...overrides,
  };
}

/**
 * Deterministic random walk (LCG) for property-style tests.
 */
export function randomWalk(length: number, seed: number): number[] {
  let state = seed;
  let price = 100;
  const closes: number[] = [];
  for (let i = 0; i < length; i++) {
    state = (state * 1664525 + 1013904223) % 4294967296;
    const step = (state / 4294967296 - 0.5) * 4;
    price = Math.max(1, price + step);
    closes.push(Number(price.toFixed(2)));
  }
  return closes;
}
