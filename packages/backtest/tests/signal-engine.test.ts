import { describe, it, expect } from 'vitest';
import { InvalidWindowConfigurationError } from '@crossover/contracts';
import { isNearAverage, runSignalEngine } from '../src/signal-engine.js';
import { buildSeries, crossoverConfig, randomWalk } from './helpers.js';

const STEP_UP = [10, 10, 10, 10, 12, 12, 12, 12, 12, 12];

describe('runSignalEngine', () => {
  describe('plain-crossover', () => {
    it('should buy on the first bar where the short average rises above the long one', () => {
      const result = runSignalEngine(buildSeries(STEP_UP), crossoverConfig());

      expect(result.events).toEqual([
        {
          date: '2024-01-05',
          index: 4,
          kind: 'BUY',
          price: 12,
          positionAfter: 'LONG',
          portfolioValue: 1000,
          shortMa: 11,
          longMa: 10.5,
        },
        {
          date: '2024-01-10',
          index: 9,
          kind: 'HOLD',
          price: 12,
          positionAfter: 'LONG',
          portfolioValue: 1000,
          shortMa: 12,
          longMa: 12,
        },
      ]);
      expect(result.finalPosition).toBe('LONG');
      expect(result.finalValue).toBe(1000);
      expect(result.insufficientHistory).toBe(false);
    });

    it('should label equal averages on the last bar HOLD', () => {
      const result = runSignalEngine(buildSeries(STEP_UP), crossoverConfig());

      expect(result.latestSignal).toBe('HOLD');
      expect(result.latestClose).toBe(12);
      expect(result.latestAverages).toEqual([
        { window: 2, value: 12 },
        { window: 4, value: 12 },
      ]);
    });

    it('should sell when the short average drops below the long one', () => {
      const result = runSignalEngine(
        buildSeries([10, 10, 10, 10, 12, 12, 12, 8, 8, 8]),
        crossoverConfig()
      );

      expect(result.events.map((event) => [event.kind, event.index, event.price])).toEqual([
        ['BUY', 4, 12],
        ['SELL', 7, 8],
      ]);
      expect(result.events[1]?.positionAfter).toBe('FLAT');
      expect(result.events[1]?.portfolioValue).toBeCloseTo(2000 / 3, 9);
      expect(result.finalPosition).toBe('FLAT');
      expect(result.finalValue).toBeCloseTo(2000 / 3, 9);
      expect(result.latestSignal).toBe('SELL');
    });

    it('should compound the open position bar by bar under mark-to-market', () => {
      const result = runSignalEngine(buildSeries([10, 10, 10, 10, 12, 13, 14, 15]), crossoverConfig());

      expect(result.events.map((event) => event.kind)).toEqual(['BUY', 'HOLD']);
      expect(result.events[1]?.portfolioValue).toBeCloseTo(1250, 9);
      expect(result.finalValue).toBeCloseTo(1250, 9);
    });

    it('should leave the open position out of the final value under realized accounting', () => {
      const result = runSignalEngine(
        buildSeries([10, 10, 10, 10, 12, 13, 14, 15]),
        crossoverConfig({ accounting: 'realized' })
      );

      expect(result.events.map((event) => event.kind)).toEqual(['BUY', 'HOLD']);
      expect(result.events[0]?.portfolioValue).toBe(1000);
      expect(result.events[1]?.portfolioValue).toBe(1250);
      expect(result.finalValue).toBe(1000);
    });

    it('should realize the round trip on SELL under realized accounting', () => {
      const result = runSignalEngine(
        buildSeries([10, 10, 10, 10, 12, 12, 12, 8, 8, 8]),
        crossoverConfig({ accounting: 'realized' })
      );

      expect(result.finalValue).toBeCloseTo(2000 / 3, 9);
    });

    it('should emit no events and keep the initial investment when history is too short', () => {
      const result = runSignalEngine(buildSeries([10, 11, 12]), crossoverConfig());

      expect(result.events).toEqual([]);
      expect(result.finalValue).toBe(1000);
      expect(result.finalPosition).toBe('FLAT');
      expect(result.latestSignal).toBe('HOLD');
      expect(result.insufficientHistory).toBe(true);
      expect(result.latestAverages).toEqual([
        { window: 2, value: 11.5 },
        { window: 4, value: undefined },
      ]);
    });

    it('should not trade on a flat series', () => {
      const result = runSignalEngine(buildSeries(Array.from({ length: 12 }, () => 50)), crossoverConfig());

      expect(result.events).toEqual([]);
      expect(result.finalValue).toBe(1000);
    });

    it('should alternate BUY and SELL starting with BUY', () => {
      const closes = randomWalk(400, 7);
      const result = runSignalEngine(buildSeries(closes), crossoverConfig({ shortWindow: 5, longWindow: 20 }));
      const trades = result.events.filter((event) => event.kind !== 'HOLD');

      expect(trades.length).toBeGreaterThan(1);
      trades.forEach((event, i) => {
        expect(event.kind).toBe(i % 2 === 0 ? 'BUY' : 'SELL');
        expect(event.index).toBeGreaterThan(0);
      });
    });

    it('should record the averages that triggered each trade', () => {
      const closes = randomWalk(300, 42);
      const result = runSignalEngine(buildSeries(closes), crossoverConfig({ shortWindow: 5, longWindow: 20 }));

      for (const event of result.events) {
        if (event.shortMa === undefined || event.longMa === undefined) {
          throw new Error(`event at ${event.index} is missing its averages`);
        }
        if (event.kind === 'BUY') expect(event.shortMa).toBeGreaterThan(event.longMa);
        if (event.kind === 'SELL') expect(event.shortMa).toBeLessThan(event.longMa);
      }
    });

    it('should return identical results for identical input', () => {
      const series = buildSeries(randomWalk(120, 3));
      const config = crossoverConfig({ shortWindow: 5, longWindow: 20 });

      expect(runSignalEngine(series, config)).toEqual(runSignalEngine(series, config));
    });

    it('should never buy when the short window is not below the long one on a rising series', () => {
      const rising = Array.from({ length: 30 }, (_, i) => 10 + i);
      const result = runSignalEngine(buildSeries(rising), crossoverConfig({ shortWindow: 6, longWindow: 3 }));

      expect(result.events).toEqual([]);
      expect(result.latestSignal).toBe('SELL');
    });

    it('should reject a window that is not a positive integer', () => {
      expect(() => runSignalEngine(buildSeries(STEP_UP), crossoverConfig({ shortWindow: 0 }))).toThrow(
        InvalidWindowConfigurationError
      );
    });
  });

  describe('threshold-gated-crossover', () => {
    const NEAR = [10, 10, 10, 10, 10.2, 10.2];

    it('should trade like the plain policy when the close is near an average', () => {
      const result = runSignalEngine(
        buildSeries(NEAR),
        crossoverConfig({ policy: { kind: 'threshold-gated-crossover', threshold: 0.01 } })
      );

      expect(result.events.map((event) => [event.kind, event.index])).toEqual([
        ['BUY', 4],
        ['HOLD', 5],
      ]);
    });

    it('should suppress a crossover when the close is far from both averages', () => {
      const result = runSignalEngine(
        buildSeries(NEAR),
        crossoverConfig({ policy: { kind: 'threshold-gated-crossover', threshold: 0.005 } })
      );

      expect(result.events).toEqual([]);
      expect(result.finalValue).toBe(1000);
    });

    it('should keep the position open while a downward cross is far from both averages', () => {
      const gated = crossoverConfig({ policy: { kind: 'threshold-gated-crossover', threshold: 0.05 } });
      const plain = runSignalEngine(buildSeries([10, 10, 10, 10, 10.2, 8, 8]), crossoverConfig());
      const result = runSignalEngine(buildSeries([10, 10, 10, 10, 10.2, 8, 8]), gated);

      expect(plain.events.map((event) => [event.kind, event.index])).toEqual([
        ['BUY', 4],
        ['SELL', 5],
      ]);
      expect(result.events.map((event) => [event.kind, event.index])).toEqual([
        ['BUY', 4],
        ['SELL', 6],
      ]);
      expect(result.events[1]).toMatchObject({ price: 8, positionAfter: 'FLAT', shortMa: 8 });
      expect(result.events[1]?.longMa).toBeCloseTo(9.05, 9);
      expect(result.events[1]?.portfolioValue).toBeCloseTo(8000 / 10.2, 9);
      expect(result.finalPosition).toBe('FLAT');
    });

    it('should stay long to the end when no downward cross comes near an average', () => {
      const result = runSignalEngine(
        buildSeries([10, 10, 10, 10, 10.2, 8, 6]),
        crossoverConfig({ policy: { kind: 'threshold-gated-crossover', threshold: 0.05 } })
      );

      expect(result.events.map((event) => [event.kind, event.index])).toEqual([
        ['BUY', 4],
        ['HOLD', 6],
      ]);
      expect(result.finalPosition).toBe('LONG');
      expect(result.finalValue).toBeCloseTo(6000 / 10.2, 9);
    });

    it('should not buy later once the crossing bar was suppressed', () => {
      const result = runSignalEngine(
        buildSeries(STEP_UP),
        crossoverConfig({ policy: { kind: 'threshold-gated-crossover', threshold: 0.001 } })
      );

      expect(result.events).toEqual([]);
      expect(result.finalPosition).toBe('FLAT');
    });
  });

  describe('level-count', () => {
    const config = crossoverConfig({ policy: { kind: 'level-count' }, window: 4 });

    it('should buy when fewer than half of the trailing closes sit below their average', () => {
      const result = runSignalEngine(buildSeries([10, 11, 12, 13, 14, 15, 16, 17]), config);

      expect(result.latestSignal).toBe('BUY');
      expect(result.finalPosition).toBe('LONG');
      expect(result.events).toHaveLength(1);
      expect(result.events[0]).toMatchObject({ kind: 'BUY', index: 7, price: 17, longMa: 15.5 });
      expect(result.finalValue).toBeCloseTo((1000 * 17) / 15.5, 9);
    });

    it('should sell when most trailing closes sit below their average', () => {
      const result = runSignalEngine(buildSeries([17, 16, 15, 14, 13, 12, 11, 10]), config);

      expect(result.latestSignal).toBe('SELL');
      expect(result.finalPosition).toBe('FLAT');
      expect(result.finalValue).toBeCloseTo((1000 * 13) / 11.5, 9);
    });

    it('should sell when exactly half of the trailing closes sit below their average', () => {
      const result = runSignalEngine(buildSeries([10, 10, 10, 10, 12, 8, 12, 8]), config);

      expect(result.latestSignal).toBe('SELL');
      expect(result.finalValue).toBeCloseTo(1200, 9);
    });

    it('should hold with the initial investment when the average is undefined', () => {
      const result = runSignalEngine(buildSeries([10, 11, 12]), config);

      expect(result.events).toEqual([]);
      expect(result.latestSignal).toBe('HOLD');
      expect(result.finalValue).toBe(1000);
      expect(result.insufficientHistory).toBe(true);
      expect(result.latestAverages).toEqual([{ window: 4, value: undefined }]);
    });
  });
});

describe('isNearAverage', () => {
  it('should compare relative distance to either average', () => {
    expect(isNearAverage(100, 100.05, 120, 0.001)).toBe(true);
    expect(isNearAverage(100, 120, 99.95, 0.001)).toBe(true);
    expect(isNearAverage(100, 101, 99, 0.001)).toBe(false);
  });

  it('should treat a zero close as never near', () => {
    expect(isNearAverage(0, 0, 0, 0.5)).toBe(false);
  });
});
