/**
 * @fileoverview Tests for series result helpers.
 */

import { describe, it, expect } from 'vitest';
import { isSeriesOk, seriesOk, seriesUnavailable } from '../src/market.js';
import type { Series } from '../src/market.js';

describe('SeriesResult helpers', () => {
  const series: Series = {
    ticker: 'AAPL',
    bars: [{ date: '2024-01-02', open: 10, high: 11, low: 9, close: 10.5, volume: 100 }],
  };

  it('should wrap a series as ok', () => {
    const result = seriesOk(series);

    expect(result.kind).toBe('ok');
    expect(isSeriesOk(result)).toBe(true);
    if (isSeriesOk(result)) {
      expect(result.series.ticker).toBe('AAPL');
    }
  });

  it('should describe an unavailable ticker', () => {
    const result = seriesUnavailable('ZZZZ', 'empty', 'No data available for the selected date range');

    expect(isSeriesOk(result)).toBe(false);
    expect(result).toEqual({
      kind: 'unavailable',
      ticker: 'ZZZZ',
      reason: 'empty',
      message: 'No data available for the selected date range',
    });
  });
});
