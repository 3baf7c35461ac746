import { describe, it, expect } from 'vitest';
import { filterToRange, toEpochSeconds, toPeriod } from '../src/range.js';

describe('toEpochSeconds', () => {
  it('should return UTC midnight', () => {
    expect(toEpochSeconds('2024-01-01')).toBe(1704067200);
  });

  it('should reject invalid dates', () => {
    expect(() => toEpochSeconds('2024-13-01')).toThrow(RangeError);
  });
});

describe('toPeriod', () => {
  it('should make the end date inclusive', () => {
    expect(toPeriod('2024-01-01', '2024-01-05')).toEqual({ period1: 1704067200, period2: 1704499200 });
  });
});

describe('filterToRange', () => {
  it('should keep bars inside the range and bars the normalizer must judge', () => {
    const bar = (date: unknown) => ({ date, open: 1, high: 1, low: 1, close: 1, volume: 1 });

    const kept = filterToRange(
      [bar('2023-12-29'), bar('2024-01-02'), bar('2024-01-05'), bar('2024-01-08'), bar(null)],
      '2024-01-01',
      '2024-01-05'
    );

    expect(kept.map((entry) => entry.date)).toEqual(['2024-01-02', '2024-01-05', null]);
  });
});
