/**
 * Tests for backtest report formatting
 */

import { describe, it, expect } from 'vitest';
import type { BacktestConfig, BatchReport, TickerReport } from '@crossover/contracts';
import {
  BacktestFormatter,
  describePolicy,
  formatMoney,
  formatPercent,
} from '../../src/formatters/backtest-formatter.js';

const config: BacktestConfig = {
  policy: { kind: 'plain-crossover' },
  window: 30,
  shortWindow: 20,
  longWindow: 50,
  initialInvestment: 10000,
  accounting: 'mark-to-market',
};

const traded: TickerReport = {
  ticker: 'AAA',
  policy: config.policy,
  events: [
    { date: '2024-02-01', index: 50, kind: 'BUY', price: 100, positionAfter: 'LONG', portfolioValue: 10000, shortMa: 99, longMa: 98 },
    { date: '2024-02-20', index: 69, kind: 'SELL', price: 110, positionAfter: 'FLAT', portfolioValue: 11000, shortMa: 111, longMa: 112 },
  ],
  history: [
    { date: '2024-02-01', signal: 'BUY', price: 100, positionLabel: 'Holding', portfolioValue: 10000, shortMa: 99, longMa: 98 },
    { date: '2024-02-20', signal: 'SELL', price: 110, positionLabel: 'Not Holding', portfolioValue: 11000, shortMa: 111, longMa: 112 },
  ],
  latestSignal: 'SELL',
  finalPosition: 'FLAT',
  banner: 'SELL Signal: Price ($110.00), 20-day MA ($111.00), 50-day MA ($112.00)',
  portfolio: { initialInvestment: 10000, finalValue: 11000, profit: 1000, roiPercent: 10 },
  summary: {
    barCount: 60,
    currentPrice: 108.5,
    dailyChangePercent: -1.25,
    latestVolume: 123456,
    periodHigh: 115,
    periodLow: 95.5,
  },
  recentBars: [],
  insufficientHistory: false,
};

const report: BatchReport = {
  start: '2024-01-01',
  end: '2024-03-01',
  config,
  outcomes: [
    { status: 'ok', report: traded },
    { status: 'unavailable', ticker: 'BBB', reason: 'not-found', message: 'Ticker BBB not found' },
  ],
  aggregate: {
    tickers: ['AAA'],
    totalInvestment: 10000,
    totalFinal: 11000,
    totalProfit: 1000,
    totalRoiPercent: 10,
  },
  warnings: ['shortWindow 2 adjusted to 5 (allowed 5-100)'],
};

const withRecentBars: BatchReport = {
  ...report,
  outcomes: [
    {
      status: 'ok',
      report: {
        ...traded,
        recentBars: [
          { date: '2024-02-29', open: 107, high: 109.5, low: 106.25, close: 109, volume: 98000 },
          { date: '2024-03-01', open: 109, high: 110, low: 108, close: 108.5, volume: 123456 },
        ],
      },
    },
  ],
};

describe('value formatting', () => {
  it('should format money with two decimals', () => {
    expect(formatMoney(1234.5)).toBe('$1234.50');
    expect(formatMoney(-250.5)).toBe('-$250.50');
    expect(formatMoney(null)).toBe('Undefined');
  });

  it('should format percentages', () => {
    expect(formatPercent(12.345)).toBe('12.35%');
    expect(formatPercent(null)).toBe('Undefined');
  });

  it('should describe each policy', () => {
    expect(describePolicy(config)).toBe('plain-crossover (short 20 / long 50)');
    expect(describePolicy({ ...config, policy: { kind: 'level-count' } })).toBe('level-count (window 30)');
    expect(describePolicy({ ...config, policy: { kind: 'threshold-gated-crossover', threshold: 0.01 } })).toBe(
      'threshold-gated-crossover (short 20 / long 50, threshold 0.01)'
    );
  });
});

describe('BacktestFormatter', () => {
  const formatter = new BacktestFormatter({ color: false });

  describe('text format', () => {
    it('should render every section', () => {
      expect(formatter.format(report, 'text').split('\n')).toEqual([
        'Backtest Report: 2024-01-01 to 2024-03-01',
        'Policy: plain-crossover (short 20 / long 50) | Capital: $10000.00 | Accounting: mark-to-market',
        '==================================================',
        '',
        'AAA',
        '  SELL Signal: Price ($110.00), 20-day MA ($111.00), 50-day MA ($112.00)',
        '  Position: Not Holding',
        '  Signal History:',
        '    2024-02-01  BUY   $100.00  Holding      $10000.00',
        '    2024-02-20  SELL  $110.00  Not Holding  $11000.00',
        '  Portfolio:',
        '    Final Value: $11000.00',
        '    Profit: $1000.00',
        '    ROI: 10.00%',
        '  Statistics:',
        '    Bars: 60',
        '    Current Price: $108.50',
        '    Daily Change: -1.25%',
        '    Volume: 123456',
        '    Period High: $115.00',
        '    Period Low: $95.50',
        '',
        'BBB: unavailable (not-found) Ticker BBB not found',
        '',
        'Aggregate (1 ticker):',
        '  Total Investment: $10000.00',
        '  Total Final Value: $11000.00',
        '  Total Profit: $1000.00',
        '  Total ROI: 10.00%',
        '',
        'Warnings:',
        '  - shortWindow 2 adjusted to 5 (allowed 5-100)',
      ]);
    });

    it('should default to text', () => {
      expect(formatter.format(report)).toBe(formatter.format(report, 'text'));
    });

    it('should show undefined values and missing history', () => {
      const short: TickerReport = {
        ...traded,
        events: [],
        history: [],
        latestSignal: 'HOLD',
        banner: 'HOLD Signal: insufficient history for 50-day MA',
        portfolio: { initialInvestment: 10000, finalValue: null, profit: null, roiPercent: null },
        summary: { ...traded.summary, barCount: 3, dailyChangePercent: null },
        insufficientHistory: true,
      };
      const lines = formatter
        .format({
          ...report,
          outcomes: [{ status: 'ok', report: short }],
          aggregate: { tickers: [], totalInvestment: 0, totalFinal: 0, totalProfit: 0, totalRoiPercent: null },
          warnings: [],
        })
        .split('\n');

      expect(lines.slice(4, 13)).toEqual([
        'AAA',
        '  HOLD Signal: insufficient history for 50-day MA',
        '  Position: Not Holding',
        '  Note: insufficient history for the configured windows',
        '  Signal History: none',
        '  Portfolio:',
        '    Final Value: Undefined',
        '    Profit: Undefined',
        '    ROI: Undefined',
      ]);
      expect(lines).toContain('    Daily Change: Undefined');
      expect(lines).toContain('Aggregate (0 tickers):');
      expect(lines[lines.length - 1]).toBe('  Total ROI: Undefined');
    });

    it('should list the recent bars after the statistics', () => {
      const lines = formatter.format(withRecentBars, 'text').split('\n');
      const start = lines.indexOf('    Period Low: $95.50');

      expect(lines.slice(start + 1, start + 5)).toEqual([
        '  Recent Data:',
        '    Date              Open        High         Low       Close      Volume',
        '    2024-02-29     $107.00     $109.50     $106.25     $109.00       98000',
        '    2024-03-01     $109.00     $110.00     $108.00     $108.50      123456',
      ]);
      expect(formatter.format(report, 'text')).not.toContain('Recent Data');
    });

    it('should colour signals when enabled', () => {
      const output = new BacktestFormatter({ color: true }).format(report, 'text');

      expect(output).toContain('\u001b[32mBUY \u001b[39m');
      expect(output).toContain('\u001b[31mSELL\u001b[39m');
    });
  });

  describe('table format', () => {
    it('should render one row per ticker and a total', () => {
      expect(formatter.format(report, 'table').split('\n')).toEqual([
        '┌──────────┬────────┬─────────────┬──────────────┬──────────────┬──────────┐',
        '│ Ticker   │ Signal │ Position    │ Final Value  │ Profit       │ ROI      │',
        '├──────────┼────────┼─────────────┼──────────────┼──────────────┼──────────┤',
        '│ AAA      │ SELL   │ Not Holding │ $11000.00    │ $1000.00     │ 10.00%   │',
        '│ BBB      │ -      │ unavailable │ -            │ -            │ -        │',
        '├──────────┼────────┼─────────────┼──────────────┼──────────────┼──────────┤',
        '│ TOTAL    │        │             │ $11000.00    │ $1000.00     │ 10.00%   │',
        '└──────────┴────────┴─────────────┴──────────────┴──────────────┴──────────┘',
      ]);
    });
  });

  describe('markdown format', () => {
    it('should render summary, history and unavailable tickers', () => {
      const lines = formatter.format(report, 'markdown').split('\n');

      expect(lines[0]).toBe('# Backtest Report');
      expect(lines).toContain('- **Policy**: plain-crossover (short 20 / long 50)');
      expect(lines).toContain('| AAA | SELL | Not Holding | $11000.00 | $1000.00 | 10.00% |');
      expect(lines).toContain('| BBB | - | unavailable (not-found) | - | - | - |');
      expect(lines).toContain('> SELL Signal: Price ($110.00), 20-day MA ($111.00), 50-day MA ($112.00)');
      expect(lines).toContain('| 2024-02-01 | BUY | $100.00 | Holding | $10000.00 |');
      expect(lines).toContain('- BBB: unavailable (not-found) Ticker BBB not found');
      expect(lines).toContain('- **Tickers**: AAA');
      expect(lines[lines.length - 1]).toBe('- shortWindow 2 adjusted to 5 (allowed 5-100)');
    });
  });

  it('should render recent bars as a markdown table', () => {
    const lines = formatter.format(withRecentBars, 'markdown').split('\n');
    const start = lines.indexOf('### Recent Data');

    expect(start).toBeGreaterThan(0);
    expect(lines.slice(start, start + 6)).toEqual([
      '### Recent Data',
      '',
      '| Date | Open | High | Low | Close | Volume |',
      '|------|------|------|-----|-------|--------|',
      '| 2024-02-29 | $107.00 | $109.50 | $106.25 | $109.00 | 98000 |',
      '| 2024-03-01 | $109.00 | $110.00 | $108.00 | $108.50 | 123456 |',
    ]);
  });

  describe('json format', () => {
    it('should serialize the whole report', () => {
      const parsed: unknown = JSON.parse(formatter.format(report, 'json'));

      expect(parsed).toEqual(report);
    });
  });
});
