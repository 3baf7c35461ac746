/**
 * Backtest report formatter
 * Supports multiple output formats with deterministic output
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type {
  BacktestConfig,
  BatchReport,
  DailyBar,
  SignalKind,
  TickerOutcome,
  TickerReport,
} from '@crossover/contracts';

export const OUTPUT_FORMATS = ['text', 'json', 'table', 'markdown'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface FormatterOptions {
  /** ANSI colours for signals and headings (text format only) */
  color?: boolean;
}

const UNDEFINED_VALUE = 'Undefined';

const TABLE_WIDTHS = [8, 6, 11, 12, 12, 8];

const RECENT_COLUMN_WIDTH = 10;

/**
 * Money with two decimals, or "Undefined" for a value that could not be computed.
 */
export function formatMoney(value: number | null): string {
  if (value === null) return UNDEFINED_VALUE;
  return value < 0 ? `-$${Math.abs(value).toFixed(2)}` : `$${value.toFixed(2)}`;
}

export function formatPercent(value: number | null): string {
  return value === null ? UNDEFINED_VALUE : `${value.toFixed(2)}%`;
}

/**
 * One-line description of the signal policy and its windows.
 */
export function describePolicy(config: BacktestConfig): string {
  switch (config.policy.kind) {
    case 'level-count':
      return `level-count (window ${config.window})`;
    case 'plain-crossover':
      return `plain-crossover (short ${config.shortWindow} / long ${config.longWindow})`;
    case 'threshold-gated-crossover':
      return `threshold-gated-crossover (short ${config.shortWindow} / long ${config.longWindow}, threshold ${config.policy.threshold})`;
  }
}

function positionLabel(report: TickerReport): string {
  return report.finalPosition === 'LONG' ? 'Holding' : 'Not Holding';
}

function recentBarLines(bars: readonly DailyBar[]): string[] {
  const cell = (text: string) => text.padStart(RECENT_COLUMN_WIDTH);
  const header = ['Open', 'High', 'Low', 'Close', 'Volume'].map(cell).join('  ');
  const rows = bars.map(
    (bar) =>
      `${bar.date}  ${[bar.open, bar.high, bar.low, bar.close].map((price) => cell(formatMoney(price))).join('  ')}  ${cell(String(bar.volume))}`
  );
  return [`${'Date'.padEnd(10)}  ${header}`, ...rows];
}

function describeUnavailable(outcome: Extract<TickerOutcome, { status: 'unavailable' }>): string {
  return `${outcome.ticker}: unavailable (${outcome.reason}) ${outcome.message}`;
}

/**
 * Formatter for multi-ticker backtest reports
 */
export class BacktestFormatter {
  private readonly paint: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.paint = new Chalk({ level: options.color ? 1 : 0 });
  }

  /**
   * Format report in specified format
   */
  format(report: BatchReport, format: OutputFormat = 'text'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(report);
      case 'table':
        return this.formatAsTable(report);
      case 'markdown':
        return this.formatAsMarkdown(report);
      case 'text':
      default:
        return this.formatAsText(report);
    }
  }

  private signal(kind: SignalKind, text: string = kind): string {
    switch (kind) {
      case 'BUY':
        return this.paint.green(text);
      case 'SELL':
        return this.paint.red(text);
      case 'HOLD':
        return this.paint.yellow(text);
    }
  }

  /**
   * Format as plain text (default)
   */
  private formatAsText(report: BatchReport): string {
    const lines: string[] = [];

    // Header
    lines.push(this.paint.bold(`Backtest Report: ${report.start} to ${report.end}`));
    lines.push(
      `Policy: ${describePolicy(report.config)} | Capital: ${formatMoney(report.config.initialInvestment)} | Accounting: ${report.config.accounting}`
    );
    lines.push('='.repeat(50));

    for (const outcome of report.outcomes) {
      lines.push('');

      if (outcome.status === 'unavailable') {
        lines.push(this.paint.dim(describeUnavailable(outcome)));
        continue;
      }

      const ticker = outcome.report;
      lines.push(this.paint.bold(ticker.ticker));
      lines.push(`  ${this.signal(ticker.latestSignal, ticker.banner)}`);
      lines.push(`  Position: ${positionLabel(ticker)}`);

      if (ticker.insufficientHistory) {
        lines.push('  Note: insufficient history for the configured windows');
      }

      if (ticker.history.length === 0) {
        lines.push('  Signal History: none');
      } else {
        lines.push('  Signal History:');
        for (const row of ticker.history) {
          lines.push(
            `    ${row.date}  ${this.signal(row.signal, row.signal.padEnd(4))}  ${formatMoney(row.price)}  ${row.positionLabel.padEnd(11)}  ${formatMoney(row.portfolioValue)}`
          );
        }
      }

      lines.push('  Portfolio:');
      lines.push(`    Final Value: ${formatMoney(ticker.portfolio.finalValue)}`);
      lines.push(`    Profit: ${formatMoney(ticker.portfolio.profit)}`);
      lines.push(`    ROI: ${formatPercent(ticker.portfolio.roiPercent)}`);

      const { summary } = ticker;
      lines.push('  Statistics:');
      lines.push(`    Bars: ${summary.barCount}`);
      lines.push(`    Current Price: ${formatMoney(summary.currentPrice)}`);
      lines.push(`    Daily Change: ${formatPercent(summary.dailyChangePercent)}`);
      lines.push(`    Volume: ${summary.latestVolume}`);
      lines.push(`    Period High: ${formatMoney(summary.periodHigh)}`);
      lines.push(`    Period Low: ${formatMoney(summary.periodLow)}`);

      if (ticker.recentBars.length > 0) {
        lines.push('  Recent Data:');
        for (const line of recentBarLines(ticker.recentBars)) {
          lines.push(`    ${line}`);
        }
      }
    }

    // Aggregate
    const { aggregate } = report;
    const count = aggregate.tickers.length;
    lines.push('');
    lines.push(this.paint.bold(`Aggregate (${count} ticker${count === 1 ? '' : 's'}):`));
    lines.push(`  Total Investment: ${formatMoney(aggregate.totalInvestment)}`);
    lines.push(`  Total Final Value: ${formatMoney(aggregate.totalFinal)}`);
    lines.push(`  Total Profit: ${formatMoney(aggregate.totalProfit)}`);
    lines.push(`  Total ROI: ${formatPercent(aggregate.totalRoiPercent)}`);

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push(this.paint.yellow('Warnings:'));
      for (const warning of report.warnings) {
        lines.push(`  - ${warning}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Format as JSON
   */
  private formatAsJSON(report: BatchReport): string {
    return JSON.stringify(report, null, 2);
  }

  /**
   * Format as table
   */
  private formatAsTable(report: BatchReport): string {
    const border = (left: string, middle: string, right: string) =>
      `${left}${TABLE_WIDTHS.map((width) => '─'.repeat(width + 2)).join(middle)}${right}`;
    const row = (cells: string[]) =>
      `│ ${cells.map((cell, i) => this.padRight(cell, TABLE_WIDTHS[i] ?? cell.length)).join(' │ ')} │`;

    const lines: string[] = [];
    lines.push(border('┌', '┬', '┐'));
    lines.push(row(['Ticker', 'Signal', 'Position', 'Final Value', 'Profit', 'ROI']));
    lines.push(border('├', '┼', '┤'));

    for (const outcome of report.outcomes) {
      if (outcome.status === 'unavailable') {
        lines.push(row([outcome.ticker, '-', 'unavailable', '-', '-', '-']));
        continue;
      }
      const { report: ticker } = outcome;
      lines.push(
        row([
          ticker.ticker,
          ticker.latestSignal,
          positionLabel(ticker),
          formatMoney(ticker.portfolio.finalValue),
          formatMoney(ticker.portfolio.profit),
          formatPercent(ticker.portfolio.roiPercent),
        ])
      );
    }

    const { aggregate } = report;
    lines.push(border('├', '┼', '┤'));
    lines.push(
      row([
        'TOTAL',
        '',
        '',
        formatMoney(aggregate.totalFinal),
        formatMoney(aggregate.totalProfit),
        formatPercent(aggregate.totalRoiPercent),
      ])
    );
    lines.push(border('└', '┴', '┘'));

    return lines.join('\n');
  }

  /**
   * Format as markdown
   */
  private formatAsMarkdown(report: BatchReport): string {
    const lines: string[] = [];

    // Header
    lines.push('# Backtest Report');
    lines.push('');
    lines.push(`- **Range**: ${report.start} to ${report.end}`);
    lines.push(`- **Policy**: ${describePolicy(report.config)}`);
    lines.push(`- **Capital**: ${formatMoney(report.config.initialInvestment)} per ticker`);
    lines.push(`- **Accounting**: ${report.config.accounting}`);
    lines.push('');

    // Summary
    lines.push('## Summary');
    lines.push('');
    lines.push('| Ticker | Signal | Position | Final Value | Profit | ROI |');
    lines.push('|--------|--------|----------|-------------|--------|-----|');
    for (const outcome of report.outcomes) {
      if (outcome.status === 'unavailable') {
        lines.push(`| ${outcome.ticker} | - | unavailable (${outcome.reason}) | - | - | - |`);
        continue;
      }
      const { report: ticker } = outcome;
      lines.push(
        `| ${ticker.ticker} | ${ticker.latestSignal} | ${positionLabel(ticker)} | ${formatMoney(ticker.portfolio.finalValue)} | ${formatMoney(ticker.portfolio.profit)} | ${formatPercent(ticker.portfolio.roiPercent)} |`
      );
    }
    lines.push('');

    // Per-ticker history
    for (const outcome of report.outcomes) {
      if (outcome.status === 'unavailable') {
        continue;
      }
      const { report: ticker } = outcome;
      lines.push(`## ${ticker.ticker}`);
      lines.push('');
      lines.push(`> ${ticker.banner}`);
      lines.push('');

      if (ticker.history.length === 0) {
        lines.push('_No signal changes._');
      } else {
        lines.push('| Date | Signal | Price | Position | Portfolio Value |');
        lines.push('|------|--------|-------|----------|-----------------|');
        for (const row of ticker.history) {
          lines.push(
            `| ${row.date} | ${row.signal} | ${formatMoney(row.price)} | ${row.positionLabel} | ${formatMoney(row.portfolioValue)} |`
          );
        }
      }

      if (ticker.recentBars.length > 0) {
        lines.push('');
        lines.push('### Recent Data');
        lines.push('');
        lines.push('| Date | Open | High | Low | Close | Volume |');
        lines.push('|------|------|------|-----|-------|--------|');
        for (const bar of ticker.recentBars) {
          lines.push(
            `| ${bar.date} | ${formatMoney(bar.open)} | ${formatMoney(bar.high)} | ${formatMoney(bar.low)} | ${formatMoney(bar.close)} | ${bar.volume} |`
          );
        }
      }
      lines.push('');
    }

    // Unavailable tickers
    const unavailable = report.outcomes.flatMap((outcome) =>
      outcome.status === 'unavailable' ? [outcome] : []
    );
    if (unavailable.length > 0) {
      lines.push('## Unavailable');
      lines.push('');
      for (const outcome of unavailable) {
        lines.push(`- ${describeUnavailable(outcome)}`);
      }
      lines.push('');
    }

    // Aggregate
    const { aggregate } = report;
    lines.push('## Aggregate');
    lines.push('');
    lines.push(`- **Tickers**: ${aggregate.tickers.join(', ') || 'none'}`);
    lines.push(`- **Total Investment**: ${formatMoney(aggregate.totalInvestment)}`);
    lines.push(`- **Total Final Value**: ${formatMoney(aggregate.totalFinal)}`);
    lines.push(`- **Total Profit**: ${formatMoney(aggregate.totalProfit)}`);
    lines.push(`- **Total ROI**: ${formatPercent(aggregate.totalRoiPercent)}`);

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push('## Warnings');
      lines.push('');
      for (const warning of report.warnings) {
        lines.push(`- ${warning}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Pad string to right with spaces
   */
  private padRight(str: string, length: number): string {
    return str.padEnd(length);
  }
}
