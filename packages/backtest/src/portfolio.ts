/**
 * Portfolio simulator.
 *
 * Tracks a single all-in position per ticker while the signal engine walks
 * the series, and reduces final values to profit/ROI figures.
 */

import type {
  AccountingMode,
  AggregatePortfolioResult,
  PortfolioResult,
  Position,
  SignalKind,
} from '@crossover/contracts';
import { safeDivide } from './math.js';

/**
 * Snapshot of the account for one ticker.
 *
 * `value` is null once a zero price made it impossible to compute.
 */
export interface PortfolioState {
  readonly value: number | null;
  readonly position: Position;
  readonly entryPrice?: number;
}

/**
 * Single-position account driven bar by bar by the signal engine.
 *
 * Under `mark-to-market` the equity follows every close while LONG; under
 * `realized` it only moves when a SELL closes the round trip.
 *
 * @example
 * ```typescript
 * const ledger = new PortfolioLedger(1000);
 * ledger.open(10);
 * ledger.markToMarket(10, 11); // value 1100
 * ledger.close(11);
 * ledger.finalValue(); // 1100
 * ```
 */
export class PortfolioLedger {
  private value: number | null;
  private position: Position = 'FLAT';
  private entryPrice: number | undefined;

  constructor(
    readonly initialInvestment: number,
    readonly accounting: AccountingMode = 'mark-to-market'
  ) {
    this.value = initialInvestment;
  }

  get state(): PortfolioState {
    return this.entryPrice === undefined
      ? { value: this.value, position: this.position }
      : { value: this.value, position: this.position, entryPrice: this.entryPrice };
  }

  /**
   * Revalue an open position from the previous close to the current one.
   * No-op while FLAT or under realized accounting.
   */
  markToMarket(previousClose: number, close: number): void {
    if (this.position !== 'LONG' || this.accounting !== 'mark-to-market' || this.value === null) {
      return;
    }

    const change = safeDivide(close - previousClose, previousClose);
    this.value = change === null ? null : this.value * (1 + change);
  }

  /**
   * Enter a LONG position at `price` with the whole account.
   */
  open(price: number): void {
    if (this.position === 'LONG') {
      return;
    }
    this.position = 'LONG';
    this.entryPrice = price;
  }

  /**
   * Close the open position at `price`.
   */
  close(price: number): void {
    if (this.position !== 'LONG') {
      return;
    }

    if (this.accounting === 'realized' && this.value !== null) {
      const change = this.entryPrice === undefined ? null : safeDivide(price - this.entryPrice, this.entryPrice);
      this.value = change === null ? null : this.value * (1 + change);
    }

    this.position = 'FLAT';
    this.entryPrice = undefined;
  }

  /**
   * Account value including the open position marked at `price`.
   */
  markedValue(price: number): number | null {
    if (this.value === null || this.position !== 'LONG' || this.accounting === 'mark-to-market') {
      return this.value;
    }

    const change = this.entryPrice === undefined ? null : safeDivide(price - this.entryPrice, this.entryPrice);
    return change === null ? null : this.value * (1 + change);
  }

  /**
   * Value reported at the end of the run. Under realized accounting an open
   * position is not counted.
   */
  finalValue(): number | null {
    return this.value;
  }
}

/**
 * Single-shot value estimate used by the level-count policy.
 *
 * Not a path simulation: it applies the close's distance from the moving
 * average once, in the signal's direction.
 *
 * @returns `C0 * (1 + r)` for BUY, `C0 * (1 - r)` otherwise, with
 *   `r = (close - ma) / ma`; null when `ma` is zero
 */
export function estimateLevelCountValue(
  initialInvestment: number,
  signal: SignalKind,
  close: number,
  movingAverage: number
): number | null {
  const distance = safeDivide(close - movingAverage, movingAverage);
  if (distance === null) {
    return null;
  }
  return signal === 'BUY' ? initialInvestment * (1 + distance) : initialInvestment * (1 - distance);
}

/**
 * Reduce a final value to profit and ROI.
 */
export function summarizePortfolio(initialInvestment: number, finalValue: number | null): PortfolioResult {
  if (finalValue === null) {
    return { initialInvestment, finalValue: null, profit: null, roiPercent: null };
  }

  const profit = finalValue - initialInvestment;
  const ratio = safeDivide(profit, initialInvestment);

  return {
    initialInvestment,
    finalValue,
    profit,
    roiPercent: ratio === null ? null : ratio * 100,
  };
}

/**
 * Totals across tickers. Entries without a final value are left out so a
 * broken ticker cannot corrupt the sums.
 */
export function aggregatePortfolios(
  entries: ReadonlyArray<{ ticker: string; portfolio: PortfolioResult }>
): AggregatePortfolioResult {
  const tickers: string[] = [];
  let totalInvestment = 0;
  let totalFinal = 0;

  for (const { ticker, portfolio } of entries) {
    if (portfolio.finalValue === null) {
      continue;
    }
    tickers.push(ticker);
    totalInvestment += portfolio.initialInvestment;
    totalFinal += portfolio.finalValue;
  }

  const totalProfit = totalFinal - totalInvestment;
  const ratio = safeDivide(totalProfit, totalInvestment);

  return {
    tickers,
    totalInvestment,
    totalFinal,
    totalProfit,
    totalRoiPercent: ratio === null ? null : ratio * 100,
  };
}
