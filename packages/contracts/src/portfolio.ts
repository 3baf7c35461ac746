/**
 * @fileoverview Portfolio result DTOs.
 *
 * Percentages and values that cannot be computed (zero denominators) are
 * `null`, never `Infinity` or `NaN`.
 *
 * @module @crossover/contracts/portfolio
 */

/**
 * Outcome of simulating one ticker.
 *
 * @invariant profit === finalValue - initialInvestment when both are non-null
 */
export interface PortfolioResult {
  readonly initialInvestment: number;
  readonly finalValue: number | null;
  readonly profit: number | null;
  readonly roiPercent: number | null;
}

/**
 * Totals across every ticker whose final value is known.
 *
 * ROI is computed from the sums, not averaged per ticker.
 */
export interface AggregatePortfolioResult {
  readonly tickers: readonly string[];
  readonly totalInvestment: number;
  readonly totalFinal: number;
  readonly totalProfit: number;
  readonly totalRoiPercent: number | null;
}
