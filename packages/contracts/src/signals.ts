/**
 * @fileoverview Signal engine DTOs.
 *
 * @module @crossover/contracts/signals
 */

/** Discrete decision emitted by the signal engine */
export type SignalKind = 'BUY' | 'SELL' | 'HOLD';

/** Open position state; no shorting, no partial sizing */
export type Position = 'FLAT' | 'LONG';

/**
 * How the signal engine turns prices and moving averages into decisions.
 *
 * - `level-count`: stateless; at the latest bar only, BUY when fewer than
 *   half of the trailing `window` closes sit below their moving average.
 * - `plain-crossover`: stateful short/long crossover with FLAT/LONG gating.
 * - `threshold-gated-crossover`: as above, but a transition only fires while
 *   the close is within `threshold` (relative) of one of the averages.
 */
export type SignalPolicy =
  | { readonly kind: 'level-count' }
  | { readonly kind: 'plain-crossover' }
  | { readonly kind: 'threshold-gated-crossover'; readonly threshold: number };

export type SignalPolicyKind = SignalPolicy['kind'];

/**
 * How equity evolves while a position is open.
 *
 * - `mark-to-market`: revalued on every bar while LONG (default)
 * - `realized`: changes only when a SELL closes the round trip
 */
export type AccountingMode = 'mark-to-market' | 'realized';

/**
 * A state transition (or the terminal HOLD summary) recorded by the engine.
 *
 * Immutable once created. Moving averages are absent when the policy does
 * not use them or history was insufficient.
 */
export interface SignalEvent {
  readonly date: string;
  /** Position of the bar in the series */
  readonly index: number;
  readonly kind: SignalKind;
  /** Close of the bar the decision was taken on */
  readonly price: number;
  readonly positionAfter: Position;
  /** Account value at the event, or null when it cannot be computed */
  readonly portfolioValue: number | null;
  readonly shortMa?: number;
  readonly longMa?: number;
}

/**
 * Display-ready row of the signal history.
 */
export interface SignalHistoryEntry {
  readonly date: string;
  readonly signal: SignalKind;
  readonly price: number;
  readonly positionLabel: 'Holding' | 'Not Holding';
  readonly portfolioValue: number | null;
  readonly shortMa: number | null;
  readonly longMa: number | null;
}
