/**
 * @fileoverview Error taxonomy for crossover-desk.
 *
 * Structured error classes with machine-readable codes and context data.
 * Ticker-level "no data" is not signalled with these: providers return a
 * tagged {@link SeriesResult}. The classes below cover real failures and are
 * also used to describe unavailability in logs.
 *
 * @module @crossover/contracts/errors
 */

import type { UnavailableReason } from './market.js';

/**
 * Base error class for all crossover-desk errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CrossoverError('CUSTOM_ERROR', 'Something went wrong', { ticker: 'AAPL' });
 * ```
 */
export class CrossoverError extends Error {
  /** Machine-readable error code (e.g. 'PROVIDER_UNAVAILABLE') */
  readonly code: string;

  /** Structured context for debugging */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'CrossoverError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * A market data provider could not supply a series for a ticker.
 *
 * @example
 * ```typescript
 * throw new ProviderUnavailableError('Request timed out', {
 *   ticker: 'AAPL',
 *   reason: 'network',
 *   provider: 'yahoo'
 * });
 * ```
 */
export class ProviderUnavailableError extends CrossoverError {
  constructor(
    message: string,
    data: { ticker: string; reason: UnavailableReason; provider?: string; status?: number }
  ) {
    super('PROVIDER_UNAVAILABLE', message, data);
    this.name = 'ProviderUnavailableError';
  }

  get reason(): UnavailableReason {
    const reason = this.data?.['reason'];
    return reason === 'not-found' || reason === 'empty' || reason === 'invalid-response'
      ? reason
      : 'network';
  }
}

/**
 * A series is shorter than the window a computation needs.
 *
 * The core degrades to an empty signal history instead of throwing this;
 * it exists so callers can report the condition uniformly.
 */
export class InsufficientHistoryError extends CrossoverError {
  constructor(message: string, data: { ticker?: string; bars: number; required: number }) {
    super('INSUFFICIENT_HISTORY', message, data);
    this.name = 'InsufficientHistoryError';
  }
}

/**
 * A moving-average window is not a usable length.
 */
export class InvalidWindowConfigurationError extends CrossoverError {
  constructor(
    message: string,
    data: { field: string; value: number; min?: number; max?: number }
  ) {
    super('INVALID_WINDOW_CONFIGURATION', message, data);
    this.name = 'InvalidWindowConfigurationError';
  }
}

export function isCrossoverError(error: unknown): error is CrossoverError {
  return error instanceof CrossoverError;
}

export function isProviderUnavailableError(error: unknown): error is ProviderUnavailableError {
  return error instanceof ProviderUnavailableError;
}

export function isInsufficientHistoryError(error: unknown): error is InsufficientHistoryError {
  return error instanceof InsufficientHistoryError;
}

export function isInvalidWindowConfigurationError(
  error: unknown
): error is InvalidWindowConfigurationError {
  return error instanceof InvalidWindowConfigurationError;
}
