/**
 * Backtest configuration resolution.
 *
 * User input is validated upstream, but the core still clamps every numeric
 * parameter into its operational range and reports what it changed. Nothing
 * here throws: a bad value is replaced and the run continues.
 */

import type { AccountingMode, BacktestConfig, SignalPolicy, SignalPolicyKind } from '@crossover/contracts';
import { clamp } from './math.js';

interface Bounds {
  readonly min: number;
  readonly max: number;
}

/**
 * Operational ranges for numeric parameters.
 */
export const OPERATIONAL_BOUNDS = {
  window: { min: 5, max: 200 },
  shortWindow: { min: 5, max: 100 },
  longWindow: { min: 20, max: 200 },
  initialInvestment: { min: 100, max: 1_000_000 },
  threshold: { min: 0, max: 1 },
} as const satisfies Record<string, Bounds>;

export const DEFAULT_THRESHOLD = 0.001;

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = {
  policy: { kind: 'plain-crossover' },
  window: 30,
  shortWindow: 20,
  longWindow: 50,
  initialInvestment: 10_000,
  accounting: 'mark-to-market',
};

/**
 * Loose configuration as collected from a UI, CLI or environment.
 */
export interface BacktestConfigInput {
  policy?: SignalPolicyKind;
  threshold?: number;
  window?: number;
  shortWindow?: number;
  longWindow?: number;
  initialInvestment?: number;
  accounting?: AccountingMode;
}

/**
 * Resolved configuration plus one message per adjustment made.
 */
export interface ResolvedBacktestConfig {
  config: BacktestConfig;
  warnings: string[];
}

function resolveNumber(
  field: keyof typeof OPERATIONAL_BOUNDS,
  value: number | undefined,
  fallback: number,
  integer: boolean,
  warnings: string[]
): number {
  if (value === undefined) {
    return fallback;
  }

  const bounds = OPERATIONAL_BOUNDS[field];
  if (!Number.isFinite(value)) {
    warnings.push(`${field} ${value} is not a number; using ${fallback}`);
    return fallback;
  }

  const rounded = integer ? Math.round(value) : value;
  const clamped = clamp(rounded, bounds.min, bounds.max);
  if (clamped !== value) {
    warnings.push(`${field} ${value} adjusted to ${clamped} (allowed ${bounds.min}-${bounds.max})`);
  }
  return clamped;
}

/**
 * Build an immutable {@link BacktestConfig} from loose input.
 *
 * @example
 * ```typescript
 * const { config, warnings } = resolveBacktestConfig({ shortWindow: 2, longWindow: 400 });
 * // config.shortWindow === 5, config.longWindow === 200
 * // warnings.length === 2
 * ```
 */
export function resolveBacktestConfig(input: BacktestConfigInput = {}): ResolvedBacktestConfig {
  const warnings: string[] = [];
  const defaults = DEFAULT_BACKTEST_CONFIG;

  const window = resolveNumber('window', input.window, defaults.window, true, warnings);
  const shortWindow = resolveNumber('shortWindow', input.shortWindow, defaults.shortWindow, true, warnings);
  const longWindow = resolveNumber('longWindow', input.longWindow, defaults.longWindow, true, warnings);
  const initialInvestment = resolveNumber(
    'initialInvestment',
    input.initialInvestment,
    defaults.initialInvestment,
    false,
    warnings
  );

  let policy: SignalPolicy;
  switch (input.policy ?? defaults.policy.kind) {
    case 'level-count':
      policy = { kind: 'level-count' };
      break;
    case 'threshold-gated-crossover':
      policy = {
        kind: 'threshold-gated-crossover',
        threshold: resolveNumber('threshold', input.threshold, DEFAULT_THRESHOLD, false, warnings),
      };
      break;
    case 'plain-crossover':
    default:
      policy = { kind: 'plain-crossover' };
      break;
  }

  if (policy.kind !== 'level-count' && shortWindow >= longWindow) {
    warnings.push(
      `shortWindow ${shortWindow} is not below longWindow ${longWindow}; crossovers are unlikely`
    );
  }

  return {
    config: {
      policy,
      window,
      shortWindow,
      longWindow,
      initialInvestment,
      accounting: input.accounting ?? defaults.accounting,
    },
    warnings,
  };
}
