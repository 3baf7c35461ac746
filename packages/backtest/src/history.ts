/**
 * Signal history reporter: projects engine events into display rows.
 */

import type { Position, SignalEvent, SignalHistoryEntry } from '@crossover/contracts';

const POSITION_LABELS: Record<Position, SignalHistoryEntry['positionLabel']> = {
  LONG: 'Holding',
  FLAT: 'Not Holding',
};

/**
 * Map events to history rows, preserving order. Missing averages become null.
 */
export function toSignalHistory(events: readonly SignalEvent[]): SignalHistoryEntry[] {
  return events.map((event) => ({
    date: event.date,
    signal: event.kind,
    price: event.price,
    positionLabel: POSITION_LABELS[event.positionAfter],
    portfolioValue: event.portfolioValue,
    shortMa: event.shortMa ?? null,
    longMa: event.longMa ?? null,
  }));
}
