/**
 * Plain-data views of engine results for output formatting
 */

import type { DateTime } from 'luxon';
import type { Signal, StrategyPerformance } from '@crossbar/core';

export interface SignalRow {
  datetime: string;
  kind: Signal['kind'];
  price: number;
  shortMa: number;
  longMa: number;
}

export type PerformanceReport = Omit<StrategyPerformance, 'signals'> & {
  strategy: string;
  signals: SignalRow[];
};

export function toIsoString(timestamp: DateTime): string {
  return timestamp.toUTC().toISO() ?? timestamp.toString();
}

export function toSignalRow(signal: Signal): SignalRow {
  return {
    datetime: toIsoString(signal.timestamp),
    kind: signal.kind,
    price: signal.price,
    shortMa: signal.shortMa,
    longMa: signal.longMa,
  };
}

export function toPerformanceReport(
  strategy: string,
  performance: StrategyPerformance
): PerformanceReport {
  return {
    strategy,
    shortWindow: performance.shortWindow,
    longWindow: performance.longWindow,
    barCount: performance.barCount,
    totalTrades: performance.totalTrades,
    winningTrades: performance.winningTrades,
    losingTrades: performance.losingTrades,
    winRate: performance.winRate,
    totalReturn: performance.totalReturn,
    signals: performance.signals.map(toSignalRow),
  };
}
