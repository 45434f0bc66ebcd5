/**
 * Market Domain Types
 * ===================
 * Price bars in, crossover signals and performance out.
 */

import type { DateTime } from 'luxon';

/**
 * Minimal bar the crossover engine consumes.
 *
 * Sequences are expected in ascending timestamp order; the engine never re-sorts.
 */
export interface PriceBar {
  timestamp: DateTime;
  /** Close price, positive */
  close: number;
}

/**
 * Full ticker record (OHLCV). Usable anywhere a PriceBar is expected.
 */
export interface TickerBar extends PriceBar {
  open: number;
  high: number;
  low: number;
  volume: number;
}

/**
 * Moving average aligned index-for-index with its price sequence.
 * `null` marks indices without enough history; zero is a valid mean and never a placeholder.
 */
export type MovingAverageSeries = ReadonlyArray<number | null>;

/**
 * Exposure while walking a bar sequence. The rule is long-only.
 */
export type Position = 'FLAT' | 'LONG';

export type SignalKind = 'BUY' | 'SELL';

export interface Signal {
  timestamp: DateTime;
  kind: SignalKind;
  /** Close of the bar where the cross happened */
  price: number;
  /** Short moving average at the signal bar */
  shortMa: number;
  /** Long moving average at the signal bar */
  longMa: number;
}

/**
 * Completed round trip: a BUY closed by the next SELL.
 */
export interface Trade {
  entryPrice: number;
  exitPrice: number;
  profit: number;
  entryTimestamp?: DateTime;
  exitTimestamp?: DateTime;
}

export interface PerformanceSummary {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** Percentage of winning trades, 2 dp */
  winRate: number;
  /** Sum of per-trade profit in price units, 2 dp */
  totalReturn: number;
}

export interface StrategyWindows {
  shortWindow: number;
  longWindow: number;
}

/**
 * Report of one strategy evaluation: summary, parameters and the signals behind it.
 */
export interface StrategyPerformance extends PerformanceSummary, StrategyWindows {
  barCount: number;
  signals: Signal[];
}

export const EMPTY_PERFORMANCE: Readonly<PerformanceSummary> = Object.freeze({
  totalTrades: 0,
  winningTrades: 0,
  losingTrades: 0,
  winRate: 0,
  totalReturn: 0,
});
