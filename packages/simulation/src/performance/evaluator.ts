/**
 * Performance Evaluator
 * =====================
 * Pairs BUY/SELL signals into round-trip trades and summarizes them.
 */

import { EMPTY_PERFORMANCE } from '@crossbar/core';
import type { PerformanceSummary, Signal, Trade } from '@crossbar/core';

/**
 * What trade pairing needs from a signal. Full `Signal`s qualify.
 */
export type TradeSignal = Pick<Signal, 'kind' | 'price'> & Partial<Pick<Signal, 'timestamp'>>;

/**
 * Round half away from zero to `places` decimals
 */
export function roundTo(value: number, places: number = 2): number {
  const factor = 10 ** places;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  // Normalize -0
  return rounded === 0 ? 0 : rounded;
}

/**
 * Match each SELL with the most recent unmatched BUY.
 *
 * A BUY replaces any BUY still open, a SELL with nothing open is ignored, and
 * a BUY left open at the end produces no trade.
 */
export function pairTrades(signals: readonly TradeSignal[]): Trade[] {
  const trades: Trade[] = [];
  let openBuy: TradeSignal | null = null;

  for (const signal of signals) {
    if (signal.kind === 'BUY') {
      openBuy = signal;
    } else if (openBuy !== null) {
      trades.push({
        entryPrice: openBuy.price,
        exitPrice: signal.price,
        profit: signal.price - openBuy.price,
        entryTimestamp: openBuy.timestamp,
        exitTimestamp: signal.timestamp,
      });
      openBuy = null;
    }
  }

  return trades;
}

/**
 * Aggregate completed trades into a performance summary.
 *
 * Fewer than two signals cannot form a trade and give the zeroed summary.
 * Break-even trades count as neither winning nor losing.
 */
export function evaluatePerformance(signals: readonly TradeSignal[]): PerformanceSummary {
  if (signals.length < 2) {
    return { ...EMPTY_PERFORMANCE };
  }

  const trades = pairTrades(signals);
  const totalTrades = trades.length;
  const winningTrades = trades.filter((trade) => trade.profit > 0).length;
  const losingTrades = trades.filter((trade) => trade.profit < 0).length;
  const winRate = totalTrades > 0 ? (winningTrades / totalTrades) * 100 : 0;
  const totalReturn = trades.reduce((sum, trade) => sum + trade.profit, 0);

  return {
    totalTrades,
    winningTrades,
    losingTrades,
    winRate: roundTo(winRate, 2),
    totalReturn: roundTo(totalReturn, 2),
  };
}
