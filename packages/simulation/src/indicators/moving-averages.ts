/**
 * Moving Average Indicators
 * =========================
 * Simple moving averages and the crossing predicates built on them.
 */

import type { MovingAverageSeries } from '@crossbar/core';

function isValidPeriod(period: number): boolean {
  return Number.isInteger(period) && period >= 1;
}

/**
 * Calculate Simple Moving Average of the `period` prices ending at `index`
 */
export function calculateSMA(
  prices: readonly number[],
  period: number,
  index: number
): number | null {
  if (!isValidPeriod(period) || index < period - 1 || index >= prices.length) {
    return null;
  }

  let sum = 0;
  for (let i = index - period + 1; i <= index; i++) {
    sum += prices[i];
  }
  return sum / period;
}

/**
 * Simple moving average over a whole price sequence.
 *
 * The output is aligned with `prices`: entry `i` is the mean of the `window`
 * prices ending at `i`, or `null` while there is not enough history. A window
 * that is not a positive integer, or is longer than the input, yields all nulls.
 * Runs in O(n) with a running sum, so entries may drift from a direct
 * recomputation by ordinary floating-point error.
 */
export function computeMovingAverage(
  prices: readonly number[],
  window: number
): MovingAverageSeries {
  if (!isValidPeriod(window) || prices.length < window) {
    return prices.map(() => null);
  }

  const series: Array<number | null> = [];
  let sum = 0;
  for (let i = 0; i < prices.length; i++) {
    sum += prices[i];
    if (i >= window) {
      sum -= prices[i - window];
    }
    series.push(i >= window - 1 ? sum / window : null);
  }
  return series;
}

/**
 * Short MA moves from at-or-below the long MA to strictly above it
 */
export function isBullishCross(
  prevShort: number,
  prevLong: number,
  currShort: number,
  currLong: number
): boolean {
  return prevShort <= prevLong && currShort > currLong;
}

/**
 * Short MA moves from at-or-above the long MA to strictly below it
 */
export function isBearishCross(
  prevShort: number,
  prevLong: number,
  currShort: number,
  currLong: number
): boolean {
  return prevShort >= prevLong && currShort < currLong;
}
