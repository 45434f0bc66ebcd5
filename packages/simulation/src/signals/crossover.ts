/**
 * Crossover Signal Engine
 * =======================
 * Walks a bar sequence once and emits BUY/SELL signals where the short moving
 * average crosses the long one, holding at most one long position at a time.
 */

import type { MovingAverageSeries, Position, PriceBar, Signal } from '@crossbar/core';
import { computeMovingAverage, isBearishCross, isBullishCross } from '../indicators/index.js';

function valueAt(series: MovingAverageSeries, index: number): number | null {
  return series[index] ?? null;
}

/**
 * Generate crossover signals for one pass over `bars`.
 *
 * Returns an empty list when there are fewer bars than `longWindow`. Scanning
 * starts at index `longWindow` whatever the short window is, and an index is
 * skipped when either average is missing at it or at the bar before it.
 * Comparisons are exact; there is no tolerance band around the cross.
 */
export function generateSignals(
  bars: readonly PriceBar[],
  shortWindow: number,
  longWindow: number
): Signal[] {
  if (bars.length < longWindow) {
    return [];
  }

  const closes = bars.map((bar) => bar.close);
  const shortMA = computeMovingAverage(closes, shortWindow);
  const longMA = computeMovingAverage(closes, longWindow);

  const signals: Signal[] = [];
  let position: Position = 'FLAT';

  for (let i = longWindow; i < bars.length; i++) {
    const prevShort = valueAt(shortMA, i - 1);
    const prevLong = valueAt(longMA, i - 1);
    const currShort = valueAt(shortMA, i);
    const currLong = valueAt(longMA, i);

    if (prevShort === null || prevLong === null || currShort === null || currLong === null) {
      continue;
    }

    let kind: Signal['kind'] | null = null;
    if (isBullishCross(prevShort, prevLong, currShort, currLong) && position !== 'LONG') {
      kind = 'BUY';
      position = 'LONG';
    } else if (isBearishCross(prevShort, prevLong, currShort, currLong) && position === 'LONG') {
      kind = 'SELL';
      position = 'FLAT';
    }

    if (kind) {
      const bar = bars[i];
      signals.push({
        timestamp: bar.timestamp,
        kind,
        price: bar.close,
        shortMa: currShort,
        longMa: currLong,
      });
    }
  }

  return signals;
}
