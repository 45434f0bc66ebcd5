/**
 * Moving Average Tests
 */

import { describe, it, expect } from 'vitest';
import {
  calculateSMA,
  computeMovingAverage,
  isBearishCross,
  isBullishCross,
} from '../../../src/indicators/moving-averages.js';

describe('computeMovingAverage', () => {
  it('computes a 3-period SMA with leading nulls', () => {
    expect(computeMovingAverage([10, 20, 30, 40, 50], 3)).toEqual([null, null, 20, 30, 40]);
  });

  it('returns all nulls when the window exceeds the input', () => {
    expect(computeMovingAverage([10, 20], 5)).toEqual([null, null]);
  });

  it('defines only the last entry when the window equals the input length', () => {
    expect(computeMovingAverage([10, 20, 30], 3)).toEqual([null, null, 20]);
  });

  it('returns the prices themselves for a window of 1', () => {
    expect(computeMovingAverage([5, 7, 9], 1)).toEqual([5, 7, 9]);
  });

  it('returns an empty series for empty input', () => {
    expect(computeMovingAverage([], 3)).toEqual([]);
  });

  it.each([0, -2, 2.5, Number.NaN])('returns all nulls for window %s', (window) => {
    expect(computeMovingAverage([1, 2, 3, 4], window)).toEqual([null, null, null, null]);
  });

  it('keeps a genuine zero mean distinct from a missing value', () => {
    expect(computeMovingAverage([0, 0, 0], 2)).toEqual([null, 0, 0]);
  });

  it('stays close to a direct recomputation', () => {
    const prices = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7];
    const series = computeMovingAverage(prices, 3);

    for (let i = 2; i < prices.length; i++) {
      const direct = (prices[i - 2] + prices[i - 1] + prices[i]) / 3;
      expect(series[i]).toBeCloseTo(direct, 12);
    }
  });

  it('handles long windows over long inputs', () => {
    const prices = Array.from({ length: 50000 }, (_, i) => (i % 7) + 1);
    const series = computeMovingAverage(prices, 20000);

    expect(series[19998]).toBeNull();
    expect(series[19999]).toBeCloseTo(calculateSMA(prices, 20000, 19999) ?? Number.NaN, 9);
    expect(series[49999]).toBeCloseTo(calculateSMA(prices, 20000, 49999) ?? Number.NaN, 9);
  });

  it('reads each price at most twice whatever the window', () => {
    let reads = 0;
    const prices = new Proxy(
      Array.from({ length: 1000 }, (_, i) => i + 1),
      {
        get(target, key, receiver) {
          if (typeof key === 'string' && /^\d+$/.test(key)) {
            reads += 1;
          }
          return Reflect.get(target, key, receiver);
        },
      }
    );

    computeMovingAverage(prices, 500);

    expect(reads).toBeLessThanOrEqual(2 * 1000);
  });
});

describe('calculateSMA', () => {
  it('averages the period ending at index', () => {
    expect(calculateSMA([10, 20, 30, 40], 2, 3)).toBe(35);
  });

  it('returns null before the period is filled and past the end', () => {
    expect(calculateSMA([10, 20, 30], 3, 1)).toBeNull();
    expect(calculateSMA([10, 20, 30], 3, 3)).toBeNull();
  });
});

describe('crossing predicates', () => {
  it('treats touching then rising above as a bullish cross', () => {
    expect(isBullishCross(100, 100, 101, 100.6)).toBe(true);
    expect(isBullishCross(101, 100.6, 103, 101.8)).toBe(false);
  });

  it('treats touching then falling below as a bearish cross', () => {
    expect(isBearishCross(100, 100, 99, 99.5)).toBe(true);
    expect(isBearishCross(99, 99.5, 98, 99)).toBe(false);
  });

  it('never reports both crosses for the same pair of bars', () => {
    expect(isBullishCross(100, 100, 100, 100)).toBe(false);
    expect(isBearishCross(100, 100, 100, 100)).toBe(false);
  });
});
