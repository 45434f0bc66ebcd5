import { describe, it, expect, afterEach, vi } from 'vitest';
import { InsufficientDataError, ValidationError } from '@crossbar/utils';
import { MovingAverageCrossoverStrategy } from '../../../src/strategies/ma-crossover.js';
import { RALLY_THEN_DROP, barsFromCloses } from '../../fixtures/bars.js';

describe('MovingAverageCrossoverStrategy', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to 10/20 windows', () => {
    vi.stubEnv('CROSSBAR_SHORT_WINDOW', '');
    vi.stubEnv('CROSSBAR_LONG_WINDOW', '');

    const strategy = new MovingAverageCrossoverStrategy();

    expect(strategy.shortWindow).toBe(10);
    expect(strategy.longWindow).toBe(20);
  });

  it('takes default windows from the environment', () => {
    vi.stubEnv('CROSSBAR_SHORT_WINDOW', '5');
    vi.stubEnv('CROSSBAR_LONG_WINDOW', '30');

    const strategy = new MovingAverageCrossoverStrategy({ longWindow: 8 });

    expect(strategy.shortWindow).toBe(5);
    expect(strategy.longWindow).toBe(8);
  });

  it('rejects windows that are not positive integers', () => {
    expect(() => new MovingAverageCrossoverStrategy({ shortWindow: 0, longWindow: 5 })).toThrow(
      ValidationError
    );
    expect(() => new MovingAverageCrossoverStrategy({ shortWindow: 3, longWindow: 2.5 })).toThrow(
      /Invalid strategy windows: longWindow/
    );
  });

  it('evaluates signals and performance together', () => {
    const strategy = new MovingAverageCrossoverStrategy({ shortWindow: 3, longWindow: 5 });

    const report = strategy.evaluate(barsFromCloses(RALLY_THEN_DROP));

    expect(report).toMatchObject({
      shortWindow: 3,
      longWindow: 5,
      barCount: 13,
      totalTrades: 1,
      winningTrades: 0,
      losingTrades: 1,
      winRate: 0,
      totalReturn: -9,
    });
    expect(report.signals.map((s) => [s.kind, s.price])).toEqual([
      ['BUY', 103],
      ['SELL', 94],
    ]);
  });

  it('returns an empty report for short input by default', () => {
    const strategy = new MovingAverageCrossoverStrategy({ shortWindow: 3, longWindow: 5 });

    const report = strategy.evaluate(barsFromCloses([1, 2, 3]));

    expect(report.signals).toEqual([]);
    expect(report.totalTrades).toBe(0);
    expect(report.barCount).toBe(3);
  });

  it('raises InsufficientDataError when sufficient data is required', () => {
    const strategy = new MovingAverageCrossoverStrategy({ shortWindow: 3, longWindow: 5 });

    expect(() =>
      strategy.evaluate(barsFromCloses([1, 2, 3]), { requireSufficientData: true })
    ).toThrow(InsufficientDataError);
    expect(() =>
      strategy.evaluate(barsFromCloses([1, 2, 3]), { requireSufficientData: true })
    ).toThrow('Insufficient data. Need at least 5 records.');
  });

  it('accepts a short window larger than the long window', () => {
    const strategy = new MovingAverageCrossoverStrategy({ shortWindow: 5, longWindow: 3 });

    expect(strategy.shortWindow).toBe(5);
    expect(strategy.longWindow).toBe(3);
  });
});
