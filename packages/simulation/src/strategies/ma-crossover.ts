/**
 * Moving Average Crossover Strategy
 * =================================
 * - Buy signal: short MA crosses above long MA
 * - Sell signal: short MA crosses below long MA
 *
 * Holds no state between evaluations; each call recomputes from the full bar sequence.
 */

import { strategyWindowsSchema } from '@crossbar/core';
import type {
  PerformanceSummary,
  PriceBar,
  Signal,
  StrategyPerformance,
  StrategyWindows,
} from '@crossbar/core';
import {
  getStrategyConfig,
  InsufficientDataError,
  LogHelpers,
  ValidationError,
} from '@crossbar/utils';
import { logger } from '../logger.js';
import { generateSignals } from '../signals/crossover.js';
import { evaluatePerformance } from '../performance/evaluator.js';
import { formatIssues } from '../validation/bar-validation.js';

export interface MovingAverageCrossoverOptions {
  /** Defaults to CROSSBAR_SHORT_WINDOW, or 10 */
  shortWindow?: number;
  /** Defaults to CROSSBAR_LONG_WINDOW, or 20 */
  longWindow?: number;
}

export interface EvaluateOptions {
  /**
   * Raise InsufficientDataError when there are fewer bars than the long window,
   * instead of returning empty signals and a zeroed summary
   */
  requireSufficientData?: boolean;
}

export class MovingAverageCrossoverStrategy implements StrategyWindows {
  readonly name = 'ma-crossover' as const;
  readonly shortWindow: number;
  readonly longWindow: number;

  constructor(options: MovingAverageCrossoverOptions = {}) {
    const windows = {
      shortWindow: options.shortWindow ?? getStrategyConfig().shortWindow,
      longWindow: options.longWindow ?? getStrategyConfig().longWindow,
    };

    const parsed = strategyWindowsSchema.safeParse(windows);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid strategy windows: ${formatIssues(parsed.error.issues)}`,
        windows
      );
    }

    this.shortWindow = parsed.data.shortWindow;
    this.longWindow = parsed.data.longWindow;
  }

  generateSignals(bars: readonly PriceBar[]): Signal[] {
    return generateSignals(bars, this.shortWindow, this.longWindow);
  }

  calculatePerformance(signals: readonly Signal[]): PerformanceSummary {
    return evaluatePerformance(signals);
  }

  /**
   * Signals plus their performance summary for one bar sequence
   */
  evaluate(bars: readonly PriceBar[], options: EvaluateOptions = {}): StrategyPerformance {
    if (options.requireSufficientData && bars.length < this.longWindow) {
      throw new InsufficientDataError(this.longWindow, bars.length, {
        shortWindow: this.shortWindow,
      });
    }

    logger.debug('Evaluating strategy', {
      strategy: this.name,
      shortWindow: this.shortWindow,
      longWindow: this.longWindow,
      barCount: bars.length,
    });

    const signals = this.generateSignals(bars);
    const summary = this.calculatePerformance(signals);

    LogHelpers.evaluation(logger, this.name, {
      barCount: bars.length,
      signalCount: signals.length,
      totalTrades: summary.totalTrades,
    });

    return {
      ...summary,
      shortWindow: this.shortWindow,
      longWindow: this.longWindow,
      barCount: bars.length,
      signals,
    };
  }
}
