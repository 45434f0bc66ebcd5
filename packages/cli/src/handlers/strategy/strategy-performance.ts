/**
 * Handler for strategy performance command
 *
 * Loads bars, runs the moving-average crossover and reports the trade summary.
 * Fewer bars than the long window is an error here, not an empty report.
 */

import { MovingAverageCrossoverStrategy, loadBarsFromFile } from '@crossbar/simulation';
import type { StrategyPerformanceArgs } from '../../command-defs/strategy.js';
import { toPerformanceReport, type PerformanceReport } from '../serialize.js';

export async function strategyPerformanceHandler(
  args: StrategyPerformanceArgs
): Promise<PerformanceReport> {
  const strategy = new MovingAverageCrossoverStrategy({
    shortWindow: args.shortWindow,
    longWindow: args.longWindow,
  });

  const { bars } = await loadBarsFromFile(args.file);
  const performance = strategy.evaluate(bars, { requireSufficientData: true });

  return toPerformanceReport(strategy.name, performance);
}
