/**
 * Handler for strategy signals command
 */

import { MovingAverageCrossoverStrategy, loadBarsFromFile } from '@crossbar/simulation';
import type { StrategySignalsArgs } from '../../command-defs/strategy.js';
import { toSignalRow, type SignalRow } from '../serialize.js';

export async function strategySignalsHandler(args: StrategySignalsArgs): Promise<SignalRow[]> {
  const strategy = new MovingAverageCrossoverStrategy({
    shortWindow: args.shortWindow,
    longWindow: args.longWindow,
  });

  const { bars } = await loadBarsFromFile(args.file);
  return strategy.generateSignals(bars).map(toSignalRow);
}
