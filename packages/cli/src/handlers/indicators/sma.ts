/**
 * Handler for indicators sma command
 */

import { computeMovingAverage, loadBarsFromFile } from '@crossbar/simulation';
import type { IndicatorsSmaArgs } from '../../command-defs/indicators.js';
import { toIsoString } from '../serialize.js';

export interface SmaRow {
  datetime: string;
  close: number;
  /** null until `window` bars are available */
  sma: number | null;
}

export async function smaHandler(args: IndicatorsSmaArgs): Promise<SmaRow[]> {
  const { bars } = await loadBarsFromFile(args.file);
  const series = computeMovingAverage(
    bars.map((bar) => bar.close),
    args.window
  );

  return bars.map((bar, i) => ({
    datetime: toIsoString(bar.timestamp),
    close: bar.close,
    sma: series[i] ?? null,
  }));
}
