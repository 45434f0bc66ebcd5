/**
 * Handler for data inspect command
 *
 * Summarises a bar file: how many rows loaded, the time span, and which rows were skipped.
 */

import { loadBarsFromFile, validateBarSequence, type SkippedRow } from '@crossbar/simulation';
import type { DataInspectArgs } from '../../command-defs/data.js';
import { toIsoString } from '../serialize.js';

export interface InspectBarsResult {
  file: string;
  barCount: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  skippedCount: number;
  skipped: SkippedRow[];
  sequenceValid: boolean;
}

export async function inspectBarsHandler(args: DataInspectArgs): Promise<InspectBarsResult> {
  const { bars, skipped } = await loadBarsFromFile(args.file);
  const first = bars.length > 0 ? bars[0] : undefined;
  const last = bars.length > 0 ? bars[bars.length - 1] : undefined;

  return {
    file: args.file,
    barCount: bars.length,
    firstTimestamp: first ? toIsoString(first.timestamp) : null,
    lastTimestamp: last ? toIsoString(last.timestamp) : null,
    skippedCount: skipped.length,
    skipped,
    sequenceValid: validateBarSequence(bars).valid,
  };
}
