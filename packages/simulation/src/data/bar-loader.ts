/**
 * Bar File Loader
 *
 * Loads ticker records from a local CSV or JSON file, validates each row and
 * returns the valid bars in ascending timestamp order.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { bulkTickerSchema } from '@crossbar/core';
import type { TickerBar } from '@crossbar/core';
import { LogHelpers, NotFoundError, ValidationError } from '@crossbar/utils';
import { logger } from '../logger.js';
import { safeParseTickerBar, sortBarsByTimestamp } from '../validation/bar-validation.js';

export interface SkippedRow {
  /** 1-based position of the record in the file (header excluded) */
  row: number;
  reason: string;
}

export interface BarLoadResult {
  bars: TickerBar[];
  skipped: SkippedRow[];
}

export type BarFileFormat = 'csv' | 'json';

/**
 * Pick a parser from the file extension
 */
export function detectFormat(filePath: string): BarFileFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.json') return 'json';
  throw new ValidationError(`Unsupported bar file extension '${ext || '(none)'}'`, {
    file: filePath,
    supported: ['.csv', '.json'],
  });
}

/**
 * Parse CSV content with a header row into one record per line
 */
export function parseCsvRecords(content: string): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
      },
      (err, records: unknown) => {
        if (err) {
          reject(new ValidationError(`Malformed CSV: ${err.message}`, { code: err.code }));
        } else {
          resolve(Array.isArray(records) ? records : []);
        }
      }
    );
  });
}

/**
 * Parse JSON content: either an array of records or a `{ "data": [...] }` bulk payload
 */
export function parseJsonRecords(content: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (Array.isArray(parsed)) {
    return parsed;
  }

  const bulk = bulkTickerSchema.safeParse(parsed);
  if (bulk.success) {
    return bulk.data.data;
  }

  throw new ValidationError('JSON bar file must be an array or an object with a "data" array');
}

/**
 * Validate raw records and sort the survivors by timestamp
 */
export function buildBars(records: readonly unknown[]): BarLoadResult {
  const bars: TickerBar[] = [];
  const skipped: SkippedRow[] = [];

  records.forEach((record, idx) => {
    const result = safeParseTickerBar(record);
    if (result.success) {
      bars.push(result.bar);
    } else {
      skipped.push({ row: idx + 1, reason: result.reason });
      logger.warn('Skipping invalid ticker record', { row: idx + 1, reason: result.reason });
    }
  });

  return { bars: sortBarsByTimestamp(bars), skipped };
}

/**
 * Load bars from a CSV or JSON file
 *
 * @throws NotFoundError when the file does not exist
 * @throws ValidationError for unsupported or malformed files
 */
export async function loadBarsFromFile(filePath: string): Promise<BarLoadResult> {
  const resolved = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  const format = detectFormat(resolved);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError('Bar file', filePath);
    }
    throw error;
  }

  const records = format === 'csv' ? await parseCsvRecords(content) : parseJsonRecords(content);
  const result = buildBars(records);

  LogHelpers.fileLoad(logger, filePath, result.bars.length, result.skipped.length, { format });
  return result;
}
