/**
 * Ticker Record Schemas
 *
 * Zod schemas for raw ticker rows (bulk files, JSON payloads) and strategy windows.
 */

import { z } from 'zod';
import { DateTime } from 'luxon';
import type { TickerBar } from './types.js';

/**
 * True when `value` has no more than `places` decimal digits
 */
export function hasAtMostDecimals(value: number, places: number): boolean {
  const scaled = value * 10 ** places;
  return Math.abs(scaled - Math.round(scaled)) < 1e-6;
}

/**
 * Parse an ISO-8601 (or SQL-style `YYYY-MM-DD HH:mm:ss`) timestamp as UTC
 */
export function parseBarTimestamp(value: string | Date): DateTime {
  if (value instanceof Date) {
    return DateTime.fromJSDate(value, { zone: 'utc' });
  }
  const trimmed = value.trim();
  const iso = DateTime.fromISO(trimmed, { zone: 'utc' });
  return iso.isValid ? iso : DateTime.fromSQL(trimmed, { zone: 'utc' });
}

const timestampSchema = z.union([z.string().min(1, 'datetime is required'), z.date()]).transform(
  (value, ctx) => {
    const parsed = parseBarTimestamp(value);
    if (!parsed.isValid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid datetime: ${value instanceof Date ? 'Invalid Date' : value}`,
      });
      return z.NEVER;
    }
    return parsed;
  }
);

// Numbers from JSON or numeric strings from CSV; booleans and nulls never coerce
const numericSchema = z.union([z.number(), z.string()], {
  errorMap: () => ({ message: 'Expected a number' }),
});

const priceSchema = numericSchema.pipe(
  z.coerce
    .number()
    .positive()
    .refine((value) => hasAtMostDecimals(value, 2), {
      message: 'Price must have at most 2 decimal places',
    })
);

/**
 * Raw ticker row → TickerBar
 *
 * Numeric fields accept JSON numbers or numeric CSV strings.
 */
export const tickerBarSchema = z
  .object({
    datetime: timestampSchema,
    open: priceSchema,
    high: priceSchema,
    low: priceSchema,
    close: priceSchema,
    volume: numericSchema.pipe(z.coerce.number().int().positive()),
  })
  .refine((row) => row.high >= row.low, {
    message: 'high must be >= low',
    path: ['high'],
  })
  .transform(
    (row): TickerBar => ({
      timestamp: row.datetime,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    })
  );

/**
 * Bulk payload: `{ "data": [...] }`
 */
export const bulkTickerSchema = z.object({
  data: z.array(z.unknown()),
});

export const windowSchema = z.number().int().positive();

export const strategyWindowsSchema = z.object({
  shortWindow: windowSchema,
  longWindow: windowSchema,
});
