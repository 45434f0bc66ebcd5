/**
 * Bar Data Validation
 *
 * Validates raw ticker rows and bar sequences before they reach the crossover engine.
 */

import type { z } from 'zod';
import { tickerBarSchema } from '@crossbar/core';
import type { PriceBar, TickerBar } from '@crossbar/core';
import { ValidationError } from '@crossbar/utils';

export interface ValidationResult {
  valid: boolean;
  error?: 'non_monotonic_timestamps' | 'non_positive_close';
  /** Index of the first offending bar */
  index?: number;
}

export type TickerParseResult =
  | { success: true; bar: TickerBar }
  | { success: false; reason: string };

/**
 * Render zod issues as `field: message` pairs
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate one raw row without throwing
 */
export function safeParseTickerBar(raw: unknown): TickerParseResult {
  const result = tickerBarSchema.safeParse(raw);
  if (result.success) {
    return { success: true, bar: result.data };
  }
  return { success: false, reason: formatIssues(result.error.issues) };
}

/**
 * Validate one raw row
 *
 * @throws ValidationError listing every failing field
 */
export function parseTickerBar(raw: unknown): TickerBar {
  const result = tickerBarSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ticker record: ${formatIssues(result.error.issues)}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Check the ordering and price assumptions the engine makes about its input.
 * Equal neighbouring timestamps are allowed.
 */
export function validateBarSequence(bars: readonly PriceBar[]): ValidationResult {
  for (let i = 0; i < bars.length; i++) {
    if (!(bars[i].close > 0)) {
      return { valid: false, error: 'non_positive_close', index: i };
    }
    if (i > 0 && bars[i].timestamp.toMillis() < bars[i - 1].timestamp.toMillis()) {
      return { valid: false, error: 'non_monotonic_timestamps', index: i };
    }
  }
  return { valid: true };
}

/**
 * Sort bars by timestamp (ascending), keeping the input order of ties.
 * Returns sorted copy, original unchanged
 */
export function sortBarsByTimestamp<T extends PriceBar>(bars: readonly T[]): T[] {
  return [...bars].sort((a, b) => a.timestamp.toMillis() - b.timestamp.toMillis());
}
