/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@crossbar/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Normalize Commander.js options to a flat object
 *
 * Keys are never renamed: Commander already converts --short-window to shortWindow.
 * Only values are normalized:
 * - String "true"/"false" → boolean
 * - Pure numeric strings → number
 * - undefined/null → dropped
 * - All other values → preserved as-is
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (typeof value !== 'string') {
      normalized[key] = value;
      continue;
    }

    if (value === 'true') {
      normalized[key] = true;
    } else if (value === 'false') {
      normalized[key] = false;
    } else if (value.trim() !== '' && String(Number(value)) === value.trim()) {
      // Only pure numbers; file paths such as "2024.csv" stay strings
      normalized[key] = Number(value);
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
