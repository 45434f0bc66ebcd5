/**
 * Error Handler - User-facing messages; credentials are kept out of the logs
 */

import { handleError as reportError } from '@crossbar/utils';

/**
 * Patterns for context entries that should never reach the logs
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

/**
 * Check if a string contains sensitive information
 */
export function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Format error for user display
 *
 * Messages are shown as written: a missing `tokens.csv` must still name the file.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unexpected error occurred';
}

/**
 * Redact context values that look like credentials before they reach the logs
 */
export function sanitizeContext(context?: Record<string, unknown>): Record<string, unknown> {
  if (!context) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => [
      key,
      containsSensitiveInfo(`${key} ${String(value)}`) ? '[REDACTED]' : value,
    ])
  );
}

/**
 * Log the full error and return the message to show the user
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  reportError(error, sanitizeContext(context));
  return formatError(error);
}
