/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and strategy defaults.
 */

import * as path from 'path';
import { ConfigurationError } from '../errors.js';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

export interface StrategyConfig {
  shortWindow: number;
  longWindow: number;
}

export const DEFAULT_SHORT_WINDOW = 10;
export const DEFAULT_LONG_WINDOW = 20;

/**
 * Read a positive integer from the environment, falling back to a default
 */
function readPositiveInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${key} must be a positive integer, got '${raw}'`, key, {
      value: raw,
    });
  }
  return value;
}

/**
 * Load logging configuration from environment variables
 */
export function getLoggingConfig(): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } =
    process.env;

  return {
    level: LOG_LEVEL || (NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: LOG_CONSOLE !== 'false',
    // Opt-in
    enableFile: LOG_FILE === 'true',
    logDir: LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
  };
}

/**
 * Load default strategy windows
 */
export function getStrategyConfig(): StrategyConfig {
  return {
    shortWindow: readPositiveInt('CROSSBAR_SHORT_WINDOW', DEFAULT_SHORT_WINDOW),
    longWindow: readPositiveInt('CROSSBAR_LONG_WINDOW', DEFAULT_LONG_WINDOW),
  };
}
