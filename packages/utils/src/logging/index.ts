/**
 * Package-aware logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@crossbar/utils';
 *
 * const logger = createPackageLogger('@crossbar/simulation');
 * logger.info('Strategy evaluated', { shortWindow: 10, longWindow: 20 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log a completed strategy evaluation
   */
  static evaluation(
    logger: Logger,
    strategy: string,
    result: { barCount: number; signalCount: number; totalTrades: number },
    context?: LogContext
  ): void {
    logger.info('Strategy Evaluated', { strategy, ...result, ...context });
  }

  /**
   * Log a bulk file load
   */
  static fileLoad(
    logger: Logger,
    file: string,
    loaded: number,
    skipped: number,
    context?: LogContext
  ): void {
    const level = skipped > 0 ? 'warn' : 'debug';
    logger[level]('Bars Loaded', { file, loaded, skipped, ...context });
  }

  /**
   * Log performance metric
   */
  static performance(
    logger: Logger,
    operation: string,
    duration: number,
    success: boolean,
    context?: LogContext
  ): void {
    logger.debug('Performance Metric', { operation, duration, success, ...context });
  }
}
