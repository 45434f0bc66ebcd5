/**
 * @crossbar/simulation
 * ====================
 * Moving-average crossover engine: indicators, signals, performance, bar loading.
 */

export * from './indicators/index.js';
export * from './signals/index.js';
export * from './performance/index.js';
export * from './strategies/index.js';
export * from './data/index.js';
export * from './validation/bar-validation.js';
export { logger } from './logger.js';
