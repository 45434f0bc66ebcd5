/**
 * @crossbar/cli - Command-line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/validation-pipeline.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/execute.js';
export * from './types/index.js';

export { registerStrategyCommands, strategyModule } from './commands/strategy.js';
export { registerIndicatorsCommands, indicatorsModule } from './commands/indicators.js';
export { registerDataCommands, dataModule } from './commands/data.js';
