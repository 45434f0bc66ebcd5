/**
 * Strategy Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { executeRegistered } from '../core/execute.js';
import { strategyPerformanceSchema, strategySignalsSchema } from '../command-defs/strategy.js';
import { strategyPerformanceHandler } from '../handlers/strategy/strategy-performance.js';
import { strategySignalsHandler } from '../handlers/strategy/strategy-signals.js';

/**
 * Register strategy commands
 */
export function registerStrategyCommands(program: Command): void {
  if (program.commands.find((cmd) => cmd.name() === 'strategy')) {
    return;
  }

  const strategyCmd = program.command('strategy').description('Moving-average crossover strategy');

  strategyCmd
    .command('performance')
    .description('Evaluate crossover signals and summarise the resulting trades')
    .requiredOption('--file <path>', 'Bar file (.csv or .json)')
    .option('--short-window <n>', 'Short moving-average window')
    .option('--long-window <n>', 'Long moving-average window')
    .option('--format <format>', 'Output format (table, json, csv)', 'table')
    .addHelpText('after', () => commandRegistry.generateExamplesHelp('strategy', 'performance'))
    .action(async (options: Record<string, unknown>) => {
      await executeRegistered('strategy', 'performance', options);
    });

  strategyCmd
    .command('signals')
    .description('List BUY/SELL crossover signals')
    .requiredOption('--file <path>', 'Bar file (.csv or .json)')
    .option('--short-window <n>', 'Short moving-average window')
    .option('--long-window <n>', 'Long moving-average window')
    .option('--format <format>', 'Output format (table, json, csv)', 'table')
    .addHelpText('after', () => commandRegistry.generateExamplesHelp('strategy', 'signals'))
    .action(async (options: Record<string, unknown>) => {
      await executeRegistered('strategy', 'signals', options);
    });
}

// Register command module (side effect)
export const strategyModule: PackageCommandModule = {
  packageName: 'strategy',
  description: 'Moving-average crossover strategy',
  commands: [
    {
      name: 'performance',
      description: 'Evaluate crossover signals and summarise the resulting trades',
      schema: strategyPerformanceSchema,
      handler: strategyPerformanceHandler,
      examples: [
        'crossbar strategy performance --file bars.csv',
        'crossbar strategy performance --file bars.json --short-window 5 --long-window 15 --format json',
      ],
    },
    {
      name: 'signals',
      description: 'List BUY/SELL crossover signals',
      schema: strategySignalsSchema,
      handler: strategySignalsHandler,
      examples: ['crossbar strategy signals --file bars.csv --format csv'],
    },
  ],
};

commandRegistry.registerPackage(strategyModule);
