/**
 * Indicator Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { executeRegistered } from '../core/execute.js';
import { indicatorsSmaSchema } from '../command-defs/indicators.js';
import { smaHandler } from '../handlers/indicators/sma.js';

/**
 * Register indicator commands
 */
export function registerIndicatorsCommands(program: Command): void {
  if (program.commands.find((cmd) => cmd.name() === 'indicators')) {
    return;
  }

  const indicatorsCmd = program.command('indicators').description('Price indicators');

  indicatorsCmd
    .command('sma')
    .description('Simple moving average of closing prices')
    .requiredOption('--file <path>', 'Bar file (.csv or .json)')
    .requiredOption('--window <n>', 'Moving-average window')
    .option('--format <format>', 'Output format (table, json, csv)', 'table')
    .addHelpText('after', () => commandRegistry.generateExamplesHelp('indicators', 'sma'))
    .action(async (options: Record<string, unknown>) => {
      await executeRegistered('indicators', 'sma', options);
    });
}

export const indicatorsModule: PackageCommandModule = {
  packageName: 'indicators',
  description: 'Price indicators',
  commands: [
    {
      name: 'sma',
      description: 'Simple moving average of closing prices',
      schema: indicatorsSmaSchema,
      handler: smaHandler,
      examples: ['crossbar indicators sma --file bars.csv --window 10'],
    },
  ],
};

commandRegistry.registerPackage(indicatorsModule);
