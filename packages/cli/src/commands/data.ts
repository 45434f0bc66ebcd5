/**
 * Data Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { executeRegistered } from '../core/execute.js';
import { dataInspectSchema } from '../command-defs/data.js';
import { inspectBarsHandler } from '../handlers/data/inspect-bars.js';

/**
 * Register data commands
 */
export function registerDataCommands(program: Command): void {
  if (program.commands.find((cmd) => cmd.name() === 'data')) {
    return;
  }

  const dataCmd = program.command('data').description('Bar file utilities');

  dataCmd
    .command('inspect')
    .description('Load a bar file and report its span and skipped rows')
    .requiredOption('--file <path>', 'Bar file (.csv or .json)')
    .option('--format <format>', 'Output format (table, json, csv)', 'table')
    .addHelpText('after', () => commandRegistry.generateExamplesHelp('data', 'inspect'))
    .action(async (options: Record<string, unknown>) => {
      await executeRegistered('data', 'inspect', options);
    });
}

export const dataModule: PackageCommandModule = {
  packageName: 'data',
  description: 'Bar file utilities',
  commands: [
    {
      name: 'inspect',
      description: 'Load a bar file and report its span and skipped rows',
      schema: dataInspectSchema,
      handler: inspectBarsHandler,
      examples: ['crossbar data inspect --file bars.csv'],
    },
  ],
};

commandRegistry.registerPackage(dataModule);
