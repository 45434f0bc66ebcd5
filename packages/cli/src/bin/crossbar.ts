#!/usr/bin/env tsx

/**
 * Crossbar CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported.
 * registerXCommands functions add Commander options and wire them to execute(),
 * which runs the handler from the registry.
 */

import 'dotenv/config';
import { program } from 'commander';
import { logger } from '@crossbar/utils';
import { handleError } from '../core/error-handler.js';
import { registerStrategyCommands } from '../commands/strategy.js';
import { registerIndicatorsCommands } from '../commands/indicators.js';
import { registerDataCommands } from '../commands/data.js';

program
  .name('crossbar')
  .description('Moving-average crossover signals and performance over local bar files')
  .version('1.0.0');

registerStrategyCommands(program);
registerIndicatorsCommands(program);
registerDataCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exitCode = 1;
});

export { program };
