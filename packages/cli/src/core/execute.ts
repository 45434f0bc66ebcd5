/**
 * Universal Command Executor
 *
 * Handles the universal steps every command shares:
 * - Normalize options
 * - Parse arguments (Zod validation)
 * - Call handler
 * - Format output
 * - Error handling
 */

import { z } from 'zod';
import { LogHelpers, NotFoundError, logger } from '@crossbar/utils';
import { validateAndCoerceArgs } from './validation-pipeline.js';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { commandRegistry } from './command-registry.js';
import { outputFormatSchema } from '../command-defs/shared.js';
import type { CommandDefinition } from '../types/index.js';

const formatOptionSchema = z.object({ format: outputFormatSchema });

export interface ExecuteIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const consoleIO: ExecuteIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/**
 * Find package name for a command by searching the registry
 */
function findPackageName(commandDef: CommandDefinition): string | undefined {
  for (const pkg of commandRegistry.getPackages()) {
    if (pkg.commands.includes(commandDef)) {
      return pkg.packageName;
    }
  }
  return undefined;
}

/**
 * Execute a command definition with raw Commander.js options
 *
 * Errors are reported on stderr and set a non-zero exit code; they are not rethrown.
 */
export async function execute(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  io: ExecuteIO = consoleIO
): Promise<void> {
  const packageName = findPackageName(commandDef);
  const fullCommandName = packageName ? `${packageName}.${commandDef.name}` : commandDef.name;

  const startedAt = Date.now();
  let success = false;

  try {
    // 1. Normalize and validate arguments
    const args = validateAndCoerceArgs(commandDef.schema, rawOptions);

    // 2. Format is a CLI concern, not a handler concern
    const { format } = formatOptionSchema.parse(args);

    // 3. Call handler (pure use-case function)
    logger.debug('Running command', { command: fullCommandName });
    const result = await commandDef.handler(args);

    // 4. Format and print output
    io.stdout(formatOutput(result, format));
    success = true;
  } catch (error) {
    const message = handleError(error, { command: fullCommandName });
    io.stderr(`Error: ${message}`);
    process.exitCode = 1;
  } finally {
    LogHelpers.performance(logger, fullCommandName, Date.now() - startedAt, success);
  }
}

/**
 * Look up a registered command and execute it
 */
export async function executeRegistered(
  packageName: string,
  commandName: string,
  rawOptions: Record<string, unknown>,
  io?: ExecuteIO
): Promise<void> {
  const commandDef = commandRegistry.getCommand(packageName, commandName);
  if (!commandDef) {
    throw new NotFoundError('Command', `${packageName}.${commandName}`);
  }
  await execute(commandDef, rawOptions, io);
}
