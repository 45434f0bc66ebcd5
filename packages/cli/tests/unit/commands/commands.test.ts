import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { Command } from 'commander';
import { commandRegistry } from '../../../src/core/command-registry.js';
import { registerStrategyCommands } from '../../../src/commands/strategy.js';
import { registerIndicatorsCommands } from '../../../src/commands/indicators.js';
import { registerDataCommands } from '../../../src/commands/data.js';
import { makeTempDir, writeBarCsv } from '../../fixtures/bar-files.js';

function buildProgram(): Command {
  const program = new Command().name('crossbar').exitOverride();
  registerStrategyCommands(program);
  registerIndicatorsCommands(program);
  registerDataCommands(program);
  return program;
}

describe('command modules', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it('register every command in the registry', () => {
    expect(commandRegistry.getPackageCommands('strategy').map((c) => c.name)).toEqual([
      'performance',
      'signals',
    ]);
    expect(commandRegistry.getCommand('indicators', 'sma')).toBeDefined();
    expect(commandRegistry.getCommand('data', 'inspect')).toBeDefined();
  });

  it('register each commander group once', () => {
    const program = buildProgram();
    registerStrategyCommands(program);

    expect(program.commands.map((cmd) => cmd.name())).toEqual(['strategy', 'indicators', 'data']);
  });

  it('show registered examples in subcommand help', () => {
    const program = buildProgram();
    const inspect = program.commands
      .find((cmd) => cmd.name() === 'data')
      ?.commands.find((cmd) => cmd.name() === 'inspect');
    const written: string[] = [];

    inspect?.configureOutput({ writeOut: (text) => written.push(text) });
    inspect?.outputHelp();

    expect(inspect).toBeDefined();
    expect(written.join('')).toContain('\nExamples:\n  $ crossbar data inspect --file bars.csv\n');
  });

  it('run indicators sma end to end', async () => {
    const file = await writeBarCsv(dir, 'ramp.csv', [10, 20, 30]);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await buildProgram().parseAsync(
      ['indicators', 'sma', '--file', file, '--window', '2', '--format', 'csv'],
      { from: 'user' }
    );

    expect(log).toHaveBeenCalledWith(
      [
        'datetime,close,sma',
        '2024-01-01T00:00:00.000Z,10,',
        '2024-01-02T00:00:00.000Z,20,15',
        '2024-01-03T00:00:00.000Z,30,25',
      ].join('\n')
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('print insufficient data as an error', async () => {
    const file = await writeBarCsv(dir, 'short.csv', [10, 20, 30]);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await buildProgram().parseAsync(
      ['strategy', 'performance', '--file', file, '--short-window', '2', '--long-window', '4'],
      { from: 'user' }
    );

    expect(error).toHaveBeenCalledWith('Error: Insufficient data. Need at least 4 records.');
    expect(process.exitCode).toBe(1);
  });
});
