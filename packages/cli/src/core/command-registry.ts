/**
 * Command Registry - Command lookup and help text
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@crossbar/utils';

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    for (const command of module.commands) {
      this.validateCommand(command);
    }

    this.packages.set(module.packageName, module);

    for (const command of module.commands) {
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  /**
   * Get all commands for a package
   */
  getPackageCommands(packageName: string): CommandDefinition[] {
    const module = this.packages.get(packageName);
    return module?.commands ?? [];
  }

  /**
   * Get all registered packages
   */
  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Examples block appended to a command's --help output
   */
  generateExamplesHelp(packageName: string, commandName: string): string {
    const examples = this.getCommand(packageName, commandName)?.examples ?? [];
    if (examples.length === 0) {
      return '';
    }
    return ['', 'Examples:', ...examples.map((example) => `  $ ${example}`)].join('\n');
  }

  /**
   * Validate command structure
   */
  validateCommand(command: CommandDefinition): void {
    if (!command.name.trim()) {
      throw new ValidationError('Command name must be a non-empty string', {
        command: command.name,
      });
    }

    if (!command.description.trim()) {
      throw new ValidationError('Command description must be a non-empty string', {
        command: command.name,
      });
    }
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
