/**
 * Command Registry - command lookup by package and name
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@stellar-grid/utils';

export class CommandRegistry {
  private packages: Set<string> = new Set();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module. Nothing is registered when any of
   * its commands is invalid or duplicated.
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    const entries = new Map<string, CommandDefinition>();
    for (const command of module.commands) {
      this.validateCommand(command);
      const fullName = `${module.packageName}.${command.name}`;
      if (entries.has(fullName) || this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      entries.set(fullName, command);
    }

    for (const [fullName, command] of entries) {
      this.commands.set(fullName, command);
    }
    this.packages.add(module.packageName);
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

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
