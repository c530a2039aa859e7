/**
 * Config Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { commandRegistry } from '../core/command-registry.js';
import { showConfigSchema } from '../command-defs/config.js';
import { showConfigHandler } from './config/show-config.js';

export function registerConfigCommands(program: Command): void {
  const configCmd = program.command('config').description('Inspect configuration');

  const showCmd = configCmd
    .command('show')
    .description('Print the resolved configuration and the log directory')
    .option('--config <path>', 'Configuration file')
    .option('--format <format>', 'Output format (json, table, csv)', 'json');

  defineCommand(showCmd, { name: 'show', packageName: 'config', onError: die });
}

const configModule: PackageCommandModule = {
  packageName: 'config',
  description: 'Inspect configuration',
  commands: [
    {
      name: 'show',
      description: 'Print the resolved configuration and the log directory',
      schema: showConfigSchema,
      handler: showConfigHandler,
      examples: ['stellar-grid config show --config grid-config.yaml'],
    },
  ],
};

commandRegistry.registerPackage(configModule);
