/**
 * Catalog Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { coerceNumber } from '../core/coerce.js';
import { commandRegistry } from '../core/command-registry.js';
import { listCatalogSchema } from '../command-defs/catalog.js';
import { listCatalogHandler } from './catalog/list-catalog.js';

type CatalogRawOptions = {
  config?: string;
  job?: unknown;
  status?: string;
  format?: string;
};

export function registerCatalogCommands(program: Command): void {
  const catalogCmd = program.command('catalog').description('Inspect the run catalog');

  const listCmd = catalogCmd
    .command('list')
    .description('Print catalog rows in id order')
    .option('--config <path>', 'Configuration file naming the catalog database')
    .option('--job <n>', 'Only rows of this job')
    .option('--status <status>', "Only rows with this status (e.g. 'not computed')")
    .option('--format <format>', 'Output format (table, json, csv)', 'table');

  defineCommand(listCmd, {
    name: 'list',
    packageName: 'catalog',
    coerce: (raw: CatalogRawOptions) => ({ ...raw, job: coerceNumber(raw.job, 'job') }),
    onError: die,
  });
}

const catalogModule: PackageCommandModule = {
  packageName: 'catalog',
  description: 'Inspect the run catalog',
  commands: [
    {
      name: 'list',
      description: 'Print catalog rows in id order',
      schema: listCatalogSchema,
      handler: listCatalogHandler,
      examples: ['stellar-grid catalog list --job 0', "stellar-grid catalog list --status 'not computed'"],
    },
  ],
};

commandRegistry.registerPackage(catalogModule);
