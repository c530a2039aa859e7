/**
 * Grid Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { coerceBoolean, coerceNumber } from '../core/coerce.js';
import { commandRegistry } from '../core/command-registry.js';
import { buildGridSchema, listGridSchema } from '../command-defs/grid.js';
import { buildGridHandler } from './grid/build-grid.js';
import { listGridHandler } from './grid/list-grid.js';

type GridRawOptions = {
  config?: string;
  overwrite?: unknown;
  jobs?: unknown;
  parallel?: unknown;
  format?: string;
};

const CONFIG_HELP = 'Configuration file (default: $STELLAR_GRID_CONFIG, then ./grid-config.yaml)';

function coerceJobOptions(raw: GridRawOptions): GridRawOptions {
  return {
    ...raw,
    jobs: coerceNumber(raw.jobs, 'jobs'),
    parallel: coerceNumber(raw.parallel, 'parallel'),
  };
}

export function registerGridCommands(program: Command): void {
  const gridCmd = program.command('grid').description('Build and inspect parameter grids');

  const buildCmd = gridCmd
    .command('build')
    .description('Materialize every run, write job scripts and fill the catalog')
    .option('--config <path>', CONFIG_HELP)
    .option('--overwrite', 'Replace existing run directories')
    .option('--jobs <n>', 'Override manager.number_of_jobs')
    .option('--parallel <n>', 'Override manager.number_of_parallel_jobs')
    .option('--format <format>', 'Output format (table, json, csv)', 'table');

  defineCommand(buildCmd, {
    name: 'build',
    packageName: 'grid',
    coerce: (raw: GridRawOptions) => ({
      ...coerceJobOptions(raw),
      overwrite: coerceBoolean(raw.overwrite, 'overwrite'),
    }),
    onError: die,
  });

  const listCmd = gridCmd
    .command('list')
    .description('Show the planned runs and their job assignment without writing anything')
    .option('--config <path>', CONFIG_HELP)
    .option('--jobs <n>', 'Override manager.number_of_jobs')
    .option('--parallel <n>', 'Override manager.number_of_parallel_jobs')
    .option('--format <format>', 'Output format (table, json, csv)', 'table');

  defineCommand(listCmd, {
    name: 'list',
    packageName: 'grid',
    coerce: coerceJobOptions,
    onError: die,
  });
}

const gridModule: PackageCommandModule = {
  packageName: 'grid',
  description: 'Build and inspect parameter grids',
  commands: [
    {
      name: 'build',
      description: 'Materialize every run, write job scripts and fill the catalog',
      schema: buildGridSchema,
      handler: buildGridHandler,
      examples: [
        'stellar-grid grid build',
        'stellar-grid grid build --config grid-config.yaml --jobs 4 --parallel 2',
        'stellar-grid grid build --overwrite --format json',
      ],
    },
    {
      name: 'list',
      description: 'Show the planned runs and their job assignment',
      schema: listGridSchema,
      handler: listGridHandler,
      examples: ['stellar-grid grid list --format csv'],
    },
  ],
};

commandRegistry.registerPackage(gridModule);
