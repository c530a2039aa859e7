#!/usr/bin/env node

/**
 * stellar-grid CLI entry point
 *
 * Command modules register themselves in commandRegistry when imported;
 * the register functions add the Commander options and wire them to the
 * registered handlers.
 */

import 'dotenv/config';
import { program } from 'commander';
import { logger } from '@stellar-grid/utils';
import { die } from '../core/cliErrors.js';
import { registerGridCommands } from '../commands/grid.js';
import { registerCatalogCommands } from '../commands/catalog.js';
import { registerConfigCommands } from '../commands/config.js';

program
  .name('stellar-grid')
  .description('Expand stellar-evolution parameter grids into runs, job scripts and a catalog')
  .version('0.1.0');

registerGridCommands(program);
registerCatalogCommands(program);
registerConfigCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    die(error);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
