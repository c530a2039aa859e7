/**
 * @stellar-grid/cli - command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './types/index.js';

export { registerGridCommands } from './commands/grid.js';
export { registerCatalogCommands } from './commands/catalog.js';
export { registerConfigCommands } from './commands/config.js';
