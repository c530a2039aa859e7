/**
 * Command Context - lazy service creation
 *
 * Not a framework: an object that knows how to load configuration and open
 * the catalog, so command handlers never construct services themselves.
 * Overrides replace individual services in tests.
 */

import type { DatabaseConfig, GridBuildConfig } from '@stellar-grid/core';
import { SqliteRunCatalog, type RunCatalogPort } from '@stellar-grid/storage';
import { getLogDirectory } from '@stellar-grid/utils';
import {
  createProductionGridContext,
  loadGridConfig,
  type GridContext,
  type LoadedGridConfig,
} from '@stellar-grid/workflows';

export interface CatalogOpenOptions {
  readOnly?: boolean;
}

/**
 * Services available in command context
 */
export interface CommandServices {
  loadConfig(configPath?: string): LoadedGridConfig;
  catalog(database: DatabaseConfig, options?: CatalogOpenOptions): RunCatalogPort;
  gridContext(config: GridBuildConfig): GridContext;
  logDirectory(): string;
}

export interface CommandContextOptions {
  /**
   * Environment used for config lookup and MESA fallbacks (default: process.env)
   */
  env?: NodeJS.ProcessEnv;
  /**
   * Directory relative config paths resolve against (default: process.cwd())
   */
  cwd?: string;
  catalogOverride?: (database: DatabaseConfig, options: CatalogOpenOptions) => RunCatalogPort;
  gridContextOverride?: (config: GridBuildConfig) => GridContext;
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    const env = this._options.env ?? process.env;
    const baseDir = this._options.cwd ?? process.cwd();

    return {
      loadConfig: (configPath) => loadGridConfig(configPath, { env, baseDir }),
      catalog: (database, options = {}) =>
        this._options.catalogOverride?.(database, options) ??
        new SqliteRunCatalog(database, { readOnly: options.readOnly }),
      gridContext: (config) =>
        this._options.gridContextOverride?.(config) ?? createProductionGridContext(config),
      logDirectory: () => getLogDirectory(),
    };
  }
}
