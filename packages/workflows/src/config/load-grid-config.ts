/**
 * Grid build configuration loader
 *
 * Reads the YAML configuration, validates it, loads the grid (inline `grid:`
 * mapping or `runs.grid_filename`) and resolves everything into one
 * GridBuildConfig.
 */

import { resolve } from 'path';
import {
  parseGridConfigFile,
  parseGridDocument,
  resolveGridBuildConfig,
  type GridBuildConfig,
  type GridConfigFile,
} from '@stellar-grid/core';
import { ConfigurationError, loadYamlFile, logger, resolveConfigPath } from '@stellar-grid/utils';

export interface LoadGridConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Relative paths in the file resolve against this directory (default: cwd) */
  baseDir?: string;
}

export interface LoadedGridConfig {
  readonly configPath: string;
  readonly file: GridConfigFile;
  readonly config: GridBuildConfig;
}

function gridDocument(file: GridConfigFile, configPath: string, baseDir: string): unknown {
  if (file.grid !== undefined && file.grid !== null) {
    if (file.runs.grid_filename) {
      throw new ConfigurationError(
        `${configPath} declares both an inline grid and runs.grid_filename`,
        'runs.grid_filename'
      );
    }
    return file.grid;
  }
  if (file.runs.grid_filename) {
    return loadYamlFile(resolve(baseDir, file.runs.grid_filename));
  }
  throw new ConfigurationError(
    `${configPath} has no grid: set runs.grid_filename or add a top-level grid mapping`,
    'runs.grid_filename'
  );
}

export function loadGridConfig(
  configPath?: string,
  options: LoadGridConfigOptions = {}
): LoadedGridConfig {
  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? process.cwd();
  const path = resolveConfigPath(configPath, env);

  const file = parseGridConfigFile(loadYamlFile(path), path);
  const axes = parseGridDocument(gridDocument(file, path, baseDir));
  const config = resolveGridBuildConfig(file, axes, { baseDir, env });

  logger.debug('Resolved grid configuration', {
    configPath: path,
    axes: axes.map((a) => a.name),
    manager: config.manager.backend.kind,
  });
  return { configPath: path, file, config };
}

export function loadGridBuildConfig(
  configPath?: string,
  options: LoadGridConfigOptions = {}
): GridBuildConfig {
  return loadGridConfig(configPath, options).config;
}
