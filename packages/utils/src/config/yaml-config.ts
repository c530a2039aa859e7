/**
 * YAML Configuration Loader
 * =========================
 * Reads YAML documents from disk. Parsed documents are cached by absolute
 * path so the CLI and the workflows read each file once per process.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { load, YAMLException } from 'js-yaml';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_CONFIG_FILENAME = 'grid-config.yaml';
export const CONFIG_PATH_ENV = 'STELLAR_GRID_CONFIG';

const cache = new Map<string, unknown>();

/**
 * Load and parse a YAML file. Missing files and syntax errors raise ConfigurationError.
 */
export function loadYamlFile(filePath: string): unknown {
  const absolutePath = resolve(filePath);
  if (cache.has(absolutePath)) {
    return cache.get(absolutePath);
  }

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Configuration file not found: ${absolutePath}`, 'path', {
      path: absolutePath,
    });
  }

  let document: unknown;
  try {
    document = load(readFileSync(absolutePath, 'utf-8'), { filename: absolutePath });
  } catch (error) {
    const reason = error instanceof YAMLException ? error.reason : String(error);
    throw new ConfigurationError(`Invalid YAML in ${absolutePath}: ${reason}`, 'path', {
      path: absolutePath,
    });
  }

  logger.debug('Loaded YAML document', { path: absolutePath });
  cache.set(absolutePath, document);
  return document;
}

/**
 * Config path priority: explicit argument > STELLAR_GRID_CONFIG > ./grid-config.yaml
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return resolve(explicitPath || env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_FILENAME);
}

/**
 * Clear cached documents (tests rewrite files between cases)
 */
export function clearConfigCache(): void {
  cache.clear();
}
