/**
 * Unit tests for the YAML configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  ConfigurationError,
  clearConfigCache,
  loadYamlFile,
  resolveConfigPath,
} from '../../src/index.js';

describe('yaml-config', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'stellar-grid-yaml-'));
  });

  afterEach(async () => {
    clearConfigCache();
    await rm(root, { recursive: true, force: true });
  });

  it('should parse a document and cache it by path', async () => {
    const path = join(root, 'grid.yaml');
    await writeFile(path, 'm1: [10.0, 20]\nname: test\n');

    expect(loadYamlFile(path)).toEqual({ m1: [10, 20], name: 'test' });

    await writeFile(path, 'm1: [1]\n');
    expect(loadYamlFile(path)).toEqual({ m1: [10, 20], name: 'test' });

    clearConfigCache();
    expect(loadYamlFile(path)).toEqual({ m1: [1] });
  });

  it('should reject missing files', () => {
    const path = join(root, 'missing.yaml');

    expect(() => loadYamlFile(path)).toThrow(ConfigurationError);
    expect(() => loadYamlFile(path)).toThrow(`Configuration file not found: ${path}`);
  });

  it('should reject invalid YAML', async () => {
    const path = join(root, 'broken.yaml');
    await writeFile(path, 'grid: [1, 2\n');

    expect(() => loadYamlFile(path)).toThrow(`Invalid YAML in ${path}`);
  });

  it('should pick the explicit path, then the environment, then the default', () => {
    expect(resolveConfigPath('/etc/a.yaml', { STELLAR_GRID_CONFIG: '/etc/b.yaml' })).toBe('/etc/a.yaml');
    expect(resolveConfigPath(undefined, { STELLAR_GRID_CONFIG: '/etc/b.yaml' })).toBe('/etc/b.yaml');
    expect(resolveConfigPath(undefined, {})).toBe(resolve('grid-config.yaml'));
  });
});
