/**
 * Unit tests for Command Registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { CommandRegistry } from '../../../src/core/command-registry.js';
import type { PackageCommandModule } from '../../../src/types/index.js';

function gridModule(): PackageCommandModule {
  return {
    packageName: 'grid',
    description: 'Grid commands',
    commands: [
      {
        name: 'build',
        description: 'Build the grid',
        schema: z.object({}),
        handler: async () => [],
        examples: ['stellar-grid grid build'],
      },
      {
        name: 'list',
        description: 'List runs',
        schema: z.object({}),
        handler: async () => [],
      },
    ],
  };
}

describe('CommandRegistry', () => {
  let registry: CommandRegistry;

  beforeEach(() => {
    registry = new CommandRegistry();
  });

  it('should register a package and find its commands', () => {
    registry.registerPackage(gridModule());

    expect(registry.getCommand('grid', 'build')?.description).toBe('Build the grid');
    expect(registry.getCommand('grid', 'list')?.description).toBe('List runs');
    expect(registry.getCommand('grid', 'missing')).toBeUndefined();
    expect(registry.getCommand('catalog', 'build')).toBeUndefined();
  });

  it('should throw on duplicate package registration', () => {
    registry.registerPackage(gridModule());

    expect(() => registry.registerPackage(gridModule())).toThrow('Package grid is already registered');
  });

  it('should register nothing when a package repeats a command name', () => {
    const module = gridModule();
    const first = module.commands[0];
    if (first) module.commands.push(first);

    expect(() => registry.registerPackage(module)).toThrow('Command grid.build is already registered');
    expect(registry.getCommand('grid', 'build')).toBeUndefined();
    expect(() => registry.registerPackage(gridModule())).not.toThrow();
  });

  it('should reject a command without description', () => {
    const module: PackageCommandModule = {
      packageName: 'catalog',
      description: 'Catalog commands',
      commands: [{ name: 'list', description: ' ', schema: z.object({}), handler: () => [] }],
    };

    expect(() => registry.registerPackage(module)).toThrow(
      'Command description must be a non-empty string'
    );
    expect(registry.getCommand('catalog', 'list')).toBeUndefined();
  });
});
