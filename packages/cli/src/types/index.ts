/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /**
   * Command name (e.g., 'build', 'list')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: TSchema;

  /**
   * Pure use-case function; receives arguments already validated by `schema`
   */
  handler: (args: z.output<TSchema>, ctx: CommandContext) => Promise<unknown> | unknown;

  /**
   * Examples shown after the Commander help of the command
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'grid', 'catalog')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

export type OutputFormat = 'json' | 'table' | 'csv';
