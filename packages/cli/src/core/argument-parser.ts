/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@stellar-grid/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.output<T> {
  const result = schema.safeParse(rawArgs);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  ${path}: ${issue.message}`;
    });

    throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
      issues: result.error.issues,
      formattedMessages: messages,
    });
  }
  return result.data;
}

/**
 * Normalize Commander.js option values. Keys are never renamed: Commander
 * already turns --job-file into jobFile.
 *
 * Unset options (undefined or null) are dropped and every other value passes
 * through as Commander produced it. Typed conversion belongs to each
 * command's coerce step, which names the keys it reads as numbers or
 * booleans, so a status or path that looks numeric stays a string.
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }
    normalized[key] = value;
  }

  return normalized;
}
