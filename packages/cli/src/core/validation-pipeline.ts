/**
 * Validation and coercion pipeline
 *
 * The single path every CLI command's options take:
 * 1. Normalize option values (Commander.js -> flat object)
 * 2. Validate with the command's Zod schema
 */

import type { z } from 'zod';
import { normalizeOptions, parseArguments } from './argument-parser.js';

/**
 * @throws ValidationError if validation fails
 */
export function validateAndCoerceArgs<T extends z.ZodTypeAny>(
  schema: T,
  rawOptions: Record<string, unknown>
): z.output<T> {
  return parseArguments(schema, normalizeOptions(rawOptions));
}
