import { z } from 'zod';
import { OUTPUT_FORMATS } from '../core/output-formatter.js';

export const buildGridSchema = z.object({
  config: z.string().min(1).optional(),
  overwrite: z.boolean().optional(),
  jobs: z.number().int().positive().optional(),
  parallel: z.number().int().positive().optional(),
  format: z.enum(OUTPUT_FORMATS).default('table'),
});

export const listGridSchema = z.object({
  config: z.string().min(1).optional(),
  jobs: z.number().int().positive().optional(),
  parallel: z.number().int().positive().optional(),
  format: z.enum(OUTPUT_FORMATS).default('table'),
});

export type BuildGridArgs = z.infer<typeof buildGridSchema>;
export type ListGridArgs = z.infer<typeof listGridSchema>;
