import { z } from 'zod';
import { OUTPUT_FORMATS } from '../core/output-formatter.js';

export const showConfigSchema = z.object({
  config: z.string().min(1).optional(),
  format: z.enum(OUTPUT_FORMATS).default('json'),
});

export type ShowConfigArgs = z.infer<typeof showConfigSchema>;
