import { z } from 'zod';
import { OUTPUT_FORMATS } from '../core/output-formatter.js';

export const listCatalogSchema = z.object({
  config: z.string().min(1).optional(),
  job: z.number().int().min(0).optional(),
  status: z.string().min(1).optional(),
  format: z.enum(OUTPUT_FORMATS).default('table'),
});

export type ListCatalogArgs = z.infer<typeof listCatalogSchema>;
