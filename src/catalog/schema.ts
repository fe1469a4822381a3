import { z } from 'zod';
import { CATEGORIES } from '../types/descriptor.js';

// Catalog files spell categories in lower case; both spellings are accepted.
export const CategorySchema = z
  .string()
  .transform((c) => c.toUpperCase())
  .pipe(z.enum(CATEGORIES));

export const CatalogEntrySchema = z.object({
  name: z.string().min(1).regex(/^[A-Za-z0-9._-]+$/, 'name may only contain letters, digits, ".", "_" and "-"'),
  category: CategorySchema,
  timeout: z.number().int().positive(),
  expected_output: z.string().optional(),
  command: z.array(z.string().min(1)).min(1).optional(),
});

export const CatalogFileSchema = z.object({
  examples: z.array(CatalogEntrySchema),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;
