import { z } from 'zod';

/**
 * Schema for a single category definition in a catalog file.
 */
export const CategorySchema = z.object({
  id: z.string()
    .trim()
    .min(1, 'Category id cannot be empty')
    .describe("Machine-readable identifier, e.g. 'stok'"),
  displayName: z.string()
    .trim()
    .min(1, 'Display name cannot be empty'),
  examples: z.array(z.string().trim().min(1, 'Example phrase cannot be empty'))
    .min(1, 'Each category needs at least one example phrase')
    .describe('Representative phrases whose embeddings are averaged into the prototype'),
});

/**
 * Schema for a catalog file: `{ "categories": [...] }`.
 */
export const CategoryCatalogSchema = z.object({
  categories: z.array(CategorySchema).min(1, 'Catalog must define at least one category'),
});
