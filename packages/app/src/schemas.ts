import { z } from 'zod';

/**
 * Body of POST /categorize.
 */
export const CategorizeRequestSchema = z.object({
  question: z.string({
    required_error: 'question is required',
    invalid_type_error: 'question must be a string',
  })
    .describe('Free-text customer question, e.g. "Hangi kargo firması?"'),
});

export type CategorizeRequest = z.infer<typeof CategorizeRequestSchema>;
