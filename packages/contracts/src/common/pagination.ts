import { z } from 'zod';

export const DEFAULT_PAGE_SIZE = 20;

export const HelixPaginationSchema = z.object({
  cursor: z.string().optional(),
});

/**
 * Envelope every paginated Helix endpoint answers with. Items stay `unknown`
 * here; converters validate them against the entity schemas.
 */
export const HelixPageEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
  pagination: HelixPaginationSchema.optional(),
});

export function createHelixResponseSchema<T extends z.ZodTypeAny>(itemSchema: T) {
  return z.object({
    data: z.array(itemSchema),
    pagination: HelixPaginationSchema.optional(),
  });
}

export type HelixPagination = z.infer<typeof HelixPaginationSchema>;
export type HelixPageEnvelope = z.infer<typeof HelixPageEnvelopeSchema>;
