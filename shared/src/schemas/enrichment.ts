/**
 * Enrichment Response Zod Schemas
 *
 * Shape of one enrichment batch call: `{ status, data: { [sku]: { ...attributes } } }`.
 * Anything else is a data-shape failure for that batch.
 */

import { z } from 'zod';

export const attributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const attributeBagSchema = z.record(z.string(), attributeValueSchema);

export const enrichmentResponseSchema = z.object({
    status: z.boolean(),
    data: z.record(z.string(), attributeBagSchema),
});

export type EnrichmentResponse = z.infer<typeof enrichmentResponseSchema>;
