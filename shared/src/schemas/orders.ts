/**
 * Batch Row Zod Schemas
 *
 * Validates the identifying cells of every unshipped-order row at ingestion,
 * so nothing downstream re-checks column presence or id types.
 */

import { z } from 'zod';
import { cellToString } from '../domain/columns.js';

// ============================================
// CELL SCHEMAS
// ============================================

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null(), z.undefined()]);

/** Order id: any non-empty cell, as trimmed text */
export const orderIdCellSchema = cellSchema
    .transform((value) => cellToString(value))
    .pipe(z.string({ invalid_type_error: 'order id is empty' }).min(1, 'order id is empty'));

/** SKU: text as written, empty cells become '' */
export const skuCellSchema = cellSchema.transform((value) => cellToString(value, false) ?? '');

// ============================================
// ROW SCHEMA
// ============================================

export const batchRowKeySchema = z.object({
    orderId: orderIdCellSchema,
    sku: skuCellSchema,
});

export type BatchRowKey = z.infer<typeof batchRowKeySchema>;
