/**
 * Enrichment merge
 *
 * Left join of partition rows onto the fetched attribute bags, keyed by SKU.
 * Rows are never dropped; a SKU without a bag gets null in every column.
 */

import type { AttributeBag, AttributeValue, EnrichedOrder, ReconciledOrder } from '../../types/index.js';

/** Union of attribute keys, in first-seen order */
export function collectEnrichmentColumns(attributes: ReadonlyMap<string, AttributeBag>): string[] {
    const columns = new Set<string>();
    for (const bag of attributes.values()) {
        for (const key of Object.keys(bag)) columns.add(key);
    }
    return [...columns];
}

export function mergeEnrichment(
    orders: readonly ReconciledOrder[],
    attributes: ReadonlyMap<string, AttributeBag>,
    columns: readonly string[] = collectEnrichmentColumns(attributes)
): EnrichedOrder[] {
    return orders.map((order) => {
        const bag = attributes.get(order.sku);
        const enrichment: Record<string, AttributeValue> = {};
        for (const column of columns) {
            enrichment[column] = bag?.[column] ?? null;
        }
        return { ...order, enrichment };
    });
}

/** Rows with empty enrichment, for runs where enrichment is switched off */
export function withoutEnrichment(orders: readonly ReconciledOrder[]): EnrichedOrder[] {
    return orders.map((order) => ({ ...order, enrichment: {} }));
}
