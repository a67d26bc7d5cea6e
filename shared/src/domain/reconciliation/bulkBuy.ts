/**
 * Bulk-buy check: orders whose purchased quantity reaches a threshold.
 */

import type { ReconciledOrder } from '../../types/index.js';
import { QUANTITY_COLUMN } from '../constants.js';

export function readQuantity(order: ReconciledOrder, column: string = QUANTITY_COLUMN): number | null {
    const value = order.attributes[column];
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string' || value.trim() === '') return null;
    const parsed = Number(value.trim().replace(/,/g, ''));
    return Number.isNaN(parsed) ? null : parsed;
}

export function findBulkBuyOrders(
    orders: readonly ReconciledOrder[],
    minQuantity: number,
    column: string = QUANTITY_COLUMN
): ReconciledOrder[] {
    return orders.filter((order) => {
        const quantity = readQuantity(order, column);
        return quantity !== null && quantity >= minQuantity;
    });
}
