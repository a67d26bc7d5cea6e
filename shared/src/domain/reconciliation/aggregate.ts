/**
 * Aggregator
 *
 * Fans in the per-vendor results into the three report partitions and the
 * count tables. Label types other than the known pair go to the Unknown
 * partition with their own label kept on each row.
 */

import type {
    AggregateResult,
    Partitions,
    ReconciledOrder,
    SkuOrderCount,
    VendorOrderCount,
    VendorReconciliation,
} from '../../types/index.js';
import { LABEL_VENDORS, NON_LABEL_VENDORS } from '../constants.js';

export function partitionResults(results: readonly VendorReconciliation[]): Partitions {
    const partitions: Partitions = { labelVendors: [], nonLabelVendors: [], unknown: [] };

    for (const result of results) {
        if (result.labelType === LABEL_VENDORS) {
            partitions.labelVendors.push(...result.orders);
        } else if (result.labelType === NON_LABEL_VENDORS) {
            partitions.nonLabelVendors.push(...result.orders);
        } else {
            partitions.unknown.push(...result.orders);
        }
    }

    return partitions;
}

/** Distinct order ids per vendor, vendors in first-seen order */
export function countOrdersByVendor(orders: readonly ReconciledOrder[]): VendorOrderCount[] {
    const idsByVendor = new Map<string, Set<string>>();
    for (const order of orders) {
        let ids = idsByVendor.get(order.vendorPrefix);
        if (!ids) {
            ids = new Set();
            idsByVendor.set(order.vendorPrefix, ids);
        }
        ids.add(order.orderId);
    }
    return [...idsByVendor].map(([vendor, ids]) => ({ vendor, orderCount: ids.size }));
}

/** Distinct order ids per SKU, highest count first (ties keep first-seen order) */
export function countOrdersBySku(orders: readonly ReconciledOrder[]): SkuOrderCount[] {
    const idsBySku = new Map<string, Set<string>>();
    for (const order of orders) {
        let ids = idsBySku.get(order.sku);
        if (!ids) {
            ids = new Set();
            idsBySku.set(order.sku, ids);
        }
        ids.add(order.orderId);
    }
    return [...idsBySku]
        .map(([sku, ids]) => ({ sku, unshippedOrders: ids.size }))
        .sort((a, b) => b.unshippedOrders - a.unshippedOrders);
}

export function countDistinctOrders(orders: readonly ReconciledOrder[]): number {
    return new Set(orders.map((order) => order.orderId)).size;
}

export function aggregateResults(results: readonly VendorReconciliation[]): AggregateResult {
    const partitions = partitionResults(results);
    const knownOrders = [...partitions.labelVendors, ...partitions.nonLabelVendors];
    const newSkuOrders = results.flatMap((result) => result.orders.filter((order) => order.isNewSku));

    return {
        partitions,
        vendorOrderCounts: countOrdersByVendor(knownOrders),
        skuOrderCounts: countOrdersBySku(knownOrders),
        newSkuOrders,
    };
}
