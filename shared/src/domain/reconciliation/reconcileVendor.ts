/**
 * Per-vendor reconciliation
 *
 * For one vendor prefix: resolve its label type, drop orders the reference
 * sources already know, and flag SKUs they have never seen. Pure: reads the
 * classifier and knowledge base, writes nothing shared, so vendors can run
 * in any order or in parallel.
 */

import type { OrderRecord, ReconciledOrder, VendorReconciliation } from '../../types/index.js';
import type { KnowledgeBase } from '../knowledge/knowledgeBase.js';
import type { VendorClassifier } from '../vendors/classifier.js';
import { UNKNOWN_LABEL } from '../constants.js';

export interface ReconcileContext {
    classifier: VendorClassifier;
    knowledgeBase: KnowledgeBase;
}

/** Distinct vendor prefixes in first-seen order */
export function listVendorPrefixes(orders: readonly OrderRecord[]): string[] {
    return [...new Set(orders.map((order) => order.vendorPrefix))];
}

/** Group orders by vendor prefix, keeping batch order inside each group */
export function groupOrdersByVendor(orders: readonly OrderRecord[]): Map<string, OrderRecord[]> {
    const groups = new Map<string, OrderRecord[]>();
    for (const order of orders) {
        const group = groups.get(order.vendorPrefix);
        if (group) {
            group.push(order);
        } else {
            groups.set(order.vendorPrefix, [order]);
        }
    }
    return groups;
}

/**
 * Reconcile one vendor's orders.
 *
 * - Unknown label: no suppression, every order `isNewSku: false`
 * - Known label: suppress ids known to either source, `isNewSku` when the
 *   SKU is in neither source's SKU set
 *
 * @throws ReconciliationError REFERENCE_SHEET_UNREADABLE from the knowledge base
 */
export function reconcileVendor(
    vendorPrefix: string,
    vendorOrders: readonly OrderRecord[],
    ctx: ReconcileContext
): VendorReconciliation {
    if (vendorOrders.length === 0) {
        return { vendorPrefix, labelType: UNKNOWN_LABEL, orders: [], suppressedCount: 0 };
    }

    const labelType = ctx.classifier.classify(vendorPrefix);

    if (labelType === UNKNOWN_LABEL) {
        return {
            vendorPrefix,
            labelType,
            orders: vendorOrders.map((order) => ({ ...order, labelType, isNewSku: false })),
            suppressedCount: 0,
        };
    }

    const known = ctx.knowledgeBase.lookup(labelType);
    const orders: ReconciledOrder[] = [];
    let suppressedCount = 0;

    for (const order of vendorOrders) {
        if (known.orderIds.has(order.orderId)) {
            suppressedCount++;
            continue;
        }
        orders.push({ ...order, labelType, isNewSku: !known.skus.has(order.sku) });
    }

    return { vendorPrefix, labelType, orders, suppressedCount };
}

/**
 * Result for a vendor whose reconciliation failed: every order kept,
 * nothing flagged as a new SKU.
 */
export function degradedVendorReconciliation(
    vendorPrefix: string,
    vendorOrders: readonly OrderRecord[],
    labelType: string,
    reason: string
): VendorReconciliation {
    return {
        vendorPrefix,
        labelType,
        orders: vendorOrders.map((order) => ({ ...order, labelType, isNewSku: false })),
        suppressedCount: 0,
        degradedReason: reason,
    };
}
