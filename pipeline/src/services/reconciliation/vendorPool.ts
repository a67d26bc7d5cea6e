/**
 * Vendor task group
 *
 * Runs the per-vendor reconciliation as a bounded task group (p-limit on the
 * event loop, not separate threads) and collects the results in first-seen
 * vendor order. A vendor that fails is degraded
 * (all orders kept, no new-SKU flags) and reported as a warning; the other
 * vendors are unaffected.
 */

import {
    degradedVendorReconciliation,
    errorMessage,
    groupOrdersByVendor,
    isReconciliationError,
    listVendorPrefixes,
    reconcileVendor,
    UNKNOWN_LABEL,
    type OrderRecord,
    type ReconcileContext,
    type RunWarning,
    type VendorReconciliation,
} from '@unshipped/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import { runSettled } from '../../utils/taskPool.js';

export interface VendorPoolResult {
    results: VendorReconciliation[];
    warnings: RunWarning[];
}

interface VendorOutcome {
    result: VendorReconciliation;
    warning?: RunWarning;
}

function vendorWarning(vendorPrefix: string, labelType: string, error: unknown): RunWarning {
    return {
        stage: 'reconciliation',
        code: isReconciliationError(error) ? error.code : 'VENDOR_FAILED',
        message: `Vendor '${vendorPrefix}' (${labelType}) ran without deduplication: ${errorMessage(error)}`,
        context: { vendorPrefix, labelType },
    };
}

export async function reconcileVendors(
    orders: readonly OrderRecord[],
    ctx: ReconcileContext,
    concurrency: number
): Promise<VendorPoolResult> {
    const groups = groupOrdersByVendor(orders);
    const prefixes = listVendorPrefixes(orders);

    reconciliationLogger.info({ vendors: prefixes.length, concurrency }, 'Reconciling vendors');

    const settled = await runSettled(prefixes, concurrency, async (prefix): Promise<VendorOutcome> => {
        const vendorOrders = groups.get(prefix) ?? [];
        if (vendorOrders.length === 0) {
            reconciliationLogger.debug({ vendorPrefix: prefix }, 'No orders for vendor');
        }

        const labelType = ctx.classifier.classify(prefix);
        try {
            return { result: reconcileVendor(prefix, vendorOrders, ctx) };
        } catch (error: unknown) {
            return {
                result: degradedVendorReconciliation(prefix, vendorOrders, labelType, errorMessage(error)),
                warning: vendorWarning(prefix, labelType, error),
            };
        }
    });

    const results: VendorReconciliation[] = [];
    const warnings: RunWarning[] = [];

    settled.forEach((outcome, index) => {
        const prefix = prefixes[index];
        if (outcome.status === 'fulfilled') {
            results.push(outcome.value.result);
            if (outcome.value.warning) warnings.push(outcome.value.warning);
            return;
        }
        const error: unknown = outcome.reason;
        results.push(degradedVendorReconciliation(prefix, groups.get(prefix) ?? [], UNKNOWN_LABEL, errorMessage(error)));
        warnings.push(vendorWarning(prefix, UNKNOWN_LABEL, error));
    });

    for (const warning of warnings) {
        reconciliationLogger.warn({ code: warning.code, ...warning.context }, warning.message);
    }

    const suppressed = results.reduce((sum, r) => sum + r.suppressedCount, 0);
    reconciliationLogger.info(
        { vendors: results.length, suppressed, degraded: warnings.length },
        'Vendors reconciled'
    );
    return { results, warnings };
}
