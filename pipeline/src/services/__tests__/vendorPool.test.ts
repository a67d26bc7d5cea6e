/**
 * Unit tests for the vendor task group: ordering and per-vendor failure isolation
 */

import {
    buildKnowledgeBase,
    createVendorClassifier,
    LABEL_VENDORS,
    NON_LABEL_VENDORS,
    UNKNOWN_LABEL,
    type OrderRecord,
    type ReconcileContext,
    type ReferenceSheet,
} from '@unshipped/shared';
import { reconcileVendors } from '../reconciliation/vendorPool.js';

function order(orderId: string, sku: string): OrderRecord {
    return { orderId, sku, vendorPrefix: sku.split('-')[0], rowNumber: 1, attributes: { 'order-id': orderId, sku } };
}

const registry = new Map([['ABC', LABEL_VENDORS], ['DEF', NON_LABEL_VENDORS]]);

function context(nonLabelSheet: ReferenceSheet): ReconcileContext {
    return {
        classifier: createVendorClassifier(registry),
        knowledgeBase: buildKnowledgeBase([{
            name: 'new',
            sheets: new Map<string, ReferenceSheet>([
                [LABEL_VENDORS, { kind: 'table', rows: [{ order_id: '1', sku: 'ABC-1' }] }],
                [NON_LABEL_VENDORS, nonLabelSheet],
            ]),
        }]).knowledgeBase,
    };
}

const orders = [order('1', 'ABC-1'), order('2', 'DEF-1'), order('3', 'ZZZ-1'), order('4', 'ABC-2'), order('5', 'DEF-2')];

describe('reconcileVendors', () => {
    it('returns one result per vendor in first-seen order', async () => {
        const { results, warnings } = await reconcileVendors(
            orders,
            context({ kind: 'table', rows: [{ order_id: '5', sku: 'DEF-2' }] }),
            3
        );

        expect(results.map((r) => [r.vendorPrefix, r.labelType, r.orders.map((o) => o.orderId)])).toEqual([
            ['ABC', LABEL_VENDORS, ['4']],
            ['DEF', NON_LABEL_VENDORS, ['2']],
            ['ZZZ', UNKNOWN_LABEL, ['3']],
        ]);
        expect(warnings).toEqual([]);
    });

    it('degrades only the vendor whose reference sheet is unreadable', async () => {
        const { results, warnings } = await reconcileVendors(
            orders,
            context({ kind: 'unreadable', reason: 'corrupt' }),
            2
        );

        const def = results.find((r) => r.vendorPrefix === 'DEF');
        expect(def).toMatchObject({ labelType: NON_LABEL_VENDORS, suppressedCount: 0 });
        expect(def?.orders.map((o) => [o.orderId, o.isNewSku])).toEqual([['2', false], ['5', false]]);
        expect(def?.degradedReason).toBe(`Reference sheet '${NON_LABEL_VENDORS}' could not be read (new: corrupt)`);

        const abc = results.find((r) => r.vendorPrefix === 'ABC');
        expect(abc?.suppressedCount).toBe(1);
        expect(abc?.degradedReason).toBeUndefined();

        expect(warnings).toEqual([{
            stage: 'reconciliation',
            code: 'REFERENCE_SHEET_UNREADABLE',
            message: `Vendor 'DEF' (${NON_LABEL_VENDORS}) ran without deduplication: Reference sheet '${NON_LABEL_VENDORS}' could not be read (new: corrupt)`,
            context: { vendorPrefix: 'DEF', labelType: NON_LABEL_VENDORS },
        }]);
    });

    it('degrades a vendor to Unknown when classification itself fails', async () => {
        const base = context({ kind: 'table', rows: [] });
        const ctx: ReconcileContext = {
            knowledgeBase: base.knowledgeBase,
            classifier: {
                classify(prefix) {
                    if (prefix === 'DEF') throw new Error('registry unavailable');
                    return base.classifier.classify(prefix);
                },
            },
        };

        const { results, warnings } = await reconcileVendors(orders, ctx, 2);
        const def = results.find((r) => r.vendorPrefix === 'DEF');
        expect(def?.labelType).toBe(UNKNOWN_LABEL);
        expect(def?.orders).toHaveLength(2);
        expect(warnings.map((w) => w.code)).toEqual(['VENDOR_FAILED']);
    });

    it('handles an empty batch', async () => {
        await expect(reconcileVendors([], context({ kind: 'table', rows: [] }), 4)).resolves.toEqual({
            results: [],
            warnings: [],
        });
    });
});
