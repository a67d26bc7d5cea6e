/**
 * Unit tests for batch ingestion: header checks, removed rows, intra-batch dedup
 */

import { compileRemovedRowPattern, ingestBatch, resolveOrderIdColumn, type BatchTable } from '../index.js';
import { ReconciliationError } from '../../errors/index.js';

function table(rows: BatchTable['rows'], columns: string[] = ['order-id', 'sku', 'quantity-purchased']): BatchTable {
    return { source: 'unshipped.txt', columns, rows };
}

describe('resolveOrderIdColumn', () => {
    it('prefers the hyphenated marketplace header', () => {
        expect(resolveOrderIdColumn(['order_id', 'order-id'])).toBe('order-id');
    });

    it('accepts headers that only match after normalization', () => {
        expect(resolveOrderIdColumn([' Order ID '])).toBe('order_id');
    });

    it('returns null when no id column exists', () => {
        expect(resolveOrderIdColumn(['sku'])).toBeNull();
    });
});

describe('ingestBatch', () => {
    it('builds typed records with the vendor prefix and row number', () => {
        const result = ingestBatch(table([
            { 'order-id': '111-1', sku: 'ABC-123', 'quantity-purchased': '2' },
        ]));

        expect(result.orders).toHaveLength(1);
        expect(result.orders[0]).toMatchObject({
            orderId: '111-1',
            sku: 'ABC-123',
            vendorPrefix: 'ABC',
            rowNumber: 1,
        });
        expect(result.orders[0].attributes['quantity-purchased']).toBe('2');
    });

    it('normalizes headers before lookup', () => {
        const result = ingestBatch(table(
            [{ 'Order-ID': '7', ' SKU ': 'DEF-1' }],
            ['Order-ID', ' SKU ']
        ));
        expect(result.orders[0].orderId).toBe('7');
        expect(result.orders[0].sku).toBe('DEF-1');
    });

    it('collapses rows sharing an order id to the first occurrence', () => {
        const result = ingestBatch(table([
            { 'order-id': '1', sku: 'ABC-123' },
            { 'order-id': '1', sku: 'ABC-999' },
            { 'order-id': '2', sku: 'ABC-555' },
        ]));

        expect(result.orders.map((o) => [o.orderId, o.sku])).toEqual([['1', 'ABC-123'], ['2', 'ABC-555']]);
        expect(result.duplicateRows.map((o) => o.rowNumber)).toEqual([2]);
    });

    it('splits off RET/INV rows before dedup and validation', () => {
        const result = ingestBatch(table([
            { 'order-id': '1', sku: 'ABC-123' },
            { 'order-id': '', sku: 'XYZ-RET-9' },
            { 'order-id': '3', sku: 'INV-ADJ' },
        ]));

        expect(result.orders.map((o) => o.orderId)).toEqual(['1']);
        expect(result.removedRows.map((r) => [r.rowNumber, r.sku, r.orderId])).toEqual([
            [2, 'XYZ-RET-9', null],
            [3, 'INV-ADJ', '3'],
        ]);
    });

    it('honours a custom removed-row pattern', () => {
        const result = ingestBatch(table([
            { 'order-id': '1', sku: 'ABC-RET' },
            { 'order-id': '2', sku: 'ABC-DMG' },
        ]), { removedRowPattern: /-DMG$/g });

        expect(result.orders.map((o) => o.orderId)).toEqual(['1']);
        expect(result.removedRows.map((r) => r.orderId)).toEqual(['2']);
    });

    it('keeps numeric order ids as text', () => {
        const result = ingestBatch(table([{ 'order-id': 42, sku: 'ABC-1' }]));
        expect(result.orders[0].orderId).toBe('42');
    });

    it('throws MISSING_COLUMN when the batch has no order id column', () => {
        expect(() => ingestBatch(table([], ['sku']))).toThrow(/no order id column/);
    });

    it('throws MISSING_COLUMN when the batch has no sku column', () => {
        expect(() => ingestBatch(table([], ['order-id']))).toThrow(/has no 'sku' column/);
    });

    it('throws INVALID_RECORD naming the row with an empty order id', () => {
        let caught: unknown;
        try {
            ingestBatch(table([
                { 'order-id': '1', sku: 'ABC-1' },
                { 'order-id': '  ', sku: 'ABC-2' },
            ]));
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ReconciliationError);
        expect(caught).toMatchObject({
            code: 'INVALID_RECORD',
            message: "Batch 'unshipped.txt' row 2: order id is empty",
        });
    });

    it('returns empty results for a header-only batch', () => {
        expect(ingestBatch(table([]))).toEqual({ orders: [], removedRows: [], duplicateRows: [] });
    });
});

describe('compileRemovedRowPattern', () => {
    it('defaults to matching RET or INV anywhere', () => {
        const pattern = compileRemovedRowPattern();
        expect(pattern.test('A-RET-1')).toBe(true);
        expect(pattern.test('INVX')).toBe(true);
        expect(pattern.test('ABC-123')).toBe(false);
    });

    it('throws INVALID_CONFIG for an invalid expression', () => {
        expect(() => compileRemovedRowPattern('(')).toThrow(ReconciliationError);
    });
});
