/**
 * Batch Ingestion
 *
 * Raw TSV rows → typed OrderRecords:
 * 1. Normalize headers and check the identifying columns exist (fatal otherwise)
 * 2. Split off removed rows (returns / inventory adjustments)
 * 3. Validate each remaining row's order id (fatal otherwise)
 * 4. Collapse rows sharing an order id to the first occurrence
 */

import type { OrderRecord, RawRow, RemovedRow } from '../../types/index.js';
import { batchRowKeySchema } from '../../schemas/orders.js';
import { cellToString, normalizeColumnName, normalizeRowKeys } from '../columns.js';
import { DEFAULT_REMOVED_ROW_PATTERN, ORDER_ID_COLUMNS, SKU_COLUMN } from '../constants.js';
import { extractVendorPrefix } from '../vendors/classifier.js';
import { ReconciliationError, RECONCILIATION_ERROR_CODES, errorMessage } from '../../errors/index.js';

// ============================================
// TYPES
// ============================================

/** A parsed batch file: header row plus data rows */
export interface BatchTable {
    /** Source name for error messages (usually the file name) */
    source: string;
    columns: readonly string[];
    rows: readonly RawRow[];
}

export interface IngestOptions {
    removedRowPattern?: string | RegExp;
}

export interface IngestResult {
    orders: OrderRecord[];
    removedRows: RemovedRow[];
    /** Later rows that repeated an order id already seen in the batch */
    duplicateRows: OrderRecord[];
}

// ============================================
// HELPERS
// ============================================

/**
 * @throws ReconciliationError INVALID_CONFIG for a pattern that does not compile
 */
export function compileRemovedRowPattern(pattern: string | RegExp = DEFAULT_REMOVED_ROW_PATTERN): RegExp {
    if (pattern instanceof RegExp) {
        // Drop g/y so test() carries no lastIndex between rows
        return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    }
    try {
        return new RegExp(pattern);
    } catch (error) {
        throw new ReconciliationError(RECONCILIATION_ERROR_CODES.INVALID_CONFIG, {
            message: `Removed-row pattern '${pattern}' is not a valid regular expression: ${errorMessage(error)}`,
            context: { pattern },
            cause: error,
        });
    }
}

/** First order id header present in the batch */
export function resolveOrderIdColumn(columns: readonly string[]): string | null {
    const normalized = new Set(columns.map(normalizeColumnName));
    return ORDER_ID_COLUMNS.find((column) => normalized.has(column)) ?? null;
}

// ============================================
// INGEST
// ============================================

/**
 * @throws ReconciliationError MISSING_COLUMN when the batch has no order id or sku column
 * @throws ReconciliationError INVALID_RECORD when a kept row has an empty order id
 */
export function ingestBatch(table: BatchTable, options: IngestOptions = {}): IngestResult {
    const idColumn = resolveOrderIdColumn(table.columns);
    if (!idColumn) {
        throw new ReconciliationError(RECONCILIATION_ERROR_CODES.MISSING_COLUMN, {
            message: `Batch '${table.source}' has no order id column (expected one of: ${ORDER_ID_COLUMNS.join(', ')})`,
            context: { source: table.source, columns: table.columns },
        });
    }
    if (!table.columns.some((column) => normalizeColumnName(column) === SKU_COLUMN)) {
        throw new ReconciliationError(RECONCILIATION_ERROR_CODES.MISSING_COLUMN, {
            message: `Batch '${table.source}' has no '${SKU_COLUMN}' column`,
            context: { source: table.source, columns: table.columns },
        });
    }

    const removedPattern = compileRemovedRowPattern(options.removedRowPattern);
    const orders: OrderRecord[] = [];
    const removedRows: RemovedRow[] = [];
    const duplicateRows: OrderRecord[] = [];
    const seenIds = new Set<string>();

    table.rows.forEach((rawRow, index) => {
        const rowNumber = index + 1;
        const row = normalizeRowKeys(rawRow);

        const rawSku = cellToString(row[SKU_COLUMN], false) ?? '';
        if (removedPattern.test(rawSku)) {
            removedRows.push({
                rowNumber,
                sku: rawSku,
                orderId: cellToString(row[idColumn]),
                attributes: row,
            });
            return;
        }

        const parsed = batchRowKeySchema.safeParse({ orderId: row[idColumn], sku: row[SKU_COLUMN] });
        if (!parsed.success) {
            throw new ReconciliationError(RECONCILIATION_ERROR_CODES.INVALID_RECORD, {
                message: `Batch '${table.source}' row ${rowNumber}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
                context: { source: table.source, rowNumber },
            });
        }

        const record: OrderRecord = {
            orderId: parsed.data.orderId,
            sku: parsed.data.sku,
            vendorPrefix: extractVendorPrefix(parsed.data.sku),
            rowNumber,
            attributes: row,
        };

        if (seenIds.has(record.orderId)) {
            duplicateRows.push(record);
            return;
        }
        seenIds.add(record.orderId);
        orders.push(record);
    });

    return { orders, removedRows, duplicateRows };
}
