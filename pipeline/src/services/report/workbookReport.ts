/**
 * Report workbook
 *
 * One sheet per partition plus the count, new-SKU, removed-row and
 * (optionally) bulk-buy listings. Sheets are built as plain header + rows
 * first so their content can be checked without going through xlsx.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import * as XLSX from 'xlsx';
import {
    collectColumns,
    type AttributeValue,
    type CellValue,
    type EnrichedOrder,
    type RawRow,
    type ReconciledOrder,
    type RemovedRow,
    type SkuOrderCount,
    type VendorOrderCount,
} from '@unshipped/shared';
import {
    getDroppedReportColumns,
    LABEL_TYPE_HEADER,
    NEW_SKU_HEADER,
    REPORT_SHEETS,
    SKU_COUNT_HEADERS,
    VENDOR_COUNT_HEADERS,
    type ReportSheetName,
} from '../../config/report.js';
import { reportLogger } from '../../utils/logger.js';

// ============================================
// TYPES
// ============================================

export interface ReconciliationReport {
    labelVendors: readonly EnrichedOrder[];
    nonLabelVendors: readonly EnrichedOrder[];
    unknown: readonly EnrichedOrder[];
    skuOrderCounts: readonly SkuOrderCount[];
    vendorOrderCounts: readonly VendorOrderCount[];
    newSkuOrders: readonly ReconciledOrder[];
    removedRows: readonly RemovedRow[];
    /** null when the bulk-buy check is off */
    bulkBuyOrders: readonly ReconciledOrder[] | null;
}

export interface ReportSheet {
    name: ReportSheetName;
    header: string[];
    rows: CellValue[][];
}

export interface ReportSheetOptions {
    /** Columns left off the Label / Non-Label sheets */
    droppedColumns?: readonly string[];
}

// ============================================
// SHEET BUILDING
// ============================================

function attributeColumns(rows: readonly { attributes: Readonly<RawRow> }[], dropped: ReadonlySet<string>): string[] {
    return collectColumns(rows.map((row) => row.attributes)).filter((column) => !dropped.has(column));
}

/** An order row, with enrichment columns when the run fetched them */
type ReportOrder = ReconciledOrder & { enrichment?: Readonly<Record<string, AttributeValue>> };

function orderSheet(
    name: ReportSheetName,
    orders: readonly ReportOrder[],
    dropped: ReadonlySet<string> = new Set()
): ReportSheet {
    const sourceColumns = attributeColumns(orders, dropped);
    const enrichmentColumns = [...new Set(orders.flatMap((order) => Object.keys(order.enrichment ?? {})))];

    const rows = orders.map((order): CellValue[] => [
        ...sourceColumns.map((column) => order.attributes[column] ?? null),
        order.labelType,
        order.isNewSku,
        ...enrichmentColumns.map((column) => order.enrichment?.[column] ?? null),
    ]);

    return { name, header: [...sourceColumns, LABEL_TYPE_HEADER, NEW_SKU_HEADER, ...enrichmentColumns], rows };
}

function removedSheet(rows: readonly RemovedRow[]): ReportSheet {
    const columns = attributeColumns(rows, new Set());
    return {
        name: REPORT_SHEETS.REMOVED_ORDERS,
        header: columns,
        rows: rows.map((row) => columns.map((column) => row.attributes[column] ?? null)),
    };
}

export function buildReportSheets(report: ReconciliationReport, options: ReportSheetOptions = {}): ReportSheet[] {
    const dropped = new Set(options.droppedColumns ?? getDroppedReportColumns());

    const sheets: ReportSheet[] = [
        orderSheet(REPORT_SHEETS.LABEL_VENDORS, report.labelVendors, dropped),
        orderSheet(REPORT_SHEETS.NON_LABEL_VENDORS, report.nonLabelVendors, dropped),
        orderSheet(REPORT_SHEETS.UNKNOWN_VENDORS, report.unknown),
        {
            name: REPORT_SHEETS.SKU_COUNTS,
            header: [...SKU_COUNT_HEADERS],
            rows: report.skuOrderCounts.map((count) => [count.sku, count.unshippedOrders]),
        },
        {
            name: REPORT_SHEETS.VENDOR_ORDER_COUNTS,
            header: [...VENDOR_COUNT_HEADERS],
            rows: report.vendorOrderCounts.map((count) => [count.vendor, count.orderCount]),
        },
        orderSheet(REPORT_SHEETS.NEW_SKUS, report.newSkuOrders),
        removedSheet(report.removedRows),
    ];

    if (report.bulkBuyOrders !== null) {
        sheets.push(orderSheet(REPORT_SHEETS.BULK_BUY, report.bulkBuyOrders));
    }
    return sheets;
}

// ============================================
// WRITING
// ============================================

export function reportToBuffer(sheets: readonly ReportSheet[]): Buffer {
    const workbook = XLSX.utils.book_new();
    for (const sheet of sheets) {
        XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([sheet.header, ...sheet.rows]), sheet.name);
    }
    const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(out)) {
        throw new Error('xlsx did not return a buffer');
    }
    return out;
}

/** Build and write the report workbook; returns the sheets written */
export function writeReportWorkbook(
    report: ReconciliationReport,
    filePath: string,
    options: ReportSheetOptions = {}
): ReportSheet[] {
    const sheets = buildReportSheets(report, options);
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, reportToBuffer(sheets));
    reportLogger.info(
        { file: filePath, sheets: sheets.map((s) => `${s.name} (${s.rows.length})`) },
        'Report workbook written'
    );
    return sheets;
}
