/**
 * Report Workbook Configuration
 *
 * Sheet names of the output workbook and the marketplace columns
 * dropped from the Label / Non-Label sheets.
 */

import { readFileSync } from 'node:fs';

export const REPORT_SHEETS = {
    LABEL_VENDORS: 'Label_Vendors_Orders',
    NON_LABEL_VENDORS: 'Non_Label_Vendors_Orders',
    UNKNOWN_VENDORS: 'Unknown_Vendors_Report',
    SKU_COUNTS: 'SKU_Counts_Report',
    VENDOR_ORDER_COUNTS: 'Vendor_Order_Counts',
    NEW_SKUS: 'New_SKU_Report',
    REMOVED_ORDERS: 'Removed_Orders',
    BULK_BUY: 'Bulk_Buy_Orders',
} as const;

export type ReportSheetName = (typeof REPORT_SHEETS)[keyof typeof REPORT_SHEETS];

/** Header row of the SKU counts sheet */
export const SKU_COUNT_HEADERS = ['SKU', 'Unshipped Orders'] as const;

/** Header row of the vendor counts sheet */
export const VENDOR_COUNT_HEADERS = ['Vendor', 'Order Count'] as const;

/** Columns appended after the source columns on order sheets */
export const LABEL_TYPE_HEADER = 'label_type';
export const NEW_SKU_HEADER = 'is_new_sku';

let droppedColumns: readonly string[] | null = null;

/**
 * Marketplace columns that carry nothing for vendors (payment, buyer,
 * ship-from and compliance fields). Read once from droppedReportColumns.json.
 */
export function getDroppedReportColumns(): readonly string[] {
    if (droppedColumns === null) {
        const raw: unknown = JSON.parse(
            readFileSync(new URL('./droppedReportColumns.json', import.meta.url), 'utf8')
        );
        droppedColumns = Array.isArray(raw) ? raw.filter((c): c is string => typeof c === 'string') : [];
    }
    return droppedColumns;
}
