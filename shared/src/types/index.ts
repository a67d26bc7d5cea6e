/**
 * Core entity types for the unshipped-order reconciliation run.
 *
 * Every entity here is built fresh per run and held in memory only.
 */

// ============================================
// RAW INPUT
// ============================================

/** A single spreadsheet/TSV cell after parsing */
export type CellValue = string | number | boolean | Date | null;

/** One parsed row, keyed by (normalized) column header */
export type RawRow = Record<string, CellValue | undefined>;

// ============================================
// ORDERS
// ============================================

/**
 * An unshipped order line after ingestion.
 * `attributes` carries every column of the source row (normalized headers),
 * including the identifying ones, so reports can reproduce the input.
 */
export interface OrderRecord {
    orderId: string;
    sku: string;
    vendorPrefix: string;
    /** 1-based row number in the batch file (header excluded) */
    rowNumber: number;
    attributes: Readonly<RawRow>;
}

/** A batch row excluded before reconciliation (return / inventory adjustment) */
export interface RemovedRow {
    rowNumber: number;
    sku: string;
    orderId: string | null;
    attributes: Readonly<RawRow>;
}

export interface ReconciledOrder extends OrderRecord {
    labelType: string;
    isNewSku: boolean;
}

// ============================================
// REFERENCE DATA
// ============================================

/** A reference sheet as handed over by the workbook loader */
export type ReferenceSheet =
    | { kind: 'table'; rows: readonly RawRow[] }
    | { kind: 'unreadable'; reason: string };

/** One reference source: label type (sheet name) → sheet */
export interface ReferenceSource {
    name: string;
    sheets: ReadonlyMap<string, ReferenceSheet>;
}

/** Prefix → label type */
export type VendorRegistry = ReadonlyMap<string, string>;

// ============================================
// RECONCILIATION OUTPUT
// ============================================

export interface VendorReconciliation {
    vendorPrefix: string;
    labelType: string;
    orders: ReconciledOrder[];
    /** Orders dropped because the reference sources already know their id */
    suppressedCount: number;
    /** Set when the vendor ran without dedup/new-SKU detection */
    degradedReason?: string;
}

export interface Partitions {
    labelVendors: ReconciledOrder[];
    nonLabelVendors: ReconciledOrder[];
    unknown: ReconciledOrder[];
}

export interface VendorOrderCount {
    vendor: string;
    orderCount: number;
}

export interface SkuOrderCount {
    sku: string;
    unshippedOrders: number;
}

export interface AggregateResult {
    partitions: Partitions;
    vendorOrderCounts: VendorOrderCount[];
    skuOrderCounts: SkuOrderCount[];
    newSkuOrders: ReconciledOrder[];
}

// ============================================
// ENRICHMENT
// ============================================

export type AttributeValue = string | number | boolean | null;

export type AttributeBag = Record<string, AttributeValue>;

export type EnrichedOrder = ReconciledOrder & {
    enrichment: Record<string, AttributeValue>;
};

// ============================================
// WARNINGS
// ============================================

export type RunWarningStage = 'knowledge-base' | 'registry' | 'reconciliation' | 'enrichment' | 'notify';

/** Non-fatal problem surfaced to the operator alongside the summary */
export interface RunWarning {
    stage: RunWarningStage;
    code: string;
    message: string;
    context?: Record<string, unknown>;
}
