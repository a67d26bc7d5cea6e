/**
 * Reconciliation constants
 */

// ============================================
// LABEL TYPES
// ============================================

export const LABEL_VENDORS = 'Label Vendors';
export const NON_LABEL_VENDORS = 'Non-Label Vendors';
export const UNKNOWN_LABEL = 'Unknown';

/** Label types that get their own report partition */
export const KNOWN_LABEL_TYPES = [LABEL_VENDORS, NON_LABEL_VENDORS] as const;

export type KnownLabelType = (typeof KNOWN_LABEL_TYPES)[number];

export function isKnownLabelType(labelType: string): labelType is KnownLabelType {
    return labelType === LABEL_VENDORS || labelType === NON_LABEL_VENDORS;
}

// ============================================
// COLUMNS (normalized)
// ============================================

/** Order id header spellings, in lookup priority */
export const ORDER_ID_COLUMNS = ['order-id', 'order_id'] as const;

export const SKU_COLUMN = 'sku';

export const QUANTITY_COLUMN = 'quantity-purchased';

/** Columns of the vendor registry sheet */
export const REGISTRY_PREFIX_COLUMN = 'prefix';
export const REGISTRY_LABEL_COLUMN = 'label';

// ============================================
// DEFAULTS
// ============================================

export const SKU_PREFIX_DELIMITER = '-';

/** Returns and inventory adjustments, matched anywhere in the SKU */
export const DEFAULT_REMOVED_ROW_PATTERN = 'RET|INV';

export const DEFAULT_VENDOR_REGISTRY_SHEET = 'Overall vendors';

export const DEFAULT_BULK_BUY_MIN_QUANTITY = 5;
