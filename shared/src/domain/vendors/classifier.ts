/**
 * Vendor Classifier
 *
 * SKU prefix → label type, by exact lookup in the vendor registry.
 * No case folding or trimming: a near-miss classifies Unknown.
 */

import type { RawRow, RunWarning, VendorRegistry } from '../../types/index.js';
import { cellToString, collectColumns } from '../columns.js';
import {
    REGISTRY_LABEL_COLUMN,
    REGISTRY_PREFIX_COLUMN,
    SKU_PREFIX_DELIMITER,
    UNKNOWN_LABEL,
} from '../constants.js';
import { ReconciliationError, RECONCILIATION_ERROR_CODES } from '../../errors/index.js';

/** First `-`-delimited token; a SKU without a delimiter is its own prefix */
export function extractVendorPrefix(sku: string): string {
    const idx = sku.indexOf(SKU_PREFIX_DELIMITER);
    return idx === -1 ? sku : sku.slice(0, idx);
}

export interface VendorClassifier {
    classify(prefix: string): string;
}

export function createVendorClassifier(registry: VendorRegistry): VendorClassifier {
    return {
        classify(prefix: string): string {
            return registry.get(prefix) ?? UNKNOWN_LABEL;
        },
    };
}

export interface RegistryBuildResult {
    registry: VendorRegistry;
    warnings: RunWarning[];
}

/**
 * Build the registry from the rows of the vendor sheet (normalized headers).
 * The first row for a prefix wins; later conflicting rows are reported.
 *
 * @throws ReconciliationError MISSING_COLUMN when `prefix` or `label` is absent
 */
export function buildVendorRegistry(rows: readonly RawRow[], sheetName: string): RegistryBuildResult {
    const warnings: RunWarning[] = [];
    const registry = new Map<string, string>();

    if (rows.length > 0) {
        const columns = new Set(collectColumns(rows));
        for (const column of [REGISTRY_PREFIX_COLUMN, REGISTRY_LABEL_COLUMN]) {
            if (!columns.has(column)) {
                throw new ReconciliationError(RECONCILIATION_ERROR_CODES.MISSING_COLUMN, {
                    message: `Vendor registry sheet '${sheetName}' has no '${column}' column`,
                    context: { sheetName, column },
                });
            }
        }
    }

    for (const row of rows) {
        const prefix = cellToString(row[REGISTRY_PREFIX_COLUMN], false);
        const label = cellToString(row[REGISTRY_LABEL_COLUMN]);
        if (prefix === null || label === null) continue;

        const existing = registry.get(prefix);
        if (existing === undefined) {
            registry.set(prefix, label);
        } else if (existing !== label) {
            warnings.push({
                stage: 'registry',
                code: 'DUPLICATE_PREFIX',
                message: `Prefix '${prefix}' is listed as both '${existing}' and '${label}'; using '${existing}'`,
                context: { prefix, kept: existing, ignored: label },
            });
        }
    }

    return { registry, warnings };
}
