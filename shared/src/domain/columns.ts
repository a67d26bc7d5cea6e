/**
 * Header normalization
 *
 * Reference and batch sheets are maintained by hand, so headers drift
 * ("Order ID", " order id ", "ORDER_ID"). Every lookup goes through
 * normalizeColumnName first.
 */

import type { CellValue, RawRow } from '../types/index.js';

/** Trim, lower-case, spaces → underscores */
export function normalizeColumnName(name: string): string {
    return name.trim().toLowerCase().replace(/ /g, '_');
}

/**
 * Re-key a row by normalized header. When two headers normalize to the
 * same name the first one wins.
 */
export function normalizeRowKeys(row: Readonly<Record<string, CellValue | undefined>>): RawRow {
    const out: RawRow = {};
    for (const [key, value] of Object.entries(row)) {
        const normalized = normalizeColumnName(key);
        if (!(normalized in out)) {
            out[normalized] = value;
        }
    }
    return out;
}

/** Union of normalized column names across rows, in first-seen order */
export function collectColumns(rows: readonly RawRow[]): string[] {
    const seen = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) seen.add(key);
    }
    return [...seen];
}

/**
 * Cell → string, or null for empty cells.
 * Whole numbers print without a trailing ".0" so numeric ids from
 * spreadsheets compare equal to the text ids of the batch file.
 * Pass `trim: false` where surrounding whitespace is significant (SKU prefixes).
 */
export function cellToString(value: CellValue | undefined, trim: boolean = true): string | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return value.toISOString();
    const text = typeof value === 'number' && Number.isInteger(value) ? value.toFixed(0) : String(value);
    const result = trim ? text.trim() : text;
    return result.trim() === '' ? null : result;
}
