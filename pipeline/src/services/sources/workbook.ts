/**
 * Master workbook loading (xlsx)
 *
 * Each sheet of a master workbook is one label type. A sheet that cannot be
 * converted to rows is handed on as `unreadable` instead of failing the load,
 * so only the vendors of that label type lose deduplication.
 */

import { existsSync, readFileSync } from 'node:fs';
import * as XLSX from 'xlsx';
import {
    errorMessage,
    normalizeRowKeys,
    ReconciliationError,
    type CellValue,
    type RawRow,
    type ReferenceSheet,
    type ReferenceSource,
} from '@unshipped/shared';
import { sourcesLogger } from '../../utils/logger.js';

export function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value;
    return String(value);
}

/** Object rows → RawRow with normalized headers */
export function toRawRows(rows: readonly unknown[]): RawRow[] {
    const out: RawRow[] = [];
    for (const row of rows) {
        if (typeof row !== 'object' || row === null) continue;
        const cells: Record<string, CellValue> = {};
        for (const [key, value] of Object.entries(row)) {
            cells[key] = toCellValue(value);
        }
        out.push(normalizeRowKeys(cells));
    }
    return out;
}

export function parseWorkbook(buffer: Buffer, name: string): XLSX.WorkBook {
    try {
        return XLSX.read(buffer, { type: 'buffer', cellDates: true });
    } catch (error: unknown) {
        throw new ReconciliationError('MISSING_SOURCE', {
            message: `Workbook '${name}' could not be opened: ${errorMessage(error)}`,
            context: { source: name },
            cause: error,
        });
    }
}

export function readWorkbookFile(filePath: string): XLSX.WorkBook {
    if (!existsSync(filePath)) {
        throw new ReconciliationError('MISSING_SOURCE', {
            message: `Workbook not found: ${filePath}`,
            context: { path: filePath },
        });
    }
    return parseWorkbook(readFileSync(filePath), filePath);
}

/** Rows of one sheet, or null when the workbook has no such sheet */
export function readSheetRows(workbook: XLSX.WorkBook, sheetName: string): RawRow[] | null {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) return null;
    return toRawRows(XLSX.utils.sheet_to_json<unknown>(sheet, { defval: null, raw: true }));
}

export function workbookToReferenceSource(
    workbook: XLSX.WorkBook,
    name: string,
    options: { excludeSheets?: readonly string[] } = {}
): ReferenceSource {
    const exclude = new Set(options.excludeSheets ?? []);
    const sheets = new Map<string, ReferenceSheet>();

    for (const sheetName of workbook.SheetNames) {
        if (exclude.has(sheetName)) continue;
        try {
            const rows = readSheetRows(workbook, sheetName);
            sheets.set(sheetName, rows === null
                ? { kind: 'unreadable', reason: 'sheet listed but missing from the workbook' }
                : { kind: 'table', rows });
        } catch (error: unknown) {
            sheets.set(sheetName, { kind: 'unreadable', reason: errorMessage(error) });
        }
    }

    sourcesLogger.debug({ source: name, sheets: [...sheets.keys()] }, 'Reference workbook loaded');
    return { name, sheets };
}
