/**
 * Unshipped batch file (tab-separated .txt marketplace extract)
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { errorMessage, ReconciliationError, type BatchTable, type RawRow } from '@unshipped/shared';
import { sourcesLogger } from '../../utils/logger.js';

/** First `.txt` file in the folder, by name */
export function findBatchFile(uploadDir: string): string {
    if (!existsSync(uploadDir)) {
        throw new ReconciliationError('MISSING_SOURCE', {
            message: `Upload folder not found: ${uploadDir}`,
            context: { path: uploadDir },
        });
    }

    const candidates = readdirSync(uploadDir)
        .filter((name) => name.toLowerCase().endsWith('.txt'))
        .sort();
    if (candidates.length === 0) {
        throw new ReconciliationError('MISSING_SOURCE', {
            message: `No .txt batch file found in ${uploadDir}`,
            context: { path: uploadDir },
        });
    }
    return path.join(uploadDir, candidates[0]);
}

/**
 * Parse TSV text into a header row plus one record per data row.
 * Short rows are padded with nulls; cells beyond the header are dropped.
 */
export function parseBatchText(text: string, source: string): BatchTable {
    let records: string[][];
    try {
        records = parse(text, {
            delimiter: '\t',
            bom: true,
            relax_quotes: true,
            relax_column_count: true,
            skip_empty_lines: true,
        });
    } catch (error: unknown) {
        throw new ReconciliationError('MISSING_SOURCE', {
            message: `Batch '${source}' could not be parsed: ${errorMessage(error)}`,
            context: { source },
            cause: error,
        });
    }

    const [header = [], ...body] = records;
    const columns = header.map((column) => column.trim());
    const rows = body.map((cells) => {
        const row: RawRow = {};
        columns.forEach((column, index) => {
            row[column] = cells[index] ?? null;
        });
        return row;
    });
    return { source, columns, rows };
}

export function loadBatchFile(uploadDir: string): BatchTable {
    const filePath = findBatchFile(uploadDir);
    sourcesLogger.info({ file: path.basename(filePath) }, 'Found unshipped batch file');
    const table = parseBatchText(readFileSync(filePath, 'utf8'), path.basename(filePath));
    sourcesLogger.info({ rows: table.rows.length, columns: table.columns.length }, 'Batch file parsed');
    return table;
}
