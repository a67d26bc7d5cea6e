/**
 * Knowledge Base
 *
 * Known order ids and known SKUs per label type, built from the old and the
 * new reference workbooks. Each sheet of a workbook is one label type.
 * Sets from the two sources are unioned; a label type present in only one
 * source simply has the smaller set.
 *
 * A sheet the loader could not read is kept as "unreadable": lookups for
 * that label type throw REFERENCE_SHEET_UNREADABLE so the caller can degrade
 * the affected vendors only.
 */

import type { RawRow, ReferenceSource, RunWarning } from '../../types/index.js';
import { cellToString, collectColumns, normalizeRowKeys } from '../columns.js';
import { SKU_COLUMN } from '../constants.js';
import { ReconciliationError, RECONCILIATION_ERROR_CODES } from '../../errors/index.js';

/** Reference sheets spell the id column with an underscore; the batch spelling is accepted too */
const REFERENCE_ORDER_ID_COLUMNS = ['order_id', 'order-id'] as const;

// ============================================
// TYPES
// ============================================

export interface KnownSets {
    orderIds: ReadonlySet<string>;
    skus: ReadonlySet<string>;
}

interface LabelEntry {
    orderIds: Set<string>;
    skus: Set<string>;
    /** Source name → reason, for sheets that could not be read */
    unreadable: Map<string, string>;
}

export interface KnowledgeBaseBuildResult {
    knowledgeBase: KnowledgeBase;
    warnings: RunWarning[];
}

// ============================================
// KNOWLEDGE BASE
// ============================================

export class KnowledgeBase {
    private readonly entries: ReadonlyMap<string, LabelEntry>;

    constructor(entries: ReadonlyMap<string, LabelEntry>) {
        this.entries = entries;
    }

    /** Label types present in at least one source */
    labelTypes(): string[] {
        return [...this.entries.keys()];
    }

    has(labelType: string): boolean {
        return this.entries.has(labelType);
    }

    /**
     * Known ids and SKUs for a label type; empty sets when neither source has it.
     *
     * @throws ReconciliationError REFERENCE_SHEET_UNREADABLE
     */
    lookup(labelType: string): KnownSets {
        const entry = this.entries.get(labelType);
        if (!entry) {
            return { orderIds: new Set(), skus: new Set() };
        }
        if (entry.unreadable.size > 0) {
            const details = [...entry.unreadable].map(([source, reason]) => `${source}: ${reason}`).join('; ');
            throw new ReconciliationError(RECONCILIATION_ERROR_CODES.REFERENCE_SHEET_UNREADABLE, {
                message: `Reference sheet '${labelType}' could not be read (${details})`,
                context: { labelType, sources: [...entry.unreadable.keys()] },
            });
        }
        return { orderIds: entry.orderIds, skus: entry.skus };
    }
}

// ============================================
// BUILD
// ============================================

/** SKUs keep their surrounding whitespace, matching how batch SKUs are read */
function collectColumnValues(rows: readonly RawRow[], column: string, into: Set<string>, trim: boolean): void {
    for (const row of rows) {
        const value = cellToString(row[column], trim);
        if (value !== null) into.add(value);
    }
}

/**
 * Union the reference sources into a KnowledgeBase.
 * Sheets listed in `excludeSheets` (e.g. the vendor registry) are skipped.
 */
export function buildKnowledgeBase(
    sources: readonly ReferenceSource[],
    options: { excludeSheets?: readonly string[] } = {}
): KnowledgeBaseBuildResult {
    const excluded = new Set(options.excludeSheets ?? []);
    const entries = new Map<string, LabelEntry>();
    const warnings: RunWarning[] = [];

    for (const source of sources) {
        for (const [labelType, sheet] of source.sheets) {
            if (excluded.has(labelType)) continue;

            let entry = entries.get(labelType);
            if (!entry) {
                entry = { orderIds: new Set(), skus: new Set(), unreadable: new Map() };
                entries.set(labelType, entry);
            }

            if (sheet.kind === 'unreadable') {
                entry.unreadable.set(source.name, sheet.reason);
                warnings.push({
                    stage: 'knowledge-base',
                    code: RECONCILIATION_ERROR_CODES.REFERENCE_SHEET_UNREADABLE,
                    message: `${source.name} reference sheet '${labelType}' could not be read: ${sheet.reason}`,
                    context: { source: source.name, labelType },
                });
                continue;
            }

            const rows = sheet.rows.map(normalizeRowKeys);
            const columns = new Set(collectColumns(rows));

            const idColumn = REFERENCE_ORDER_ID_COLUMNS.find((column) => columns.has(column)) ?? null;

            for (const [axis, found] of [['order_id', idColumn !== null], [SKU_COLUMN, columns.has(SKU_COLUMN)]] as const) {
                if (rows.length > 0 && !found) {
                    warnings.push({
                        stage: 'knowledge-base',
                        code: RECONCILIATION_ERROR_CODES.MISSING_COLUMN,
                        message: `${source.name} reference sheet '${labelType}' has no '${axis}' column; treating it as empty`,
                        context: { source: source.name, labelType, column: axis },
                    });
                }
            }

            if (idColumn) collectColumnValues(rows, idColumn, entry.orderIds, true);
            collectColumnValues(rows, SKU_COLUMN, entry.skus, false);
        }
    }

    return { knowledgeBase: new KnowledgeBase(entries), warnings };
}
