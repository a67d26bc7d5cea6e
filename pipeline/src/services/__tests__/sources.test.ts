/**
 * Unit tests for the file-backed sources: TSV batch discovery/parsing,
 * master workbooks and the vendor registry sheet
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { LABEL_VENDORS, NON_LABEL_VENDORS, ReconciliationError } from '@unshipped/shared';
import {
    createFileSources,
    extractSheetId,
    findBatchFile,
    parseBatchText,
    sheetExportUrl,
    type SourcePaths,
} from '../sources/index.js';

function workbookBuffer(sheets: Record<string, unknown[][]>): Buffer {
    const workbook = XLSX.utils.book_new();
    for (const [name, rows] of Object.entries(sheets)) {
        XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
    }
    const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(out)) throw new Error('expected a buffer');
    return out;
}

let root: string;

beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'recon-sources-'));
});

afterEach(() => {
    rmSync(root, { recursive: true, force: true });
});

describe('findBatchFile', () => {
    it('picks the first .txt file by name', () => {
        writeFileSync(path.join(root, 'b-orders.txt'), '');
        writeFileSync(path.join(root, 'a-orders.txt'), '');
        writeFileSync(path.join(root, 'master.xlsx'), '');
        expect(findBatchFile(root)).toBe(path.join(root, 'a-orders.txt'));
    });

    it('throws MISSING_SOURCE when no .txt file exists', () => {
        expect(() => findBatchFile(root)).toThrow(`No .txt batch file found in ${root}`);
    });

    it('throws MISSING_SOURCE when the folder is missing', () => {
        expect(() => findBatchFile(path.join(root, 'nope'))).toThrow(ReconciliationError);
    });
});

describe('parseBatchText', () => {
    it('parses tab-separated rows keyed by header', () => {
        const table = parseBatchText(
            'order-id\tsku\tquantity-purchased\n111-1\tABC-1\t2\n111-2\tDEF-9\t1\n',
            'orders.txt'
        );
        expect(table.columns).toEqual(['order-id', 'sku', 'quantity-purchased']);
        expect(table.rows).toEqual([
            { 'order-id': '111-1', sku: 'ABC-1', 'quantity-purchased': '2' },
            { 'order-id': '111-2', sku: 'DEF-9', 'quantity-purchased': '1' },
        ]);
    });

    it('pads short rows with null and skips blank lines', () => {
        const table = parseBatchText('order-id\tsku\tbuyer-name\n1\tABC-1\n\n', 'orders.txt');
        expect(table.rows).toEqual([{ 'order-id': '1', sku: 'ABC-1', 'buyer-name': null }]);
    });

    it('strips a byte-order mark from the header', () => {
        const table = parseBatchText('\uFEFForder-id\tsku\n1\tABC-1\n', 'orders.txt');
        expect(table.columns[0]).toBe('order-id');
    });

    it('returns an empty table for empty text', () => {
        expect(parseBatchText('', 'orders.txt')).toEqual({ source: 'orders.txt', columns: [], rows: [] });
    });
});

describe('FileSources', () => {
    function paths(): SourcePaths {
        const uploadDir = path.join(root, 'Upload');
        const oldDataDir = path.join(root, 'OLD_DATA');
        mkdirSync(uploadDir);
        mkdirSync(oldDataDir);
        return {
            paths: {
                uploadDir,
                outputDir: path.join(root, 'Output'),
                oldDataDir,
                oldMasterFile: path.join(oldDataDir, 'old.xlsx'),
                newMasterFile: path.join(uploadDir, 'new.xlsx'),
                reportFile: path.join(root, 'Output', 'report.xlsx'),
            },
            newMasterSheetId: null,
            vendorRegistrySheet: 'Overall vendors',
        };
    }

    it('loads the batch from the upload folder', async () => {
        const config = paths();
        writeFileSync(path.join(config.paths.uploadDir, 'orders.txt'), 'order-id\tsku\n1\tABC-1\n');
        const table = await createFileSources(config).loadBatch();
        expect(table.source).toBe('orders.txt');
        expect(table.rows).toEqual([{ 'order-id': '1', sku: 'ABC-1' }]);
    });

    it('reads every non-registry sheet of a master workbook as a label type', async () => {
        const config = paths();
        writeFileSync(config.paths.newMasterFile, workbookBuffer({
            'Overall vendors': [['Prefix', 'Label'], ['ABC', LABEL_VENDORS]],
            [LABEL_VENDORS]: [['Order ID', 'SKU'], [111, 'ABC-1']],
            [NON_LABEL_VENDORS]: [['order_id', 'sku']],
        }));

        const source = await createFileSources(config).loadReference('new');
        expect(source.name).toBe('new.xlsx');
        expect([...source.sheets.keys()]).toEqual([LABEL_VENDORS, NON_LABEL_VENDORS]);
        expect(source.sheets.get(LABEL_VENDORS)).toEqual({
            kind: 'table',
            rows: [{ order_id: 111, sku: 'ABC-1' }],
        });
        expect(source.sheets.get(NON_LABEL_VENDORS)).toEqual({ kind: 'table', rows: [] });
    });

    it('builds the vendor registry from the registry sheet', async () => {
        const config = paths();
        writeFileSync(config.paths.newMasterFile, workbookBuffer({
            'Overall vendors': [['Prefix', 'Label'], ['ABC', LABEL_VENDORS], ['DEF', NON_LABEL_VENDORS]],
        }));

        const { registry, warnings } = await createFileSources(config).loadVendorRegistry();
        expect([...registry.entries()]).toEqual([['ABC', LABEL_VENDORS], ['DEF', NON_LABEL_VENDORS]]);
        expect(warnings).toEqual([]);
    });

    it('throws MISSING_SOURCE when the registry sheet is absent', async () => {
        const config = paths();
        writeFileSync(config.paths.newMasterFile, workbookBuffer({ [LABEL_VENDORS]: [['order_id', 'sku']] }));
        await expect(createFileSources(config).loadVendorRegistry()).rejects.toThrow(
            "Vendor registry sheet 'Overall vendors' not found in new.xlsx"
        );
    });

    it('throws MISSING_SOURCE when the old workbook is missing', async () => {
        const config = paths();
        await expect(createFileSources(config).loadReference('old')).rejects.toMatchObject({
            code: 'MISSING_SOURCE',
        });
    });
});

describe('Google Sheets helpers', () => {
    it('extracts the id from a sheet URL or a bare id', () => {
        const id = '1AbCdEfGhIjKlMnOpQrStUvWxYz_0123456789-ab';
        expect(extractSheetId(`https://docs.google.com/spreadsheets/d/${id}/edit#gid=0`)).toBe(id);
        expect(extractSheetId(` ${id} `)).toBe(id);
    });

    it('rejects strings that are neither', () => {
        expect(() => extractSheetId('not-a-sheet')).toThrow('Invalid Google Sheets URL or ID: not-a-sheet');
    });

    it('builds the xlsx export URL', () => {
        expect(sheetExportUrl('abc')).toBe('https://docs.google.com/spreadsheets/d/abc/export?format=xlsx');
    });
});
