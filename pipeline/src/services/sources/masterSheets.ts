/**
 * File-backed input sources for a run: the batch extract, the old and new
 * master workbooks, and the vendor registry sheet of the new workbook.
 */

import path from 'node:path';
import type { WorkBook } from 'xlsx';
import {
    buildVendorRegistry,
    ReconciliationError,
    type BatchTable,
    type ReferenceSource,
    type RegistryBuildResult,
} from '@unshipped/shared';
import type { PipelineConfig } from '../../config/index.js';
import { sourcesLogger } from '../../utils/logger.js';
import { loadBatchFile } from './batchFile.js';
import { fetchSheetAsXlsx } from './googleSheets.js';
import { parseWorkbook, readSheetRows, readWorkbookFile, workbookToReferenceSource } from './workbook.js';

export type ReferenceSourceName = 'old' | 'new';

/** Input side of a run; the pipeline never touches files directly */
export interface ReconciliationSources {
    loadBatch(): Promise<BatchTable>;
    loadReference(which: ReferenceSourceName): Promise<ReferenceSource>;
    loadVendorRegistry(): Promise<RegistryBuildResult>;
}

export type SourcePaths = Pick<PipelineConfig, 'paths' | 'newMasterSheetId' | 'vendorRegistrySheet'>;

export class FileSources implements ReconciliationSources {
    private newWorkbook: Promise<WorkBook> | null = null;

    constructor(private readonly config: SourcePaths) {}

    async loadBatch(): Promise<BatchTable> {
        return loadBatchFile(this.config.paths.uploadDir);
    }

    async loadReference(which: ReferenceSourceName): Promise<ReferenceSource> {
        const workbook = which === 'old'
            ? readWorkbookFile(this.config.paths.oldMasterFile)
            : await this.loadNewWorkbook();
        const name = which === 'old'
            ? path.basename(this.config.paths.oldMasterFile)
            : this.newWorkbookName();
        return workbookToReferenceSource(workbook, name, { excludeSheets: [this.config.vendorRegistrySheet] });
    }

    async loadVendorRegistry(): Promise<RegistryBuildResult> {
        const sheetName = this.config.vendorRegistrySheet;
        const rows = readSheetRows(await this.loadNewWorkbook(), sheetName);
        if (rows === null) {
            throw new ReconciliationError('MISSING_SOURCE', {
                message: `Vendor registry sheet '${sheetName}' not found in ${this.newWorkbookName()}`,
                context: { sheetName },
            });
        }
        const result = buildVendorRegistry(rows, sheetName);
        sourcesLogger.info({ prefixes: result.registry.size }, 'Vendor registry loaded');
        return result;
    }

    private newWorkbookName(): string {
        return this.config.newMasterSheetId !== null
            ? `Google Sheet ${this.config.newMasterSheetId}`
            : path.basename(this.config.paths.newMasterFile);
    }

    /** The new workbook feeds both the registry and a reference source; load it once */
    private loadNewWorkbook(): Promise<WorkBook> {
        if (this.newWorkbook === null) {
            const sheetId = this.config.newMasterSheetId;
            this.newWorkbook = sheetId !== null
                ? fetchSheetAsXlsx(sheetId).then((buffer) => parseWorkbook(buffer, this.newWorkbookName()))
                : Promise.resolve().then(() => readWorkbookFile(this.config.paths.newMasterFile));
        }
        return this.newWorkbook;
    }
}

export function createFileSources(config: SourcePaths): ReconciliationSources {
    return new FileSources(config);
}
