export { findBatchFile, loadBatchFile, parseBatchText } from './batchFile.js';
export { extractSheetId, fetchSheetAsXlsx, sheetExportUrl } from './googleSheets.js';
export {
    createFileSources,
    FileSources,
    type ReconciliationSources,
    type ReferenceSourceName,
    type SourcePaths,
} from './masterSheets.js';
export { parseWorkbook, readSheetRows, readWorkbookFile, toRawRows, workbookToReferenceSource } from './workbook.js';
