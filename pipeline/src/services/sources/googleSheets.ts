/**
 * Google Sheets workbook download
 *
 * Downloads a whole spreadsheet as .xlsx through the export URL.
 * No API key: the sheet must be shared with "anyone with the link".
 */

import { errorMessage, isReconciliationError, ReconciliationError } from '@unshipped/shared';
import { sourcesLogger } from '../../utils/logger.js';

const EXPORT_TIMEOUT_MS = 30_000;

/**
 * Extract the Google Sheet ID from a URL or bare ID string.
 *
 * Supported formats:
 * - https://docs.google.com/spreadsheets/d/SHEET_ID/edit#gid=0
 * - https://docs.google.com/spreadsheets/d/SHEET_ID/
 * - SHEET_ID (bare alphanumeric string, 20+ chars)
 */
export function extractSheetId(urlOrId: string): string {
    const trimmed = urlOrId.trim();

    const match = trimmed.match(/\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/);
    if (match) return match[1];

    if (/^[a-zA-Z0-9_-]{20,}$/.test(trimmed)) return trimmed;

    throw new ReconciliationError('INVALID_CONFIG', {
        message: `Invalid Google Sheets URL or ID: ${trimmed}`,
        context: { variable: 'NEW_MASTER_SHEET_ID' },
    });
}

export function sheetExportUrl(sheetId: string): string {
    return `https://docs.google.com/spreadsheets/d/${sheetId}/export?format=xlsx`;
}

/** Fetch the spreadsheet as .xlsx bytes */
export async function fetchSheetAsXlsx(urlOrId: string): Promise<Buffer> {
    const sheetId = extractSheetId(urlOrId);
    const url = sheetExportUrl(sheetId);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), EXPORT_TIMEOUT_MS);

    try {
        sourcesLogger.info({ sheetId }, 'Downloading master workbook from Google Sheets');
        const response = await fetch(url, { signal: controller.signal });

        if (!response.ok) {
            throw new ReconciliationError('MISSING_SOURCE', {
                message: response.status === 404
                    ? 'Sheet not found. Ensure the sheet is shared with "Anyone with the link".'
                    : `Failed to fetch sheet (HTTP ${response.status}): ${response.statusText}`,
                context: { sheetId, status: response.status },
            });
        }

        return Buffer.from(await response.arrayBuffer());
    } catch (error: unknown) {
        if (isReconciliationError(error)) throw error;
        throw new ReconciliationError('MISSING_SOURCE', {
            message: `Failed to download sheet ${sheetId}: ${errorMessage(error)}`,
            context: { sheetId },
            cause: error,
        });
    } finally {
        clearTimeout(timeout);
    }
}
