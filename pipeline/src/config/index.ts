/**
 * Pipeline Configuration
 *
 * Turns the validated environment (plus CLI overrides) into the immutable
 * `PipelineConfig` handed to `runUnshippedReconciliation`. Nothing below
 * reads `process.env` directly.
 *
 * STRUCTURE:
 * - env.ts        - Zod schema for every variable
 * - enrichment.ts - Attribute service batch/retry/timeout constants
 * - report.ts     - Output sheet names and dropped columns
 */

import os from 'node:os';
import path from 'node:path';
import { compileRemovedRowPattern } from '@unshipped/shared/domain';
import { ReconciliationError } from '@unshipped/shared/errors';
import type { Env } from './env.js';
import {
    ENRICHMENT_BATCH_SIZE,
    ENRICHMENT_CONCURRENCY,
    ENRICHMENT_MAX_ATTEMPTS,
    ENRICHMENT_RETRY_DELAY_MS,
    ENRICHMENT_TIMEOUT_MS,
} from './enrichment.js';

export { loadEnv, parseEnv, type Env } from './env.js';
export * from './enrichment.js';
export * from './report.js';

// ============================================
// TYPES
// ============================================

export interface EnrichmentSettings {
    enabled: boolean;
    apiUrl: string | null;
    apiKey: string | null;
    batchSize: number;
    maxAttempts: number;
    retryDelayMs: number;
    timeoutMs: number;
    concurrency: number;
}

export interface PipelineConfig {
    paths: {
        uploadDir: string;
        outputDir: string;
        oldDataDir: string;
        oldMasterFile: string;
        newMasterFile: string;
        reportFile: string;
    };
    /** Google Sheet id/URL of the new master workbook; null reads `paths.newMasterFile` */
    newMasterSheetId: string | null;
    vendorRegistrySheet: string;
    removedRowPattern: RegExp;
    vendorConcurrency: number;
    enrichment: EnrichmentSettings;
    bulkBuy: { enabled: boolean; minQuantity: number };
    summary: { timeZone: string; annotateTimeZone: boolean };
    notify: { discordWebhookUrl: string | null };
}

/** Values the CLI may set on top of the environment */
export interface PipelineOverrides {
    uploadDir?: string;
    outputDir?: string;
    enableEnrichment?: boolean;
    enableBulkBuyCheck?: boolean;
    notify?: boolean;
    vendorConcurrency?: number;
}

// ============================================
// BUILD
// ============================================

function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch {
        return false;
    }
}

export function buildPipelineConfig(env: Env, overrides: PipelineOverrides = {}): PipelineConfig {
    const basePath = path.resolve(env.BASE_PATH);
    const uploadDir = path.resolve(overrides.uploadDir ?? env.UPLOAD_DIR ?? path.join(basePath, 'Upload'));
    const outputDir = path.resolve(overrides.outputDir ?? env.OUTPUT_DIR ?? path.join(basePath, 'Output'));
    const oldDataDir = path.resolve(env.OLD_DATA_DIR ?? path.join(basePath, 'OLD_DATA'));

    const enrichmentEnabled = overrides.enableEnrichment ?? env.ENABLE_ENRICHMENT === 'true';
    if (enrichmentEnabled && !env.ENRICHMENT_API_URL) {
        throw new ReconciliationError('INVALID_CONFIG', {
            message: 'ENRICHMENT_API_URL is required when enrichment is enabled',
            context: { variable: 'ENRICHMENT_API_URL' },
        });
    }

    if (!isValidTimeZone(env.REPORT_TIMEZONE)) {
        throw new ReconciliationError('INVALID_CONFIG', {
            message: `REPORT_TIMEZONE '${env.REPORT_TIMEZONE}' is not a known time zone`,
            context: { variable: 'REPORT_TIMEZONE' },
        });
    }

    const vendorConcurrency = overrides.vendorConcurrency ?? env.VENDOR_CONCURRENCY ?? os.availableParallelism();
    if (!Number.isInteger(vendorConcurrency) || vendorConcurrency < 1) {
        throw new ReconciliationError('INVALID_CONFIG', {
            message: `Vendor concurrency must be a positive integer, got ${vendorConcurrency}`,
            context: { variable: 'VENDOR_CONCURRENCY' },
        });
    }

    const notifyEnabled = overrides.notify ?? true;

    return {
        paths: {
            uploadDir,
            outputDir,
            oldDataDir,
            oldMasterFile: path.join(oldDataDir, env.OLD_MASTER_FILE),
            newMasterFile: path.join(uploadDir, env.NEW_MASTER_FILE),
            reportFile: path.join(outputDir, env.REPORT_FILE_NAME),
        },
        newMasterSheetId: env.NEW_MASTER_SHEET_ID ?? null,
        vendorRegistrySheet: env.VENDOR_REGISTRY_SHEET,
        removedRowPattern: compileRemovedRowPattern(env.REMOVED_ROW_PATTERN),
        vendorConcurrency,
        enrichment: {
            enabled: enrichmentEnabled,
            apiUrl: env.ENRICHMENT_API_URL ?? null,
            apiKey: env.ENRICHMENT_API_KEY ?? null,
            batchSize: ENRICHMENT_BATCH_SIZE,
            maxAttempts: ENRICHMENT_MAX_ATTEMPTS,
            retryDelayMs: ENRICHMENT_RETRY_DELAY_MS,
            timeoutMs: ENRICHMENT_TIMEOUT_MS,
            concurrency: ENRICHMENT_CONCURRENCY,
        },
        bulkBuy: {
            enabled: overrides.enableBulkBuyCheck ?? env.ENABLE_BULK_BUY_CHECK === 'true',
            minQuantity: env.BULK_BUY_MIN_QUANTITY,
        },
        summary: {
            timeZone: env.REPORT_TIMEZONE,
            annotateTimeZone: env.ENABLE_TIMEZONE_ANNOTATION === 'true',
        },
        notify: {
            discordWebhookUrl: notifyEnabled ? (env.DISCORD_WEBHOOK_URL ?? null) : null,
        },
    };
}
