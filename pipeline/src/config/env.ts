/**
 * Environment Variable Validation
 *
 * Every variable the run reads is declared here and validated with Zod.
 * An invalid value stops the run with INVALID_CONFIG before any input is touched.
 *
 * USAGE:
 * - `loadEnv()` loads `.env` (dotenv) and validates `process.env`
 * - `parseEnv(source)` validates an explicit record (tests, CLI overrides)
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add a JSDoc comment explaining the variable
 * 3. Thread it through `buildPipelineConfig` in ./index.ts
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ReconciliationError } from '@unshipped/shared/errors';
import {
    DEFAULT_BULK_BUY_MIN_QUANTITY,
    DEFAULT_REMOVED_ROW_PATTERN,
    DEFAULT_VENDOR_REGISTRY_SHEET,
} from '@unshipped/shared/domain';

// ============================================
// SCHEMA DEFINITION
// ============================================

const flag = (fallback: 'true' | 'false') => z.enum(['true', 'false']).default(fallback);

const envSchema = z.object({
    // ----------------------------------------
    // RUNTIME
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Pino level override */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // ----------------------------------------
    // PATHS
    // ----------------------------------------

    /** Root folder holding Upload/, Output/ and OLD_DATA/ */
    BASE_PATH: z.string().min(1).default('.'),

    /** Folder with the day's unshipped .txt extract and the new master workbook */
    UPLOAD_DIR: z.string().min(1).optional(),

    /** Folder the report workbook is written to */
    OUTPUT_DIR: z.string().min(1).optional(),

    /** Folder with the old master workbook */
    OLD_DATA_DIR: z.string().min(1).optional(),

    /** Old master workbook file name (inside OLD_DATA_DIR) */
    OLD_MASTER_FILE: z.string().min(1).default('OLD_Label_and_NonLabel_Vendors_Updated.xlsx'),

    /** New master workbook file name (inside UPLOAD_DIR) */
    NEW_MASTER_FILE: z.string().min(1).default('3rd-Party-Orders-Mastersheet.xlsx'),

    /** Google Sheet id or URL; when set, the new master workbook is downloaded instead of read from disk */
    NEW_MASTER_SHEET_ID: z.string().min(1).optional(),

    /** Sheet of the new master workbook holding the prefix → label registry */
    VENDOR_REGISTRY_SHEET: z.string().min(1).default(DEFAULT_VENDOR_REGISTRY_SHEET),

    /** Report workbook file name (inside OUTPUT_DIR) */
    REPORT_FILE_NAME: z.string().min(1).default('Optimized_Unshipped_Report.xlsx'),

    // ----------------------------------------
    // INTEGRATIONS
    // ----------------------------------------

    /** Discord webhook for the run summary; unset skips the notification */
    DISCORD_WEBHOOK_URL: z.string().url().optional(),

    /** SKU attribute service endpoint */
    ENRICHMENT_API_URL: z.string().url().optional(),

    /** API key sent to the attribute service */
    ENRICHMENT_API_KEY: z.string().optional(),

    // ----------------------------------------
    // FEATURE FLAGS
    // ----------------------------------------

    /** Fetch SKU attributes and merge them onto the partitions */
    ENABLE_ENRICHMENT: flag('false'),

    /** List orders with a large purchased quantity on their own sheet */
    ENABLE_BULK_BUY_CHECK: flag('false'),

    /** Minimum `quantity-purchased` for the bulk-buy sheet */
    BULK_BUY_MIN_QUANTITY: z.coerce.number().int().positive().default(DEFAULT_BULK_BUY_MIN_QUANTITY),

    /** Render the summary timestamp in REPORT_TIMEZONE with its zone label */
    ENABLE_TIMEZONE_ANNOTATION: flag('false'),

    /** IANA zone for the summary timestamp */
    REPORT_TIMEZONE: z.string().min(1).default('UTC'),

    // ----------------------------------------
    // TUNING
    // ----------------------------------------

    /** Regular expression matched against SKUs to split off return/adjustment rows */
    REMOVED_ROW_PATTERN: z.string().min(1).default(DEFAULT_REMOVED_ROW_PATTERN),

    /** Vendor task concurrency; defaults to available parallelism */
    VENDOR_CONCURRENCY: z.coerce.number().int().positive().optional(),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Validate a variable record. Empty strings count as unset so a blank
 * line in `.env` falls back to the default.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(source)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value;
    }

    const result = envSchema.safeParse(cleaned);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return `  - ${path}: ${issue.message}`;
        }).join('\n');

        throw new ReconciliationError('INVALID_CONFIG', {
            message: 'Environment validation failed:\n' + issues,
            context: { variables: result.error.issues.map((issue) => issue.path.join('.')) },
        });
    }
    return result.data;
}

/** Load `.env` into `process.env`, then validate it */
export function loadEnv(): Env {
    dotenv.config();
    return parseEnv(process.env);
}
