/**
 * Unit tests for environment validation and PipelineConfig building
 */

import path from 'node:path';
import { ReconciliationError } from '@unshipped/shared';
import { buildPipelineConfig, getDroppedReportColumns, parseEnv } from '../index.js';

describe('parseEnv', () => {
    it('applies defaults for an empty environment', () => {
        const env = parseEnv({});
        expect(env.NODE_ENV).toBe('development');
        expect(env.VENDOR_REGISTRY_SHEET).toBe('Overall vendors');
        expect(env.REMOVED_ROW_PATTERN).toBe('RET|INV');
        expect(env.ENABLE_ENRICHMENT).toBe('false');
        expect(env.BULK_BUY_MIN_QUANTITY).toBe(5);
        expect(env.REPORT_TIMEZONE).toBe('UTC');
    });

    it('treats blank values as unset', () => {
        expect(parseEnv({ REPORT_TIMEZONE: '  ' }).REPORT_TIMEZONE).toBe('UTC');
    });

    it('coerces numeric variables', () => {
        const env = parseEnv({ VENDOR_CONCURRENCY: '3', BULK_BUY_MIN_QUANTITY: '10' });
        expect(env.VENDOR_CONCURRENCY).toBe(3);
        expect(env.BULK_BUY_MIN_QUANTITY).toBe(10);
    });

    it('throws INVALID_CONFIG naming every bad variable', () => {
        let caught: unknown;
        try {
            parseEnv({ ENABLE_ENRICHMENT: 'yes', DISCORD_WEBHOOK_URL: 'not a url' });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ReconciliationError);
        expect(caught).toMatchObject({
            code: 'INVALID_CONFIG',
            context: { variables: ['DISCORD_WEBHOOK_URL', 'ENABLE_ENRICHMENT'] },
        });
    });
});

describe('buildPipelineConfig', () => {
    it('derives the folder layout from BASE_PATH', () => {
        const config = buildPipelineConfig(parseEnv({ BASE_PATH: '/data/recon', VENDOR_CONCURRENCY: '2' }));
        expect(config.paths).toEqual({
            uploadDir: path.resolve('/data/recon/Upload'),
            outputDir: path.resolve('/data/recon/Output'),
            oldDataDir: path.resolve('/data/recon/OLD_DATA'),
            oldMasterFile: path.join(path.resolve('/data/recon/OLD_DATA'), 'OLD_Label_and_NonLabel_Vendors_Updated.xlsx'),
            newMasterFile: path.join(path.resolve('/data/recon/Upload'), '3rd-Party-Orders-Mastersheet.xlsx'),
            reportFile: path.join(path.resolve('/data/recon/Output'), 'Optimized_Unshipped_Report.xlsx'),
        });
        expect(config.vendorConcurrency).toBe(2);
        expect(config.removedRowPattern.source).toBe('RET|INV');
    });

    it('lets overrides win over the environment', () => {
        const config = buildPipelineConfig(
            parseEnv({
                UPLOAD_DIR: '/env/upload',
                ENABLE_BULK_BUY_CHECK: 'false',
                DISCORD_WEBHOOK_URL: 'https://discord.example/hook',
            }),
            { uploadDir: '/cli/upload', enableBulkBuyCheck: true, notify: false, vendorConcurrency: 1 }
        );
        expect(config.paths.uploadDir).toBe(path.resolve('/cli/upload'));
        expect(config.bulkBuy.enabled).toBe(true);
        expect(config.notify.discordWebhookUrl).toBeNull();
        expect(config.vendorConcurrency).toBe(1);
    });

    it('requires an API URL when enrichment is on', () => {
        expect(() => buildPipelineConfig(parseEnv({ ENABLE_ENRICHMENT: 'true' }))).toThrow(
            'ENRICHMENT_API_URL is required when enrichment is enabled'
        );
    });

    it('carries the enrichment tuning constants', () => {
        const config = buildPipelineConfig(parseEnv({
            ENABLE_ENRICHMENT: 'true',
            ENRICHMENT_API_URL: 'https://attributes.example/skus',
            ENRICHMENT_API_KEY: 'test-secret',
        }));
        expect(config.enrichment).toEqual({
            enabled: true,
            apiUrl: 'https://attributes.example/skus',
            apiKey: 'test-secret',
            batchSize: 50,
            maxAttempts: 3,
            retryDelayMs: 2000,
            timeoutMs: 30000,
            concurrency: 4,
        });
    });

    it('rejects an unknown report time zone', () => {
        expect(() => buildPipelineConfig(parseEnv({ REPORT_TIMEZONE: 'Mars/Olympus' }))).toThrow(ReconciliationError);
    });

    it('rejects an invalid removed-row pattern', () => {
        expect(() => buildPipelineConfig(parseEnv({ REMOVED_ROW_PATTERN: '[' }))).toThrow(/not a valid regular expression/);
    });
});

describe('getDroppedReportColumns', () => {
    it('loads the marketplace columns left off vendor sheets', () => {
        const columns = getDroppedReportColumns();
        expect(columns).toHaveLength(54);
        expect(columns[0]).toBe('order-item-id');
        expect(columns).toContain('buyer-email');
        expect(columns).not.toContain('sku');
    });
});
