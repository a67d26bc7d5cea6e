/**
 * Unshipped Order Reconciliation Run
 *
 * One pass over the day's batch:
 *   1. Ingest the batch (removed rows split off, intra-batch dedup)
 *   2. Load old + new reference workbooks and the vendor registry
 *   3. Reconcile every vendor in a bounded task group
 *   4. Aggregate into Label / Non-Label / Unknown partitions
 *   5. Enrich the known partitions (optional)
 *   6. Bulk-buy check (optional)
 *   7. Write the report workbook, then send the summary notification
 *
 * Setup failures (missing file, column or order id) throw a fatal
 * ReconciliationError before anything is written. Everything after that
 * degrades and ends up in `warnings`.
 */

import {
    aggregateResults,
    buildKnowledgeBase,
    buildRunSummary,
    countDistinctOrders,
    createVendorClassifier,
    findBulkBuyOrders,
    formatRunTimestamp,
    ingestBatch,
    mergeEnrichment,
    ReconciliationError,
    withoutEnrichment,
    type AggregateResult,
    type EnrichedOrder,
    type OrderRecord,
    type RemovedRow,
    type RunSummaryCounts,
    type RunWarning,
} from '@unshipped/shared';
import type { PipelineConfig } from '../../config/index.js';
import { EnrichmentClient, createHttpEnrichmentTransport, type FailedBatch } from '../enrichment/index.js';
import {
    COLOR_SUCCESS,
    COLOR_WARNING,
    createDiscordNotifier,
    SUMMARY_TITLE,
    type Notifier,
    type NotifyOutcome,
} from '../notify/discord.js';
import { writeReportWorkbook, type ReconciliationReport } from '../report/workbookReport.js';
import type { ReconciliationSources } from '../sources/index.js';
import { pipelineLogger } from '../../utils/logger.js';
import { reconcileVendors } from './vendorPool.js';

// ============================================
// TYPES
// ============================================

export interface PipelineDeps {
    sources: ReconciliationSources;
    /** Defaults to an HTTP client built from `config.enrichment` */
    enrichmentClient?: EnrichmentClient;
    /** Defaults to the Discord webhook from `config.notify` */
    notify?: Notifier;
    /** Defaults to writing the xlsx workbook at `config.paths.reportFile` */
    writeReport?: (report: ReconciliationReport, filePath: string) => void;
    now?: () => Date;
}

export interface EnrichmentOutcome {
    requestedSkus: number;
    enrichedSkus: number;
    batchCount: number;
    failedBatches: FailedBatch[];
}

export interface RunResult {
    summary: string;
    counts: RunSummaryCounts;
    aggregate: AggregateResult;
    report: ReconciliationReport;
    removedRows: RemovedRow[];
    duplicateRows: OrderRecord[];
    /** null when enrichment was off */
    enrichment: EnrichmentOutcome | null;
    reportFile: string;
    notification: NotifyOutcome;
    warnings: RunWarning[];
}

// ============================================
// HELPERS
// ============================================

function defaultEnrichmentClient(config: PipelineConfig): EnrichmentClient {
    const { apiUrl, apiKey, timeoutMs, batchSize, maxAttempts, retryDelayMs, concurrency } = config.enrichment;
    if (!apiUrl) {
        throw new ReconciliationError('INVALID_CONFIG', {
            message: 'ENRICHMENT_API_URL is required when enrichment is enabled',
            context: { variable: 'ENRICHMENT_API_URL' },
        });
    }
    return new EnrichmentClient(
        createHttpEnrichmentTransport({ apiUrl, apiKey, timeoutMs }),
        { batchSize, maxAttempts, retryDelayMs, concurrency }
    );
}

async function enrichPartitions(
    aggregate: AggregateResult,
    client: EnrichmentClient
): Promise<{ labelVendors: EnrichedOrder[]; nonLabelVendors: EnrichedOrder[]; outcome: EnrichmentOutcome; warnings: RunWarning[] }> {
    const { labelVendors, nonLabelVendors } = aggregate.partitions;
    const skus = new Set([...labelVendors, ...nonLabelVendors].map((order) => order.sku));

    const fetched = await client.fetch(skus);
    return {
        labelVendors: mergeEnrichment(labelVendors, fetched.attributes),
        nonLabelVendors: mergeEnrichment(nonLabelVendors, fetched.attributes),
        outcome: {
            requestedSkus: skus.size,
            enrichedSkus: fetched.attributes.size,
            batchCount: fetched.batchCount,
            failedBatches: fetched.failedBatches,
        },
        warnings: fetched.warnings,
    };
}

// ============================================
// RUN
// ============================================

export async function runUnshippedReconciliation(config: PipelineConfig, deps: PipelineDeps): Promise<RunResult> {
    const now = deps.now ?? (() => new Date());
    const warnings: RunWarning[] = [];

    // 1. Batch
    pipelineLogger.info('Loading unshipped batch');
    const batch = await deps.sources.loadBatch();
    const ingested = ingestBatch(batch, { removedRowPattern: config.removedRowPattern });
    pipelineLogger.info(
        {
            orders: ingested.orders.length,
            removed: ingested.removedRows.length,
            duplicates: ingested.duplicateRows.length,
        },
        'Batch ingested'
    );

    // 2. Reference data
    pipelineLogger.info('Loading master workbooks and vendor registry');
    const [oldSource, newSource, registry] = await Promise.all([
        deps.sources.loadReference('old'),
        deps.sources.loadReference('new'),
        deps.sources.loadVendorRegistry(),
    ]);
    warnings.push(...registry.warnings);

    const kb = buildKnowledgeBase([oldSource, newSource], { excludeSheets: [config.vendorRegistrySheet] });
    warnings.push(...kb.warnings);
    for (const warning of [...registry.warnings, ...kb.warnings]) {
        pipelineLogger.warn({ code: warning.code, ...warning.context }, warning.message);
    }
    pipelineLogger.info({ labelTypes: kb.knowledgeBase.labelTypes() }, 'Knowledge base built');

    // 3. Vendors
    const pool = await reconcileVendors(
        ingested.orders,
        { classifier: createVendorClassifier(registry.registry), knowledgeBase: kb.knowledgeBase },
        config.vendorConcurrency
    );
    warnings.push(...pool.warnings);

    // 4. Partitions
    const aggregate = aggregateResults(pool.results);
    const { partitions } = aggregate;
    pipelineLogger.info(
        {
            labelVendors: partitions.labelVendors.length,
            nonLabelVendors: partitions.nonLabelVendors.length,
            unknown: partitions.unknown.length,
            newSkus: aggregate.newSkuOrders.length,
        },
        'Partitions built'
    );

    // 5. Enrichment
    let labelVendors = withoutEnrichment(partitions.labelVendors);
    let nonLabelVendors = withoutEnrichment(partitions.nonLabelVendors);
    let enrichment: EnrichmentOutcome | null = null;
    if (config.enrichment.enabled) {
        const enriched = await enrichPartitions(aggregate, deps.enrichmentClient ?? defaultEnrichmentClient(config));
        labelVendors = enriched.labelVendors;
        nonLabelVendors = enriched.nonLabelVendors;
        enrichment = enriched.outcome;
        warnings.push(...enriched.warnings);
    }

    // 6. Bulk buys
    const bulkBuyOrders = config.bulkBuy.enabled
        ? findBulkBuyOrders(
            [...partitions.labelVendors, ...partitions.nonLabelVendors, ...partitions.unknown],
            config.bulkBuy.minQuantity
        )
        : null;

    // 7. Report + notification
    const report: ReconciliationReport = {
        labelVendors,
        nonLabelVendors,
        unknown: withoutEnrichment(partitions.unknown),
        skuOrderCounts: aggregate.skuOrderCounts,
        vendorOrderCounts: aggregate.vendorOrderCounts,
        newSkuOrders: aggregate.newSkuOrders,
        removedRows: ingested.removedRows,
        bulkBuyOrders,
    };
    const writeReport = deps.writeReport ?? ((r: ReconciliationReport, file: string) => {
        writeReportWorkbook(r, file);
    });
    writeReport(report, config.paths.reportFile);

    const counts: RunSummaryCounts = {
        labelVendorOrders: countDistinctOrders(partitions.labelVendors),
        nonLabelVendorOrders: countDistinctOrders(partitions.nonLabelVendors),
        totalOrders: countDistinctOrders([...partitions.labelVendors, ...partitions.nonLabelVendors]),
        newSkuOrders: aggregate.newSkuOrders.length,
        removedRows: ingested.removedRows.length,
        ...(bulkBuyOrders !== null ? { bulkBuyOrders: bulkBuyOrders.length } : {}),
        warnings: warnings.length,
    };
    const timestamp = formatRunTimestamp(now(), {
        timeZone: config.summary.timeZone,
        annotateTimeZone: config.summary.annotateTimeZone,
    });
    const summary = buildRunSummary(counts, timestamp);

    const notify = deps.notify ?? createDiscordNotifier(config.notify.discordWebhookUrl);
    const notification = await notify({
        title: SUMMARY_TITLE,
        description: summary,
        color: warnings.length > 0 ? COLOR_WARNING : COLOR_SUCCESS,
    });
    if (notification === 'failed') {
        warnings.push({
            stage: 'notify',
            code: 'NOTIFICATION_FAILED',
            message: 'The summary notification could not be delivered',
        });
    }

    pipelineLogger.info({ ...counts, warnings: warnings.length, reportFile: config.paths.reportFile }, 'Run complete');

    return {
        summary,
        counts,
        aggregate,
        report,
        removedRows: ingested.removedRows,
        duplicateRows: ingested.duplicateRows,
        enrichment,
        reportFile: config.paths.reportFile,
        notification,
        warnings,
    };
}
