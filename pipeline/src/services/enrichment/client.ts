/**
 * SKU Enrichment Client
 *
 * Fetches attribute bags for a set of SKUs from the attribute service:
 * - SKUs are deduplicated and split into fixed-size batches
 * - batches run concurrently under a limit
 * - a failed call (transport error, timeout, `status: false`) is retried
 *   with a fixed delay; a batch that exhausts its attempts is dropped
 * - a response of the wrong shape drops its batch without retrying
 *
 * Dropped batches never fail the pass. They come back as `failedBatches`
 * plus one warning per failure kind.
 */

import {
    enrichmentResponseSchema,
    errorMessage,
    isReconciliationError,
    ReconciliationError,
    type AttributeBag,
    type EnrichmentResponse,
    type ReconciliationErrorCode,
    type RunWarning,
} from '@unshipped/shared';
import {
    ENRICHMENT_BATCH_SIZE,
    ENRICHMENT_CONCURRENCY,
    ENRICHMENT_MAX_ATTEMPTS,
    ENRICHMENT_RETRY_DELAY_MS,
} from '../../config/enrichment.js';
import { enrichmentLogger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { chunk, runSettled } from '../../utils/taskPool.js';

// ============================================
// TYPES
// ============================================

/**
 * One network call for a batch of SKUs. Resolves with the raw response body
 * (validated by the client) or rejects on transport failure.
 */
export type EnrichmentTransport = (skus: readonly string[]) => Promise<unknown>;

export interface EnrichmentClientOptions {
    batchSize: number;
    maxAttempts: number;
    retryDelayMs: number;
    concurrency: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface FailedBatch {
    index: number;
    skus: string[];
    code: ReconciliationErrorCode;
    reason: string;
}

export interface EnrichmentFetchResult {
    attributes: Map<string, AttributeBag>;
    batchCount: number;
    failedBatches: FailedBatch[];
    warnings: RunWarning[];
}

const DEFAULT_OPTIONS: EnrichmentClientOptions = {
    batchSize: ENRICHMENT_BATCH_SIZE,
    maxAttempts: ENRICHMENT_MAX_ATTEMPTS,
    retryDelayMs: ENRICHMENT_RETRY_DELAY_MS,
    concurrency: ENRICHMENT_CONCURRENCY,
};

// ============================================
// CLIENT
// ============================================

export class EnrichmentClient {
    private readonly options: EnrichmentClientOptions;

    constructor(
        private readonly transport: EnrichmentTransport,
        options: Partial<EnrichmentClientOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    async fetch(skus: Iterable<string>): Promise<EnrichmentFetchResult> {
        const unique = [...new Set(skus)].filter((sku) => sku !== '');
        const batches = chunk(unique, this.options.batchSize);
        const attributes = new Map<string, AttributeBag>();

        if (batches.length === 0) {
            return { attributes, batchCount: 0, failedBatches: [], warnings: [] };
        }

        enrichmentLogger.info(
            { skus: unique.length, batches: batches.length, concurrency: this.options.concurrency },
            'Fetching SKU attributes'
        );

        const settled = await runSettled(batches, this.options.concurrency, (batch, index) =>
            this.fetchBatch(batch, index)
        );

        const failedBatches: FailedBatch[] = [];
        settled.forEach((outcome, index) => {
            const batch = batches[index];
            if (outcome.status === 'fulfilled') {
                for (const sku of batch) {
                    if (Object.hasOwn(outcome.value.data, sku)) attributes.set(sku, outcome.value.data[sku]);
                }
                return;
            }
            const error: unknown = outcome.reason;
            failedBatches.push({
                index,
                skus: batch,
                code: isReconciliationError(error) ? error.code : 'ENRICHMENT_BATCH_FAILED',
                reason: errorMessage(error),
            });
        });

        const warnings = summarizeFailures(failedBatches, batches.length);
        for (const warning of warnings) {
            enrichmentLogger.warn({ code: warning.code, ...warning.context }, warning.message);
        }

        enrichmentLogger.info(
            { enriched: attributes.size, failedBatches: failedBatches.length },
            'SKU attributes fetched'
        );
        return { attributes, batchCount: batches.length, failedBatches, warnings };
    }

    private fetchBatch(batch: string[], index: number): Promise<EnrichmentResponse> {
        return withRetry(
            async () => {
                let raw: unknown;
                try {
                    raw = await this.transport(batch);
                } catch (error: unknown) {
                    throw new ReconciliationError('ENRICHMENT_BATCH_FAILED', {
                        message: errorMessage(error),
                        context: { batch: index },
                        cause: error,
                    });
                }

                const parsed = enrichmentResponseSchema.safeParse(raw);
                if (!parsed.success) {
                    throw new ReconciliationError('ENRICHMENT_RESPONSE_SHAPE', {
                        message: `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
                        context: { batch: index },
                    });
                }
                if (!parsed.data.status) {
                    throw new ReconciliationError('ENRICHMENT_BATCH_FAILED', {
                        message: 'Service answered with status false',
                        context: { batch: index },
                    });
                }
                return parsed.data;
            },
            {
                attempts: this.options.maxAttempts,
                delayMs: this.options.retryDelayMs,
                context: `enrichment batch ${index + 1} (${batch.length} skus)`,
                logger: enrichmentLogger,
                shouldRetry: (error) => !(isReconciliationError(error) && error.code === 'ENRICHMENT_RESPONSE_SHAPE'),
                sleep: this.options.sleep,
            }
        );
    }
}

/** One warning per failure code, naming how many batches and SKUs it cost */
function summarizeFailures(failed: readonly FailedBatch[], total: number): RunWarning[] {
    const byCode = new Map<ReconciliationErrorCode, FailedBatch[]>();
    for (const batch of failed) {
        const list = byCode.get(batch.code) ?? [];
        list.push(batch);
        byCode.set(batch.code, list);
    }

    return [...byCode.entries()].map(([code, batches]): RunWarning => {
        const skuCount = batches.reduce((sum, b) => sum + b.skus.length, 0);
        const what = code === 'ENRICHMENT_RESPONSE_SHAPE' ? 'returned an unexpected response' : 'failed after all retries';
        return {
            stage: 'enrichment',
            code,
            message: `${batches.length} of ${total} enrichment batches ${what}; ${skuCount} SKUs left without attributes`,
            context: { batches: batches.map((b) => b.index), reasons: batches.map((b) => b.reason) },
        };
    });
}
