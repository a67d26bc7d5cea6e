/**
 * Enrichment Client Configuration
 *
 * Batch sizing, retry and timeout settings for the SKU attribute service.
 *
 * TO CHANGE ENRICHMENT SETTINGS:
 * Update the values below, or pass overrides to `new EnrichmentClient(transport, options)`.
 */

// ============================================
// API SETTINGS
// ============================================

/**
 * Maximum SKUs per attribute request
 */
export const ENRICHMENT_BATCH_SIZE = 50;

/**
 * API request timeout (ms)
 */
export const ENRICHMENT_TIMEOUT_MS = 30_000;

// ============================================
// RETRY
// ============================================

/**
 * Total attempts per batch, first call included
 */
export const ENRICHMENT_MAX_ATTEMPTS = 3;

/**
 * Fixed delay between attempts (ms)
 */
export const ENRICHMENT_RETRY_DELAY_MS = 2_000;

// ============================================
// CONCURRENCY
// ============================================

/**
 * Batches in flight at once
 */
export const ENRICHMENT_CONCURRENCY = 4;
