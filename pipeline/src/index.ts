/**
 * @unshipped/pipeline - one reconciliation run over the day's unshipped batch
 */

export {
    buildPipelineConfig,
    loadEnv,
    parseEnv,
    type Env,
    type EnrichmentSettings,
    type PipelineConfig,
    type PipelineOverrides,
    VENDOR_COUNT_HEADERS,
} from './config/index.js';
export {
    runUnshippedReconciliation,
    type EnrichmentOutcome,
    type PipelineDeps,
    type RunResult,
} from './services/reconciliation/runPipeline.js';
export { reconcileVendors, type VendorPoolResult } from './services/reconciliation/vendorPool.js';
export * from './services/enrichment/index.js';
export * from './services/sources/index.js';
export {
    buildReportSheets,
    writeReportWorkbook,
    type ReconciliationReport,
    type ReportSheet,
} from './services/report/workbookReport.js';
export {
    createDiscordNotifier,
    sendDiscordEmbed,
    type DiscordMessage,
    type Notifier,
    type NotifyOutcome,
} from './services/notify/discord.js';
export { default as logger } from './utils/logger.js';
