/**
 * Domain Layer
 *
 * Pure reconciliation logic. No I/O: loaders, report writers and the
 * enrichment transport live in the pipeline package.
 */

export * from './constants.js';
export * from './columns.js';
export * from './summary.js';
export * from './vendors/classifier.js';
export * from './orders/ingest.js';
export * from './knowledge/knowledgeBase.js';
export * from './reconciliation/reconcileVendor.js';
export * from './reconciliation/aggregate.js';
export * from './reconciliation/bulkBuy.js';
export * from './enrichment/merge.js';
