/**
 * Shared Zod schemas
 */

export * from './orders.js';
export * from './enrichment.js';
