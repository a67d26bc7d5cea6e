/**
 * @unshipped/shared - domain logic, schemas and errors for the reconciliation run
 */

export type * from './types/index.js';
export * from './schemas/index.js';
export * from './errors/index.js';
export * from './domain/index.js';
