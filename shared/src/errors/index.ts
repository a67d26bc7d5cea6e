/**
 * Shared Error Utilities
 */

export {
  RECONCILIATION_ERROR_CODES,
  type ReconciliationErrorCode,
  RECONCILIATION_ERROR_MESSAGES,
  getReconciliationErrorMessage,
  isFatalCode,
  ReconciliationError,
  isReconciliationError,
  errorMessage,
} from './reconciliation.js';
