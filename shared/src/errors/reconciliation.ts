/**
 * Reconciliation Error Codes and Messages
 *
 * Every failure the pipeline can raise carries one of these codes.
 * Fatal codes stop the run; the rest degrade a single vendor or batch
 * and surface as warnings next to the final summary.
 */

// ============================================
// ERROR CODES
// ============================================

export const RECONCILIATION_ERROR_CODES = {
  // Setup (fatal)
  MISSING_SOURCE: 'MISSING_SOURCE',
  MISSING_COLUMN: 'MISSING_COLUMN',
  INVALID_RECORD: 'INVALID_RECORD',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Partition-local
  REFERENCE_SHEET_UNREADABLE: 'REFERENCE_SHEET_UNREADABLE',
  VENDOR_FAILED: 'VENDOR_FAILED',

  // Enrichment
  ENRICHMENT_BATCH_FAILED: 'ENRICHMENT_BATCH_FAILED',
  ENRICHMENT_RESPONSE_SHAPE: 'ENRICHMENT_RESPONSE_SHAPE',
} as const;

export type ReconciliationErrorCode =
  (typeof RECONCILIATION_ERROR_CODES)[keyof typeof RECONCILIATION_ERROR_CODES];

const FATAL_CODES: ReadonlySet<ReconciliationErrorCode> = new Set([
  RECONCILIATION_ERROR_CODES.MISSING_SOURCE,
  RECONCILIATION_ERROR_CODES.MISSING_COLUMN,
  RECONCILIATION_ERROR_CODES.INVALID_RECORD,
  RECONCILIATION_ERROR_CODES.INVALID_CONFIG,
]);

// ============================================
// ERROR MESSAGES
// ============================================

export const RECONCILIATION_ERROR_MESSAGES: Record<ReconciliationErrorCode, string> = {
  [RECONCILIATION_ERROR_CODES.MISSING_SOURCE]: 'A required input source was not found',
  [RECONCILIATION_ERROR_CODES.MISSING_COLUMN]: 'A required column is missing from the input',
  [RECONCILIATION_ERROR_CODES.INVALID_RECORD]: 'An input record is missing its order id',
  [RECONCILIATION_ERROR_CODES.INVALID_CONFIG]: 'The run configuration is invalid',
  [RECONCILIATION_ERROR_CODES.REFERENCE_SHEET_UNREADABLE]: 'A reference sheet could not be read',
  [RECONCILIATION_ERROR_CODES.VENDOR_FAILED]: 'Vendor reconciliation failed',
  [RECONCILIATION_ERROR_CODES.ENRICHMENT_BATCH_FAILED]: 'An enrichment batch failed after all retries',
  [RECONCILIATION_ERROR_CODES.ENRICHMENT_RESPONSE_SHAPE]: 'The enrichment service returned an unexpected response',
};

export function getReconciliationErrorMessage(code: ReconciliationErrorCode): string {
  return RECONCILIATION_ERROR_MESSAGES[code];
}

export function isFatalCode(code: ReconciliationErrorCode): boolean {
  return FATAL_CODES.has(code);
}

// ============================================
// ERROR CLASS
// ============================================

/**
 * Structured error for the reconciliation run.
 * `message` names the concrete resource; `summary` is the generic text for the code.
 */
export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;
  readonly summary: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ReconciliationErrorCode,
    options?: {
      message?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    const summary = getReconciliationErrorMessage(code);
    super(options?.message || summary, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ReconciliationError';
    this.code = code;
    this.summary = summary;
    this.context = options?.context;
    Object.setPrototypeOf(this, ReconciliationError.prototype);
  }

  get fatal(): boolean {
    return isFatalCode(this.code);
  }
}

export function isReconciliationError(error: unknown): error is ReconciliationError {
  return error instanceof ReconciliationError;
}

/** Message text of any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
