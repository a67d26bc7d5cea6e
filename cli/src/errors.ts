import { errorMessage, isReconciliationError } from '@unshipped/shared';
import { error } from './format.js';

/** Print a failed command and set exit code 1 */
export function reportFailure(err: unknown): void {
  if (isReconciliationError(err)) {
    error(`${err.code}: ${err.message}`);
  } else {
    error(errorMessage(err));
    if (err instanceof Error && err.stack) console.error(err.stack);
  }
  process.exitCode = 1;
}
