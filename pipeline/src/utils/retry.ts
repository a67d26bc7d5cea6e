/**
 * Retry helper with a fixed delay between attempts.
 */

import type { Logger } from 'pino';
import { errorMessage } from '@unshipped/shared/errors';

export interface RetryOptions {
    /** Total attempts, first call included */
    attempts: number;
    delayMs: number;
    /** Label for log lines */
    context: string;
    logger?: Logger;
    /** Return false to stop retrying on this error */
    shouldRetry?: (error: unknown) => boolean;
    sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
    new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn` until it resolves or the attempts run out.
 * The last error is rethrown as-is.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, Math.floor(options.attempts));
    const wait = options.sleep ?? sleep;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error: unknown) {
            const retryable = options.shouldRetry?.(error) ?? true;
            if (!retryable || attempt >= attempts) {
                options.logger?.warn(
                    { context: options.context, error: errorMessage(error), attempt, retryable },
                    'Request failed - giving up'
                );
                throw error;
            }

            options.logger?.warn(
                { context: options.context, error: errorMessage(error), attempt, nextRetryMs: options.delayMs },
                'Request failed - retrying'
            );
            await wait(options.delayMs);
        }
    }
}
