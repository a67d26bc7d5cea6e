/**
 * Bounded fan-out / fan-in over independent work units.
 *
 * Each unit settles on its own: a rejection never cancels the others, and
 * results come back in input order whatever order the units finish in.
 */

import pLimit from 'p-limit';

export async function runSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
    const limit = pLimit(Math.max(1, Math.floor(concurrency)));
    return Promise.allSettled(items.map((item, index) => limit(() => worker(item, index))));
}

/** Split into consecutive chunks of at most `size` */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    const step = Math.max(1, Math.floor(size));
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += step) {
        chunks.push(items.slice(i, i + step));
    }
    return chunks;
}
