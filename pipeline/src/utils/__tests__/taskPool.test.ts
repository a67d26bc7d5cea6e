/**
 * Unit tests for the bounded task pool
 */

import { chunk, runSettled } from '../taskPool.js';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('runSettled', () => {
    it('returns results in input order regardless of finish order', async () => {
        const settled = await runSettled([30, 10, 20], 3, async (ms) => {
            await tick(ms);
            return ms;
        });
        expect(settled.map((s) => (s.status === 'fulfilled' ? s.value : null))).toEqual([30, 10, 20]);
    });

    it('never runs more than the limit at once', async () => {
        let active = 0;
        let peak = 0;
        await runSettled([1, 2, 3, 4, 5, 6], 2, async () => {
            active++;
            peak = Math.max(peak, active);
            await tick(5);
            active--;
        });
        expect(peak).toBe(2);
    });

    it('isolates a rejected unit from the others', async () => {
        const settled = await runSettled(['a', 'b', 'c'], 2, async (item) => {
            if (item === 'b') throw new Error('boom');
            return item.toUpperCase();
        });
        expect(settled[0]).toEqual({ status: 'fulfilled', value: 'A' });
        expect(settled[1].status).toBe('rejected');
        expect(settled[2]).toEqual({ status: 'fulfilled', value: 'C' });
    });

    it('passes the item index to the worker', async () => {
        const settled = await runSettled(['x', 'y'], 1, async (item, index) => `${item}${index}`);
        expect(settled).toEqual([
            { status: 'fulfilled', value: 'x0' },
            { status: 'fulfilled', value: 'y1' },
        ]);
    });

    it('treats a limit below one as one', async () => {
        const settled = await runSettled([1], 0, async (n) => n * 2);
        expect(settled).toEqual([{ status: 'fulfilled', value: 2 }]);
    });
});

describe('chunk', () => {
    it('splits into consecutive chunks with a short tail', () => {
        expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    });

    it('returns no chunks for empty input', () => {
        expect(chunk([], 10)).toEqual([]);
    });
});
