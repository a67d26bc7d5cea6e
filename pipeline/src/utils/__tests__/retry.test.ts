/**
 * Unit tests for the fixed-delay retry helper
 */

import { withRetry } from '../retry.js';

describe('withRetry', () => {
    const base = { delayMs: 2000, context: 'test' };

    it('returns the first successful result without sleeping', async () => {
        const sleep = vi.fn(async () => {});
        const result = await withRetry(async () => 'ok', { ...base, attempts: 3, sleep });
        expect(result).toBe('ok');
        expect(sleep).not.toHaveBeenCalled();
    });

    it('retries with the fixed delay until a call succeeds', async () => {
        const sleep = vi.fn(async (_ms: number) => {});
        const fn = vi.fn(async (attempt: number) => {
            if (attempt < 3) throw new Error(`fail ${attempt}`);
            return attempt;
        });

        await expect(withRetry(fn, { ...base, attempts: 3, sleep })).resolves.toBe(3);
        expect(fn).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls).toEqual([[2000], [2000]]);
    });

    it('rethrows the last error once attempts run out', async () => {
        const sleep = vi.fn(async () => {});
        let calls = 0;
        const fn = async () => {
            calls++;
            throw new Error(`fail ${calls}`);
        };

        await expect(withRetry(fn, { ...base, attempts: 3, sleep })).rejects.toThrow('fail 3');
        expect(calls).toBe(3);
        expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('stops at once when shouldRetry says no', async () => {
        const sleep = vi.fn(async () => {});
        let calls = 0;
        const fn = async () => {
            calls++;
            throw new Error('fatal');
        };

        await expect(withRetry(fn, { ...base, attempts: 5, sleep, shouldRetry: () => false })).rejects.toThrow('fatal');
        expect(calls).toBe(1);
        expect(sleep).not.toHaveBeenCalled();
    });
});
