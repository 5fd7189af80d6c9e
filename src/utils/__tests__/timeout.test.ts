import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../timeout';
import { ChainTimeoutError } from '../../types/errors';
import { formatAmount, formatApy } from '../format';

afterEach(() => {
    vi.useRealTimers();
});

describe('withTimeout', () => {
    it('resolves with the operation result', async () => {
        await expect(withTimeout(Promise.resolve(7), 1000, 'fast')).resolves.toBe(7);
    });

    it('rejects with ChainTimeoutError once the budget is spent', async () => {
        vi.useFakeTimers();
        const pending = withTimeout(new Promise<number>(() => undefined), 500, 'slow query');
        const assertion = expect(pending).rejects.toThrow('Chain query "slow query" timed out after 500ms');

        await vi.advanceTimersByTimeAsync(500);
        await assertion;
        await expect(pending).rejects.toBeInstanceOf(ChainTimeoutError);
    });

    it('passes operation errors through', async () => {
        await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'failing')).rejects.toThrow('boom');
    });
});

describe('format helpers', () => {
    it('renders amounts as decimal strings', () => {
        expect(formatAmount(12_345_678_901_234_567_890n)).toBe('12345678901234567890');
        expect(formatAmount(null)).toBeNull();
    });

    it('renders APYs with two decimals', () => {
        expect(formatApy(3650)).toBe('3650.00');
        expect(formatApy(12.17)).toBe('12.17');
        expect(formatApy(null)).toBeNull();
    });
});
