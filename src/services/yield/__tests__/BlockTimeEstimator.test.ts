import { describe, it, expect } from 'vitest';
import { BlockTimeEstimator, estimateBlock } from '../BlockTimeEstimator';

const NOW = 1_700_000_000;

describe('estimateBlock', () => {
    it('steps back one block per interval', () => {
        expect(estimateBlock(1_000_000, NOW, NOW - 86400, 12)).toBe(992_800);
    });

    it('floors partial intervals', () => {
        expect(estimateBlock(1_000, NOW, NOW - 25, 12)).toBe(998);
    });

    it('never returns a height below 1', () => {
        expect(estimateBlock(100, NOW, NOW - 86400, 12)).toBe(1);
    });

    it('returns the current block for the current timestamp', () => {
        expect(estimateBlock(5_000, NOW, NOW, 12)).toBe(5_000);
    });
});

describe('BlockTimeEstimator', () => {
    it('derives window heights from the configured interval', () => {
        const estimator = new BlockTimeEstimator(12);

        expect(estimator.blockSecondsAgo(1_000_000, NOW, 3600)).toBe(999_700);
        expect(estimator.blockSecondsAgo(1_000_000, NOW, 604800)).toBe(949_600);
        expect(estimator.estimate(1_000_000, NOW, NOW - 86400)).toBe(992_800);
        expect(estimator.getBlockIntervalSeconds()).toBe(12);
    });

    it('rejects a non-positive interval', () => {
        expect(() => new BlockTimeEstimator(0)).toThrow('Block interval must be positive, got 0');
        expect(() => new BlockTimeEstimator(-12)).toThrow();
    });
});
