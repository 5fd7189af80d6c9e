import { describe, it, expect } from 'vitest';
import { annualizedRate, calculateApy, clampedYield, roundTo2 } from '../ApyCalculator';

describe('calculateApy', () => {
    it('annualizes linearly without compounding', () => {
        expect(calculateApy(1100n, 1000n, 86400)).toBe(3650);
    });

    it('scales with the window length', () => {
        // 1% over 30 days -> 365/30 % per year
        expect(calculateApy(1010n, 1000n, 2592000)).toBe(12.17);
    });

    it('is null when a sample is missing', () => {
        expect(calculateApy(null, 1000n, 86400)).toBeNull();
        expect(calculateApy(1000n, null, 86400)).toBeNull();
    });

    it('is null when the past stake is not positive', () => {
        expect(calculateApy(1000n, 0n, 86400)).toBeNull();
        expect(calculateApy(1000n, -5n, 86400)).toBeNull();
    });

    it('reports zero when stake shrank', () => {
        expect(calculateApy(900n, 1000n, 86400)).toBe(0);
    });
});

describe('clampedYield', () => {
    it('returns the growth', () => {
        expect(clampedYield(1100n, 1000n)).toBe(100n);
    });

    it('never goes negative', () => {
        expect(clampedYield(900n, 1000n)).toBe(0n);
    });

    it('keeps precision beyond 2^53', () => {
        expect(clampedYield(9_007_199_254_740_993n, 9_007_199_254_740_990n)).toBe(3n);
    });
});

describe('annualizedRate', () => {
    it('is null for a zero period', () => {
        expect(annualizedRate(100n, 1000n, 0)).toBeNull();
    });

    it('rounds to two decimals', () => {
        expect(roundTo2(1.005)).toBe(1);
        expect(roundTo2(2.346)).toBe(2.35);
    });
});
