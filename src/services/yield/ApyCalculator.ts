import { SECONDS_PER_DAY } from '../../types/yield';

export function roundTo2(value: number): number {
    return Number(value.toFixed(2));
}

/**
 * Linear (non-compounding) annualization of a yield observed over `periodSeconds`.
 * Returns null when there is no positive base to divide by.
 */
export function annualizedRate(yieldAmount: bigint, pastStake: bigint, periodSeconds: number): number | null {
    if (pastStake <= 0n || periodSeconds <= 0) {
        return null;
    }

    const periodDays = periodSeconds / SECONDS_PER_DAY;
    const annualYield = Number(yieldAmount) * (365 / periodDays);
    const apy = (annualYield / Number(pastStake)) * 100;

    return roundTo2(apy);
}

/**
 * Stake growth between two samples, never negative.
 * A validator that lost stake over the window reports zero yield, which hides
 * the reduction instead of producing a negative rate.
 */
export function clampedYield(currentStake: bigint, pastStake: bigint): bigint {
    const diff = currentStake - pastStake;
    return diff > 0n ? diff : 0n;
}

/**
 * APY percentage for one window, or null when either sample is missing or the
 * past stake is not positive. Null means "undefined", not "zero yield".
 */
export function calculateApy(
    currentStake: bigint | null,
    pastStake: bigint | null,
    periodSeconds: number
): number | null {
    if (currentStake === null || pastStake === null || pastStake <= 0n) {
        return null;
    }

    return annualizedRate(clampedYield(currentStake, pastStake), pastStake, periodSeconds);
}
