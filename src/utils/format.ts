/**
 * Stake amounts leave the process as decimal strings so large values keep
 * their precision in JSON and in MongoDB.
 */
export function formatAmount(amount: bigint | null): string | null {
    return amount === null ? null : amount.toString();
}

export function formatApy(apy: number | null): string | null {
    return apy === null ? null : apy.toFixed(2);
}
