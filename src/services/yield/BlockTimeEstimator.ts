/**
 * Maps wall-clock timestamps to block heights assuming a fixed block interval.
 * No chain traversal is involved, so the estimate drifts when the real
 * block production rate deviates from the configured interval.
 */
export function estimateBlock(
    currentBlock: number,
    currentTimestamp: number,
    targetTimestamp: number,
    blockIntervalSeconds: number
): number {
    const diff = currentTimestamp - targetTimestamp;
    const blockDelta = Math.floor(diff * (1 / blockIntervalSeconds));
    return Math.max(1, currentBlock - blockDelta);
}

export class BlockTimeEstimator {
    constructor(private readonly blockIntervalSeconds: number) {
        if (!(blockIntervalSeconds > 0)) {
            throw new Error(`Block interval must be positive, got ${blockIntervalSeconds}`);
        }
    }

    public getBlockIntervalSeconds(): number {
        return this.blockIntervalSeconds;
    }

    /**
     * Estimated height of the block produced `secondsAgo` before the reference block
     */
    public blockSecondsAgo(currentBlock: number, currentTimestamp: number, secondsAgo: number): number {
        return estimateBlock(currentBlock, currentTimestamp, currentTimestamp - secondsAgo, this.blockIntervalSeconds);
    }

    public estimate(currentBlock: number, currentTimestamp: number, targetTimestamp: number): number {
        return estimateBlock(currentBlock, currentTimestamp, targetTimestamp, this.blockIntervalSeconds);
    }
}
