import type { IChainClient } from '../../clients/IChainClient';
import type { StakeHolder } from '../../types/yield';
import { errorMessage } from '../../types/errors';
import { withTimeout } from '../../utils/timeout';
import { logger } from '../../utils/logger';

export interface StakeSamplerOptions {
    timeoutMs: number;
    /**
     * Reuse stake-holder lists per (subnet, height). Every validator in a sweep
     * samples the same heights, so one sampler per sweep turns N identical
     * queries into one.
     */
    memoize?: boolean;
}

/**
 * Reads one participant's stake at a given subnet and height.
 * Every failure mode (timeout, chain error, participant missing) resolves to
 * null; nothing is retried here.
 */
export class StakeSampler {
    private readonly holders = new Map<string, Promise<StakeHolder[] | null>>();

    constructor(
        private readonly chainClient: IChainClient,
        private readonly options: StakeSamplerOptions
    ) {}

    public async getStake(participantId: string, subnetId: number, blockHeight: number): Promise<bigint | null> {
        const holders = await this.loadHolders(subnetId, blockHeight);
        if (!holders) {
            return null;
        }

        const entry = holders.find(holder => holder.participantId === participantId);
        return entry ? entry.stakeRaw : null;
    }

    public clear(): void {
        this.holders.clear();
    }

    private loadHolders(subnetId: number, blockHeight: number): Promise<StakeHolder[] | null> {
        if (!this.options.memoize) {
            return this.queryHolders(subnetId, blockHeight);
        }

        const key = `${subnetId}:${blockHeight}`;
        let pending = this.holders.get(key);
        if (!pending) {
            pending = this.queryHolders(subnetId, blockHeight);
            this.holders.set(key, pending);
        }
        return pending;
    }

    private async queryHolders(subnetId: number, blockHeight: number): Promise<StakeHolder[] | null> {
        try {
            return await withTimeout(
                this.chainClient.stakeHolders(subnetId, blockHeight),
                this.options.timeoutMs,
                `stakeHolders(${subnetId}, ${blockHeight})`
            );
        } catch (error) {
            logger.warn(`[StakeSampler] No stake data for subnet ${subnetId} at block ${blockHeight}: ${errorMessage(error)}`);
            return null;
        }
    }
}
