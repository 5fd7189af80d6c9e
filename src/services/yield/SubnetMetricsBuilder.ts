import { BlockTimeEstimator } from './BlockTimeEstimator';
import { StakeSampler } from './StakeSampler';
import { calculateApy, clampedYield } from './ApyCalculator';
import { mapWindows, resolveWindows } from '../../types/yield';
import type { LookbackWindow, SubnetBuildResult, WindowMetrics } from '../../types/yield';

export const LAST_STAKE_OFFSET_BLOCKS = 5;

export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

/**
 * Samples one validator's stake on one subnet at the current block and at
 * each lookback window, then derives yields and APYs.
 */
export class SubnetMetricsBuilder {
    constructor(
        private readonly sampler: StakeSampler,
        private readonly estimator: BlockTimeEstimator
    ) {}

    public async buildSubnetRecord(
        participantId: string,
        subnetId: number,
        currentBlock: number,
        currentTimestamp: number = nowSeconds()
    ): Promise<SubnetBuildResult> {
        const latestStake = await this.sampler.getStake(participantId, subnetId, currentBlock);
        if (latestStake === null) {
            return { status: 'skipped', reason: 'unavailable' };
        }
        if (latestStake <= 0n) {
            return { status: 'skipped', reason: 'no-stake' };
        }

        // Windows are independent; the sampler never rejects, so one failing
        // window cannot take the others down.
        const lastStakeBlock = Math.max(1, currentBlock - LAST_STAKE_OFFSET_BLOCKS);
        const [lastStake, stakesAgo] = await Promise.all([
            this.sampler.getStake(participantId, subnetId, lastStakeBlock),
            resolveWindows(window => this.sampleWindow(participantId, subnetId, currentBlock, currentTimestamp, window))
        ]);

        const windows = mapWindows(window => this.buildWindowMetrics(latestStake, stakesAgo[window.key], window));

        return {
            status: 'built',
            record: {
                subnetId,
                latestStake,
                lastStake,
                windows
            }
        };
    }

    private sampleWindow(
        participantId: string,
        subnetId: number,
        currentBlock: number,
        currentTimestamp: number,
        window: LookbackWindow
    ): Promise<bigint | null> {
        const historicalBlock = this.estimator.blockSecondsAgo(currentBlock, currentTimestamp, window.seconds);
        return this.sampler.getStake(participantId, subnetId, historicalBlock);
    }

    private buildWindowMetrics(latestStake: bigint, stakeAgo: bigint | null, window: LookbackWindow): WindowMetrics {
        if (stakeAgo === null) {
            return { stakeAgo: null, yieldAmount: null, apy: null };
        }

        return {
            stakeAgo,
            yieldAmount: clampedYield(latestStake, stakeAgo),
            apy: calculateApy(latestStake, stakeAgo, window.seconds)
        };
    }
}
