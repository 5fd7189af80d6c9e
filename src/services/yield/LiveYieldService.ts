import type { IChainClient } from '../../clients/IChainClient';
import type { LiveValidatorView } from '../../types/api';
import type { StoredSubnetYield } from '../../types/yield';
import { YieldDocumentMapper } from '../../database/mappers/YieldDocumentMapper';
import { BlockTimeEstimator } from './BlockTimeEstimator';
import { StakeSampler } from './StakeSampler';
import { SubnetMetricsBuilder, nowSeconds } from './SubnetMetricsBuilder';
import { aggregateValidator, formatAggregate } from './FleetAggregator';
import { scanSubnets } from './subnetScan';
import { ChainConnectionError, ChainTimeoutError, errorMessage } from '../../types/errors';
import { withTimeout } from '../../utils/timeout';
import { logger } from '../../utils/logger';

export interface LiveYieldOptions {
    timeoutMs: number;
    subnetConcurrency: number;
}

function asChainError(error: unknown, operation: string): Error {
    if (error instanceof ChainTimeoutError || error instanceof ChainConnectionError) {
        return error;
    }
    return new ChainConnectionError(`${operation} failed: ${errorMessage(error)}`, error);
}

/**
 * Computes one validator's metrics from the chain on request, through the same
 * builder and aggregator as the stored path. Nothing is persisted.
 */
export class LiveYieldService {
    constructor(
        private readonly chainClient: IChainClient,
        private readonly estimator: BlockTimeEstimator,
        private readonly options: LiveYieldOptions,
        private readonly clock: () => number = nowSeconds
    ) {}

    public async computeLive(hotkey: string): Promise<LiveValidatorView> {
        let block: number;
        let subnetIds: number[];
        try {
            block = await withTimeout(this.chainClient.currentBlockHeight(), this.options.timeoutMs, 'currentBlockHeight');
            subnetIds = await withTimeout(this.chainClient.enumerateSubnets(), this.options.timeoutMs, 'enumerateSubnets');
        } catch (error) {
            throw asChainError(error, 'Live yield lookup');
        }

        const timestamp = this.clock();
        const sampler = new StakeSampler(this.chainClient, { timeoutMs: this.options.timeoutMs, memoize: true });
        const builder = new SubnetMetricsBuilder(sampler, this.estimator);

        const scan = await scanSubnets(builder, hotkey, subnetIds, block, timestamp, this.options.subnetConcurrency);
        logger.debug(`[LiveYield] ${hotkey} at block ${block}: ${scan.records.length} active, ${scan.skipped} skipped`);

        const view = aggregateValidator(scan.records);
        const subnetsData: Record<string, StoredSubnetYield> = {};
        for (const record of scan.records) {
            subnetsData[String(record.subnetId)] = YieldDocumentMapper.toStoredSubnet(record);
        }

        return {
            hotkey,
            block,
            timestamp: new Date(timestamp * 1000).toISOString(),
            total_stake: (view.latestStake ?? 0n).toString(),
            subnetCount: view.subnetCount,
            ...formatAggregate(view),
            subnetsData
        };
    }
}
