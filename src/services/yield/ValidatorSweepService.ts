import { v4 as uuidv4 } from 'uuid';
import type { IChainClient } from '../../clients/IChainClient';
import type { IValidatorYieldRepository } from '../../database/repositories/IValidatorYieldRepository';
import type { IValidatorMetadataRepository } from '../../database/repositories/IValidatorMetadataRepository';
import type { ValidatorMetadata } from '../../types/metadata';
import type { SubnetYieldRecord } from '../../types/yield';
import { YieldDocumentMapper } from '../../database/mappers/YieldDocumentMapper';
import { BlockTimeEstimator } from './BlockTimeEstimator';
import { StakeSampler } from './StakeSampler';
import { SubnetMetricsBuilder, nowSeconds } from './SubnetMetricsBuilder';
import { scanSubnets } from './subnetScan';
import { withTimeout } from '../../utils/timeout';
import { errorMessage } from '../../types/errors';
import { logger } from '../../utils/logger';

export interface SweepOptions {
    timeoutMs: number;
    subnetConcurrency: number;
}

export type SweepStatus = 'completed' | 'aborted';

export interface SweepSummary {
    sweepId: string;
    status: SweepStatus;
    reason: string | null;
    block: number | null;
    validatorsProcessed: number;
    validatorsFailed: number;
    activeSubnets: number;
    skipped: number;
    failedSubnets: number;
    durationMs: number;
}

/**
 * One pass over every known validator and every subnet: sample, derive, upsert.
 * All validators in a sweep share one block, one timestamp and one sampler.
 */
export class ValidatorSweepService {
    constructor(
        private readonly chainClient: IChainClient,
        private readonly yieldRepository: IValidatorYieldRepository,
        private readonly metadataRepository: IValidatorMetadataRepository,
        private readonly estimator: BlockTimeEstimator,
        private readonly options: SweepOptions,
        private readonly clock: () => number = nowSeconds
    ) {}

    public async runSweep(): Promise<SweepSummary> {
        const sweepId = uuidv4();
        const startedAt = Date.now();
        const summary: SweepSummary = {
            sweepId,
            status: 'completed',
            reason: null,
            block: null,
            validatorsProcessed: 0,
            validatorsFailed: 0,
            activeSubnets: 0,
            skipped: 0,
            failedSubnets: 0,
            durationMs: 0
        };

        const finish = (status: SweepStatus, reason: string | null): SweepSummary => {
            summary.status = status;
            summary.reason = reason;
            summary.durationMs = Date.now() - startedAt;
            return summary;
        };

        const validators = await this.metadataRepository.findAll();
        if (validators.length === 0) {
            logger.warn(`[ValidatorSweep] ${sweepId} No validator metadata found, run the metadata sync first`);
            return finish('aborted', 'no validator metadata');
        }

        let block: number;
        let subnetIds: number[];
        try {
            block = await withTimeout(this.chainClient.currentBlockHeight(), this.options.timeoutMs, 'currentBlockHeight');
            subnetIds = await withTimeout(this.chainClient.enumerateSubnets(), this.options.timeoutMs, 'enumerateSubnets');
        } catch (error) {
            logger.logError(error, `[ValidatorSweep] ${sweepId} Chain unavailable, sweep aborted`);
            return finish('aborted', `chain unavailable: ${errorMessage(error)}`);
        }

        summary.block = block;
        const timestamp = this.clock();
        const lastUpdated = new Date(timestamp * 1000).toISOString();
        logger.info(`[ValidatorSweep] ${sweepId} Starting at block ${block}: ${validators.length} validators, ${subnetIds.length} subnets`);

        const sampler = new StakeSampler(this.chainClient, { timeoutMs: this.options.timeoutMs, memoize: true });
        const builder = new SubnetMetricsBuilder(sampler, this.estimator);

        try {
            for (const metadata of validators) {
                try {
                    const scan = await scanSubnets(
                        builder,
                        metadata.hotkey,
                        subnetIds,
                        block,
                        timestamp,
                        this.options.subnetConcurrency,
                        this.createWriter(metadata, lastUpdated)
                    );
                    summary.validatorsProcessed++;
                    summary.activeSubnets += scan.records.length;
                    summary.skipped += scan.skipped;
                    summary.failedSubnets += scan.failed;
                    if (scan.records.length > 0) {
                        logger.debug(`[ValidatorSweep] ${sweepId} ${metadata.hotkey}: ${scan.records.length} active subnets`);
                    }
                } catch (error) {
                    summary.validatorsFailed++;
                    logger.logError(error, `[ValidatorSweep] ${sweepId} Validator ${metadata.hotkey} failed`);
                }
            }
        } finally {
            sampler.clear();
        }

        finish('completed', null);
        logger.info(
            `[ValidatorSweep] ${sweepId} Completed in ${summary.durationMs}ms: ` +
            `${summary.validatorsProcessed} validators, ${summary.activeSubnets} active subnets, ${summary.skipped} skipped`
        );
        return summary;
    }

    /**
     * Persists records as they are built. The validator's base document is
     * written once, before its first subnet record.
     */
    private createWriter(metadata: ValidatorMetadata, lastUpdated: string): (record: SubnetYieldRecord) => Promise<void> {
        let baseWrite: Promise<void> | null = null;

        return async record => {
            if (!baseWrite) {
                baseWrite = this.yieldRepository.upsertValidatorBase(
                    YieldDocumentMapper.toBaseDocument(metadata, lastUpdated)
                );
            }
            await baseWrite;
            await this.yieldRepository.upsertSubnetRecord(
                metadata.hotkey,
                record.subnetId,
                YieldDocumentMapper.toStoredSubnet(record),
                lastUpdated
            );
        };
    }
}
