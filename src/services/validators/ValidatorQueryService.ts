import type { IValidatorYieldRepository } from '../../database/repositories/IValidatorYieldRepository';
import { YieldDocumentMapper } from '../../database/mappers/YieldDocumentMapper';
import { TimedCache } from '../cache/TimedCache';
import { aggregateValidator, formatAggregate, rankFleet, totalStake } from '../yield/FleetAggregator';
import type { FleetQuery, RankedValidator, ValidatorRecord } from '../../types/yield';
import type { PaginatedResult, SubnetValidatorItem, ValidatorListItem } from '../../types/api';
import { logger } from '../../utils/logger';

const FLEET_CACHE_KEY = 'validators:all';

function decodeAll(documents: readonly unknown[]): ValidatorRecord[] {
    const records: ValidatorRecord[] = [];
    let dropped = 0;
    for (const document of documents) {
        const record = YieldDocumentMapper.fromDocument(document);
        if (record) {
            records.push(record);
        } else {
            dropped++;
        }
    }
    if (dropped > 0) {
        logger.warn(`[ValidatorQuery] Ignored ${dropped} stored documents without a hotkey`);
    }
    return records;
}

function toListItem(validator: ValidatorRecord, stake: bigint): ValidatorListItem {
    return {
        ...validator.identity,
        hotkey: validator.hotkey,
        total_stake: stake.toString(),
        last_updated: validator.lastUpdated,
        ...formatAggregate(aggregateValidator(validator.subnets)),
        subnetsData: validator.subnetsData
    };
}

function toSubnetItem(entry: RankedValidator, subnetId: number): SubnetValidatorItem {
    const { validator } = entry;
    return {
        ...validator.identity,
        hotkey: validator.hotkey,
        subnet_stake: (entry.subnetStake ?? 0n).toString(),
        last_updated: validator.lastUpdated,
        ...formatAggregate(aggregateValidator(validator.subnets)),
        subnet_data: validator.subnetsData[String(subnetId)] ?? null,
        subnetsData: validator.subnetsData
    };
}

/**
 * Read path over the stored yield documents. Rollups are derived on every
 * call; only the decoded snapshot of the collection is cached.
 */
export class ValidatorQueryService {
    constructor(
        private readonly yieldRepository: IValidatorYieldRepository,
        private readonly cache: TimedCache<ValidatorRecord[]>,
        private readonly cacheTtlMs: number
    ) {}

    public loadFleet(): Promise<ValidatorRecord[]> {
        return this.cache.getOrRefresh(FLEET_CACHE_KEY, this.cacheTtlMs, async () =>
            decodeAll(await this.yieldRepository.findAll())
        );
    }

    public async listValidators(query: FleetQuery): Promise<PaginatedResult<ValidatorListItem>> {
        const fleet = await this.loadFleet();
        const { items, pagination } = rankFleet(fleet, query);

        return {
            data: items.map(entry => toListItem(entry.validator, entry.totalStake)),
            pagination
        };
    }

    public async listSubnetValidators(
        subnetId: number,
        query: Omit<FleetQuery, 'sortBy' | 'subnetId'>
    ): Promise<PaginatedResult<SubnetValidatorItem>> {
        const fleet = await this.loadFleet();
        const { items, pagination } = rankFleet(fleet, { ...query, sortBy: 'subnet_stake', subnetId });

        return {
            data: items.map(entry => toSubnetItem(entry, subnetId)),
            pagination
        };
    }

    /**
     * Reads straight from the store, bypassing the snapshot cache
     */
    public async getValidator(hotkey: string): Promise<ValidatorListItem | null> {
        const document = await this.yieldRepository.findByHotkey(hotkey);
        const validator = document ? YieldDocumentMapper.fromDocument(document) : null;
        if (!validator) {
            return null;
        }
        return toListItem(validator, totalStake(validator.subnets));
    }
}
