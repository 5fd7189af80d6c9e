import { annualizedRate } from './ApyCalculator';
import { mapWindows } from '../../types/yield';
import type {
    AggregatedFields,
    AggregatedValidatorView,
    AggregatedWindow,
    FleetPage,
    FleetQuery,
    LookbackWindow,
    PaginationInfo,
    RankedValidator,
    SubnetYieldRecord,
    ValidatorRecord
} from '../../types/yield';
import { ValidationError } from '../../types/errors';
import { formatAmount, formatApy } from '../../utils/format';

function compareBigInt(a: bigint, b: bigint): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export function totalStake(records: readonly SubnetYieldRecord[]): bigint {
    return records.reduce((sum, record) => sum + record.latestStake, 0n);
}

/**
 * Stake held in one subnet, 0 when the validator has no record there
 */
export function subnetStake(records: readonly SubnetYieldRecord[], subnetId: number): bigint {
    const record = records.find(entry => entry.subnetId === subnetId);
    return record ? record.latestStake : 0n;
}

function aggregateWindow(records: readonly SubnetYieldRecord[], window: LookbackWindow): AggregatedWindow {
    let stakeAgo = 0n;
    let yieldAmount = 0n;
    let contributingSubnets = 0;

    for (const record of records) {
        const metrics = record.windows[window.key];
        if (metrics.stakeAgo === null) {
            continue;
        }
        contributingSubnets += 1;
        stakeAgo += metrics.stakeAgo;
        yieldAmount += metrics.yieldAmount ?? 0n;
    }

    if (contributingSubnets === 0) {
        return { stakeAgo: null, yieldAmount: null, apy: null, contributingSubnets };
    }

    // APY comes from the summed figures, never from an average of per-subnet APYs
    return {
        stakeAgo,
        yieldAmount,
        apy: annualizedRate(yieldAmount, stakeAgo, window.seconds),
        contributingSubnets
    };
}

/**
 * Folds a validator's per-subnet records into one view. Pure summation, so the
 * result does not depend on record order.
 */
export function aggregateValidator(records: readonly SubnetYieldRecord[]): AggregatedValidatorView {
    return {
        subnetCount: records.length,
        latestStake: records.length > 0 ? totalStake(records) : null,
        windows: mapWindows(window => aggregateWindow(records, window))
    };
}

export function formatAggregate(view: AggregatedValidatorView): AggregatedFields {
    const { '1h': hour, '24h': day, '7d': week, '30d': month } = view.windows;

    return {
        latestStake: formatAmount(view.latestStake),
        stake1hAgo: formatAmount(hour.stakeAgo),
        stake24hAgo: formatAmount(day.stakeAgo),
        stake7dAgo: formatAmount(week.stakeAgo),
        stake30dAgo: formatAmount(month.stakeAgo),
        hourlyYield: formatAmount(hour.yieldAmount),
        dailyYield: formatAmount(day.yieldAmount),
        weeklyYield: formatAmount(week.yieldAmount),
        monthlyYield: formatAmount(month.yieldAmount),
        hourlyApy: formatApy(hour.apy),
        dailyApy: formatApy(day.apy),
        weeklyApy: formatApy(week.apy),
        monthlyApy: formatApy(month.apy)
    };
}

function paginate<T>(items: readonly T[], query: FleetQuery): { page: T[]; pagination: PaginationInfo } {
    const total = items.length;

    if (query.batch !== undefined) {
        const start = query.batch * query.batchSize;
        return {
            page: items.slice(start, start + query.batchSize),
            pagination: {
                total,
                batch_size: query.batchSize,
                current_batch: query.batch,
                total_batches: Math.ceil(total / query.batchSize)
            }
        };
    }

    return {
        page: query.limit !== undefined ? items.slice(0, query.limit) : [...items],
        pagination: { total, batch_size: null, current_batch: null, total_batches: null }
    };
}

/**
 * Ranks, filters and paginates the whole fleet.
 *
 * Sorting is stable: validators with equal keys keep the order they were
 * stored in, for both directions. When `subnetId` is given only validators
 * with positive stake in that subnet are returned. Batch pagination wins over
 * `limit` when both are present.
 */
export function rankFleet(validators: readonly ValidatorRecord[], query: FleetQuery): FleetPage {
    const { subnetId } = query;
    if (query.sortBy === 'subnet_stake' && subnetId === undefined) {
        throw new ValidationError('sort_by=subnet_stake requires subnet_id', 'subnet_id');
    }

    const ranked: RankedValidator[] = validators.map(validator => ({
        validator,
        totalStake: totalStake(validator.subnets),
        subnetStake: subnetId === undefined ? null : subnetStake(validator.subnets, subnetId)
    }));

    const keyOf = (entry: RankedValidator): bigint =>
        query.sortBy === 'subnet_stake' ? entry.subnetStake ?? 0n : entry.totalStake;
    const direction = query.sortOrder === 'asc' ? 1 : -1;

    ranked.sort((a, b) => direction * compareBigInt(keyOf(a), keyOf(b)));

    const filtered = subnetId === undefined
        ? ranked
        : ranked.filter(entry => (entry.subnetStake ?? 0n) > 0n);

    const { page, pagination } = paginate(filtered, query);
    return { items: page, pagination };
}
