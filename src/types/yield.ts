export type WindowKey = '1h' | '24h' | '7d' | '30d';
export type PeriodName = 'hourly' | 'daily' | 'weekly' | 'monthly';

export type StakeAgoField = `stake${WindowKey}Ago`;
export type YieldField = `${PeriodName}Yield`;
export type ApyField = `${PeriodName}Apy`;

export interface LookbackWindow {
    key: WindowKey;
    seconds: number;
    stakeField: StakeAgoField;
    yieldField: YieldField;
    apyField: ApyField;
}

export const SECONDS_PER_DAY = 86400;

export const WINDOWS_BY_KEY: Readonly<Record<WindowKey, LookbackWindow>> = {
    '1h': { key: '1h', seconds: 3600, stakeField: 'stake1hAgo', yieldField: 'hourlyYield', apyField: 'hourlyApy' },
    '24h': { key: '24h', seconds: 86400, stakeField: 'stake24hAgo', yieldField: 'dailyYield', apyField: 'dailyApy' },
    '7d': { key: '7d', seconds: 604800, stakeField: 'stake7dAgo', yieldField: 'weeklyYield', apyField: 'weeklyApy' },
    '30d': { key: '30d', seconds: 2592000, stakeField: 'stake30dAgo', yieldField: 'monthlyYield', apyField: 'monthlyApy' }
};

export function mapWindows<T>(fn: (window: LookbackWindow) => T): Record<WindowKey, T> {
    return {
        '1h': fn(WINDOWS_BY_KEY['1h']),
        '24h': fn(WINDOWS_BY_KEY['24h']),
        '7d': fn(WINDOWS_BY_KEY['7d']),
        '30d': fn(WINDOWS_BY_KEY['30d'])
    };
}

/**
 * Runs one async task per window concurrently and keys the results by window.
 */
export async function resolveWindows<T>(fn: (window: LookbackWindow) => Promise<T>): Promise<Record<WindowKey, T>> {
    const [hour, day, week, month] = await Promise.all([
        fn(WINDOWS_BY_KEY['1h']),
        fn(WINDOWS_BY_KEY['24h']),
        fn(WINDOWS_BY_KEY['7d']),
        fn(WINDOWS_BY_KEY['30d'])
    ]);
    return { '1h': hour, '24h': day, '7d': week, '30d': month };
}

export interface StakeHolder {
    participantId: string;
    stakeRaw: bigint;
}

export interface WindowMetrics {
    stakeAgo: bigint | null;
    yieldAmount: bigint | null;
    apy: number | null;
}

/**
 * Metrics for one (validator hotkey, subnet) pair, in smallest stake units.
 */
export interface SubnetYieldRecord {
    subnetId: number;
    latestStake: bigint;
    lastStake: bigint | null;
    windows: Record<WindowKey, WindowMetrics>;
}

export type SubnetBuildResult =
    | { status: 'built'; record: SubnetYieldRecord }
    | { status: 'skipped'; reason: 'no-stake' | 'unavailable' };

export interface AggregatedWindow extends WindowMetrics {
    contributingSubnets: number;
}

/**
 * Validator-level rollup derived from per-subnet records on every read.
 */
export interface AggregatedValidatorView {
    subnetCount: number;
    latestStake: bigint | null;
    windows: Record<WindowKey, AggregatedWindow>;
}

/**
 * Persisted shape of a SubnetYieldRecord: decimal strings, APYs with 2 decimals.
 */
export type StoredSubnetYield = {
    latestStake: string | null;
    lastStake: string | null;
} & Record<StakeAgoField | YieldField | ApyField, string | null>;

export type AggregatedFields = { latestStake: string | null } & Record<StakeAgoField | YieldField | ApyField, string | null>;

export interface ValidatorIdentity {
    id: number | null;
    coldkey: string;
    take: string;
    verified: boolean;
    name: string;
    logo: string | null;
    url: string | null;
    description: string;
    verifiedBadge: boolean;
    twitter: string | null;
}

/**
 * A validator as decoded from the store, ready for ranking and aggregation.
 */
export interface ValidatorRecord {
    hotkey: string;
    identity: ValidatorIdentity;
    lastUpdated: string | null;
    subnets: SubnetYieldRecord[];
    subnetsData: Record<string, StoredSubnetYield>;
}

export type SortKey = 'total_stake' | 'subnet_stake';
export type SortOrder = 'asc' | 'desc';

export interface FleetQuery {
    sortBy: SortKey;
    sortOrder: SortOrder;
    subnetId?: number;
    limit?: number;
    batch?: number;
    batchSize: number;
}

export interface PaginationInfo {
    total: number;
    batch_size: number | null;
    current_batch: number | null;
    total_batches: number | null;
}

export interface RankedValidator {
    validator: ValidatorRecord;
    totalStake: bigint;
    subnetStake: bigint | null;
}

export interface FleetPage {
    items: RankedValidator[];
    pagination: PaginationInfo;
}
