import type { AggregatedFields, PaginationInfo, StoredSubnetYield, ValidatorIdentity } from './yield';

type ValidatorBase = ValidatorIdentity & AggregatedFields & {
    hotkey: string;
    last_updated: string | null;
    subnetsData: Record<string, StoredSubnetYield>;
};

export type ValidatorListItem = ValidatorBase & {
    total_stake: string;
};

export type SubnetValidatorItem = ValidatorBase & {
    subnet_stake: string;
    subnet_data: StoredSubnetYield | null;
};

export interface PaginatedResult<T> {
    data: T[];
    pagination: PaginationInfo;
}

export interface LiveValidatorView extends AggregatedFields {
    hotkey: string;
    block: number;
    timestamp: string;
    total_stake: string;
    subnetCount: number;
    subnetsData: Record<string, StoredSubnetYield>;
}
