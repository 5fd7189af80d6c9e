import { mapWindows } from '../../types/yield';
import type { SubnetYieldRecord, ValidatorRecord, WindowKey } from '../../types/yield';
import type { ValidatorMetadata } from '../../types/metadata';
import { calculateApy, clampedYield } from '../../services/yield/ApyCalculator';
import { YieldDocumentMapper } from '../../database/mappers/YieldDocumentMapper';

/**
 * Subnet record with the given past stakes; windows left out have no sample.
 */
export function subnetRecord(
    subnetId: number,
    latestStake: bigint,
    stakesAgo: Partial<Record<WindowKey, bigint>> = {}
): SubnetYieldRecord {
    return {
        subnetId,
        latestStake,
        lastStake: latestStake,
        windows: mapWindows(window => {
            const stakeAgo = stakesAgo[window.key];
            if (stakeAgo === undefined) {
                return { stakeAgo: null, yieldAmount: null, apy: null };
            }
            return {
                stakeAgo,
                yieldAmount: clampedYield(latestStake, stakeAgo),
                apy: calculateApy(latestStake, stakeAgo, window.seconds)
            };
        })
    };
}

export function validatorRecord(hotkey: string, subnets: SubnetYieldRecord[]): ValidatorRecord {
    const subnetsData = Object.fromEntries(
        subnets.map(record => [String(record.subnetId), YieldDocumentMapper.toStoredSubnet(record)])
    );
    return {
        hotkey,
        identity: YieldDocumentMapper.identityFromDocument({}, hotkey),
        lastUpdated: null,
        subnets,
        subnetsData
    };
}

export function metadata(hotkey: string, overrides: Partial<ValidatorMetadata> = {}): ValidatorMetadata {
    return {
        hotkey,
        coldkey: `cold-${hotkey}`,
        take: '0.1800000000000000',
        verified: false,
        name: null,
        logo: null,
        url: null,
        description: null,
        verifiedBadge: false,
        twitter: null,
        ...overrides
    };
}
