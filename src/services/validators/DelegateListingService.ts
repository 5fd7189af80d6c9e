import type { IValidatorMetadataRepository } from '../../database/repositories/IValidatorMetadataRepository';
import type { ValidatorMetadata } from '../../types/metadata';
import type { FleetQuery } from '../../types/yield';
import type { ValidatorListItem } from '../../types/api';
import { ValidatorQueryService } from './ValidatorQueryService';

export type DelegatePagination = Pick<FleetQuery, 'limit' | 'batch' | 'batchSize'>;

function mergeMetadata(item: ValidatorListItem, metadata: ValidatorMetadata | undefined, position: number): ValidatorListItem {
    const subnetsData = Object.fromEntries(
        Object.entries(item.subnetsData).filter(([, subnet]) => subnet.latestStake !== null)
    );
    const merged: ValidatorListItem = { ...item, id: item.id ?? position, subnetsData };
    if (!metadata) {
        return merged;
    }

    return {
        ...merged,
        name: metadata.name ?? merged.name,
        logo: metadata.logo ?? merged.logo,
        url: metadata.url ?? merged.url,
        description: metadata.description ?? merged.description,
        twitter: metadata.twitter ?? merged.twitter,
        verified: metadata.verified,
        verifiedBadge: metadata.verifiedBadge
    };
}

/**
 * Delegate listing for the batched endpoint: validators by total stake,
 * descending, with the latest synced metadata laid over the stored identity.
 */
export class DelegateListingService {
    constructor(
        private readonly queryService: ValidatorQueryService,
        private readonly metadataRepository: IValidatorMetadataRepository
    ) {}

    public async getDelegates(pagination: DelegatePagination): Promise<ValidatorListItem[]> {
        const [listing, metadata] = await Promise.all([
            this.queryService.listValidators({ sortBy: 'total_stake', sortOrder: 'desc', ...pagination }),
            this.metadataRepository.findAll()
        ]);

        const byHotkey = new Map(metadata.map(entry => [entry.hotkey, entry]));
        const offset = pagination.batch !== undefined ? pagination.batch * pagination.batchSize : 0;

        return listing.data.map((item, index) => mergeMetadata(item, byHotkey.get(item.hotkey), offset + index));
    }
}
