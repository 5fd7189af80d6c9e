import type { IChainClient } from '../../clients/IChainClient';
import type { IValidatorMetadataRepository } from '../../database/repositories/IValidatorMetadataRepository';
import type { ValidatorMetadata } from '../../types/metadata';
import { withTimeout } from '../../utils/timeout';
import { logger } from '../../utils/logger';

export interface MetadataSyncResult {
    delegates: number;
    identities: number;
    changed: number;
}

/**
 * Take as a 16-decimal fraction string, e.g. 0.18 -> "0.1800000000000000"
 */
export function formatTake(take: number): string {
    return Number.isFinite(take) ? take.toFixed(16) : (0).toFixed(16);
}

/**
 * Pulls the delegate list and on-chain identities and stores one metadata
 * entry per delegate hotkey. The sweep reads its validator list from here.
 */
export class ValidatorMetadataService {
    constructor(
        private readonly chainClient: IChainClient,
        private readonly metadataRepository: IValidatorMetadataRepository,
        private readonly timeoutMs: number
    ) {}

    public async syncMetadata(): Promise<MetadataSyncResult> {
        logger.info('[ValidatorMetadata] Fetching delegates from chain');

        const delegates = await withTimeout(this.chainClient.getDelegates(), this.timeoutMs, 'getDelegates');
        const coldkeys = [...new Set(delegates.map(delegate => delegate.coldkey).filter(coldkey => coldkey.length > 0))];
        const identities = await withTimeout(this.chainClient.getIdentities(coldkeys), this.timeoutMs, 'getIdentities');

        const entries: ValidatorMetadata[] = delegates.map(delegate => {
            const identity = identities.get(delegate.coldkey);
            return {
                hotkey: delegate.hotkey,
                coldkey: delegate.coldkey,
                take: formatTake(delegate.take),
                verified: false,
                name: identity?.name ?? null,
                logo: identity?.image ?? null,
                url: identity?.url ?? null,
                description: identity?.description ?? null,
                verifiedBadge: false,
                twitter: identity?.twitter ?? null
            };
        });

        const changed = await this.metadataRepository.upsertMany(entries);
        logger.info(`[ValidatorMetadata] Synced ${entries.length} delegates (${identities.size} identities, ${changed} changed)`);

        return { delegates: entries.length, identities: identities.size, changed };
    }
}
