/**
 * Identity data synced from the chain, one entry per delegate hotkey.
 * Unknown fields stay null; display defaults are applied when documents are read.
 */
export interface ValidatorMetadata {
    hotkey: string;
    coldkey: string;
    take: string;
    verified: boolean;
    name: string | null;
    logo: string | null;
    url: string | null;
    description: string | null;
    verifiedBadge: boolean;
    twitter: string | null;
}

export interface SubnetInfo {
    netuid: string;
    name: string;
    symbol: string;
    last_updated: string | null;
}
