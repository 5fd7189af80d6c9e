import type { StakeHolder } from '../types/yield';

export interface DelegateInfo {
    hotkey: string;
    coldkey: string;
    /** Commission as a fraction in [0, 1] */
    take: number;
}

export interface ChainIdentity {
    name: string | null;
    url: string | null;
    image: string | null;
    description: string | null;
    twitter: string | null;
}

/**
 * Read-only view of the chain used by the sweep, the live path and metadata sync.
 */
export interface IChainClient {
    currentBlockHeight(): Promise<number>;
    enumerateSubnets(): Promise<number[]>;
    stakeHolders(subnetId: number, blockHeight: number): Promise<StakeHolder[]>;
    getDelegates(): Promise<DelegateInfo[]>;
    getIdentities(coldkeys: string[]): Promise<Map<string, ChainIdentity>>;
    disconnect(): Promise<void>;
}
