import type { ChainIdentity, DelegateInfo, IChainClient } from '../../clients/IChainClient';
import type { StakeHolder } from '../../types/yield';

export type StakeTable = (subnetId: number, blockHeight: number) => StakeHolder[] | Promise<StakeHolder[]>;

/**
 * In-process chain: stake holders come from a table function, every call is recorded.
 */
export class FakeChainClient implements IChainClient {
    public block = 1_000_000;
    public subnets: number[] = [];
    public delegates: DelegateInfo[] = [];
    public identities = new Map<string, ChainIdentity>();
    public stakeTable: StakeTable = () => [];
    public blockError: Error | null = null;
    public readonly stakeCalls: Array<{ subnetId: number; blockHeight: number }> = [];
    public readonly identityCalls: string[][] = [];
    public disconnected = false;

    public async currentBlockHeight(): Promise<number> {
        if (this.blockError) {
            throw this.blockError;
        }
        return this.block;
    }

    public async enumerateSubnets(): Promise<number[]> {
        return [...this.subnets];
    }

    public async stakeHolders(subnetId: number, blockHeight: number): Promise<StakeHolder[]> {
        this.stakeCalls.push({ subnetId, blockHeight });
        return this.stakeTable(subnetId, blockHeight);
    }

    public async getDelegates(): Promise<DelegateInfo[]> {
        return [...this.delegates];
    }

    public async getIdentities(coldkeys: string[]): Promise<Map<string, ChainIdentity>> {
        this.identityCalls.push([...coldkeys]);
        return new Map([...this.identities].filter(([coldkey]) => coldkeys.includes(coldkey)));
    }

    public async disconnect(): Promise<void> {
        this.disconnected = true;
    }
}

/**
 * Stake table where every height reports the same holders
 */
export function constantStakes(bySubnet: Record<number, Record<string, bigint>>): StakeTable {
    return subnetId => Object.entries(bySubnet[subnetId] ?? {}).map(([participantId, stakeRaw]) => ({ participantId, stakeRaw }));
}
