import { ApiPromise, WsProvider } from '@polkadot/api';
import type { Codec } from '@polkadot/types/types';
import type { ChainIdentity, DelegateInfo, IChainClient } from './IChainClient';
import type { StakeHolder } from '../types/yield';
import { classifyAmount, decodeAmount, toAmount } from './amountDecoder';
import { ChainConnectionError, errorMessage } from '../types/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../utils/logger';

export interface SubtensorClientOptions {
    wsUrls: string[];
    timeoutMs: number;
}

// Delegate take is stored as a u16 share of this value
const TAKE_DENOMINATOR = 65535;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function humanString(value: unknown): string | null {
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function toSubnetId(codec: Codec): number {
    return Number(toAmount(codec.toPrimitive()));
}

/**
 * @polkadot/api client for a Substrate chain exposing the `subtensorModule` pallet.
 * Connects lazily to the first reachable endpoint and keeps that connection.
 */
export class SubtensorClient implements IChainClient {
    private api: ApiPromise | null = null;
    private connecting: Promise<ApiPromise> | null = null;

    constructor(private readonly options: SubtensorClientOptions) {
        if (options.wsUrls.length === 0) {
            throw new Error('At least one websocket URL must be provided');
        }
    }

    public async currentBlockHeight(): Promise<number> {
        const api = await this.getApi();
        const header = await api.rpc.chain.getHeader();
        return header.number.toNumber();
    }

    public async enumerateSubnets(): Promise<number[]> {
        const api = await this.getApi();
        const entries = await api.query.subtensorModule.networksAdded.entries();

        return entries
            .filter(([, added]) => added.toPrimitive() === true)
            .map(([key]) => toSubnetId(key.args[0]))
            .sort((a, b) => a - b);
    }

    public async stakeHolders(subnetId: number, blockHeight: number): Promise<StakeHolder[]> {
        const api = await this.getApi();
        const blockHash = await api.rpc.chain.getBlockHash(blockHeight);
        const apiAt = await api.at(blockHash);

        const registered = await apiAt.query.subtensorModule.keys.entries(subnetId);
        const hotkeys = registered.map(([, hotkey]) => hotkey.toString());
        if (hotkeys.length === 0) {
            return [];
        }

        const stakes = await apiAt.query.subtensorModule.totalHotkeyAlpha.multi(
            hotkeys.map(hotkey => [hotkey, subnetId])
        );

        const holders: StakeHolder[] = [];
        hotkeys.forEach((hotkey, index) => {
            const raw = classifyAmount(stakes[index]?.toPrimitive());
            if (raw === null) {
                logger.warn(`[SubtensorClient] Unrecognized stake value for ${hotkey} on subnet ${subnetId}`);
                return;
            }
            holders.push({ participantId: hotkey, stakeRaw: decodeAmount(raw) });
        });
        return holders;
    }

    public async getDelegates(): Promise<DelegateInfo[]> {
        const api = await this.getApi();
        const entries = await api.query.subtensorModule.delegates.entries();

        const delegates = entries.map(([key, take]) => ({
            hotkey: key.args[0].toString(),
            take: Number(toAmount(take.toPrimitive())) / TAKE_DENOMINATOR
        }));
        if (delegates.length === 0) {
            return [];
        }

        const owners = await api.query.subtensorModule.owner.multi(delegates.map(delegate => delegate.hotkey));

        return delegates.map((delegate, index) => ({
            hotkey: delegate.hotkey,
            coldkey: owners[index]?.toString() ?? '',
            take: delegate.take
        }));
    }

    public async getIdentities(coldkeys: string[]): Promise<Map<string, ChainIdentity>> {
        const identities = new Map<string, ChainIdentity>();
        if (coldkeys.length === 0) {
            return identities;
        }

        const api = await this.getApi();
        const results = await api.query.subtensorModule.identitiesV2.multi(coldkeys);

        coldkeys.forEach((coldkey, index) => {
            const identity = results[index]?.toHuman();
            if (!isRecord(identity)) {
                return;
            }
            identities.set(coldkey, {
                name: humanString(identity.name),
                url: humanString(identity.url),
                image: humanString(identity.image),
                description: humanString(identity.description),
                twitter: humanString(identity.twitter) ?? humanString(identity.additional)
            });
        });
        return identities;
    }

    public async disconnect(): Promise<void> {
        const api = this.api;
        this.api = null;
        this.connecting = null;
        if (api) {
            await api.disconnect();
            logger.info('[SubtensorClient] Disconnected');
        }
    }

    private getApi(): Promise<ApiPromise> {
        if (this.api?.isConnected) {
            return Promise.resolve(this.api);
        }
        if (!this.connecting) {
            this.connecting = this.connect().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    private async connect(): Promise<ApiPromise> {
        let lastError: unknown;

        for (const url of this.options.wsUrls) {
            const provider = new WsProvider(url, false);
            try {
                await withTimeout(provider.connect(), this.options.timeoutMs, `connect(${url})`);
                const api = await withTimeout(
                    ApiPromise.create({ provider, noInitWarn: true }),
                    this.options.timeoutMs,
                    `ApiPromise.create(${url})`
                );
                this.api = api;
                logger.info(`[SubtensorClient] Connected to ${url}`);
                return api;
            } catch (error) {
                lastError = error;
                logger.warn(`[SubtensorClient] Endpoint ${url} unreachable: ${errorMessage(error)}`);
                await provider.disconnect().catch((disconnectError: unknown) => {
                    logger.debug(`[SubtensorClient] Error closing ${url}: ${errorMessage(disconnectError)}`);
                });
            }
        }

        throw new ChainConnectionError('No chain endpoint reachable', lastError);
    }
}
