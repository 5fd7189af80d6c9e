import type { IValidatorYieldRepository } from '../../database/repositories/IValidatorYieldRepository';
import type { IValidatorMetadataRepository } from '../../database/repositories/IValidatorMetadataRepository';
import type { ISubnetRepository } from '../../database/repositories/ISubnetRepository';
import type { RawDocument, ValidatorBaseDocument } from '../../database/mappers/YieldDocumentMapper';
import type { StoredSubnetYield } from '../../types/yield';
import type { SubnetInfo, ValidatorMetadata } from '../../types/metadata';

function isRecord(value: unknown): value is RawDocument {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps documents in insertion order, mirroring a collection scan.
 */
export class InMemoryYieldRepository implements IValidatorYieldRepository {
    public readonly documents: RawDocument[] = [];
    public findAllCalls = 0;

    public async upsertValidatorBase(base: ValidatorBaseDocument): Promise<void> {
        const existing = this.documents.find(document => document.hotkey === base.hotkey);
        if (existing) {
            Object.assign(existing, base);
            return;
        }
        this.documents.push({ ...base, subnetsData: {} });
    }

    public async upsertSubnetRecord(hotkey: string, subnetId: number, record: StoredSubnetYield, lastUpdated: string): Promise<void> {
        let document = this.documents.find(entry => entry.hotkey === hotkey);
        if (!document) {
            document = { hotkey, subnetsData: {} };
            this.documents.push(document);
        }
        const subnetsData = isRecord(document.subnetsData) ? document.subnetsData : {};
        subnetsData[String(subnetId)] = { ...record };
        document.subnetsData = subnetsData;
        document.last_updated = lastUpdated;
    }

    public async findAll(): Promise<RawDocument[]> {
        this.findAllCalls++;
        return this.documents.map(document => ({ ...document }));
    }

    public async findByHotkey(hotkey: string): Promise<RawDocument | null> {
        const document = this.documents.find(entry => entry.hotkey === hotkey);
        return document ? { ...document } : null;
    }
}

export class InMemoryMetadataRepository implements IValidatorMetadataRepository {
    public readonly entries = new Map<string, ValidatorMetadata>();

    constructor(initial: ValidatorMetadata[] = []) {
        for (const entry of initial) {
            this.entries.set(entry.hotkey, entry);
        }
    }

    public async upsertMany(entries: ValidatorMetadata[]): Promise<number> {
        for (const entry of entries) {
            this.entries.set(entry.hotkey, { ...entry });
        }
        return entries.length;
    }

    public async findAll(): Promise<ValidatorMetadata[]> {
        return [...this.entries.values()];
    }
}

export class InMemorySubnetRepository implements ISubnetRepository {
    public readonly subnets = new Map<string, SubnetInfo>();

    public async findAll(): Promise<SubnetInfo[]> {
        return [...this.subnets.values()].sort((a, b) => Number(a.netuid) - Number(b.netuid));
    }

    public async upsert(subnet: SubnetInfo): Promise<void> {
        this.subnets.set(subnet.netuid, { ...subnet });
    }
}
