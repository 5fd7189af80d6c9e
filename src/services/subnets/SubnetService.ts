import type { ISubnetRepository } from '../../database/repositories/ISubnetRepository';
import type { SubnetInfo } from '../../types/metadata';
import { ValidationError } from '../../types/errors';
import { logger } from '../../utils/logger';

export const DEFAULT_SUBNETS: ReadonlyArray<Pick<SubnetInfo, 'netuid' | 'name' | 'symbol'>> = [
    { netuid: '0', name: 'Foundational Subnet', symbol: 'ROOT' },
    { netuid: '1', name: 'Machine Learning Subnet', symbol: 'ML' },
    { netuid: '2', name: 'Text Prompting Subnet', symbol: 'TXT' },
    { netuid: '3', name: 'Miner Subnet', symbol: 'MINE' },
    { netuid: '4', name: 'Voice Subnet', symbol: 'VOICE' }
];

/**
 * Subnet names and symbols, seeded with a default catalogue on first read
 */
export class SubnetService {
    constructor(
        private readonly subnetRepository: ISubnetRepository,
        private readonly now: () => Date = () => new Date()
    ) {}

    public async listSubnets(): Promise<SubnetInfo[]> {
        const subnets = await this.subnetRepository.findAll();
        if (subnets.length > 0) {
            return subnets;
        }

        logger.info('[SubnetService] Subnet catalogue empty, seeding defaults');
        const lastUpdated = this.now().toISOString();
        for (const subnet of DEFAULT_SUBNETS) {
            await this.subnetRepository.upsert({ ...subnet, last_updated: lastUpdated });
        }
        return this.subnetRepository.findAll();
    }

    public async updateSubnet(netuid: number, name: string, symbol: string): Promise<SubnetInfo> {
        if (name.trim().length === 0) {
            throw new ValidationError('name must not be empty', 'name');
        }
        if (symbol.trim().length === 0) {
            throw new ValidationError('symbol must not be empty', 'symbol');
        }

        const subnet: SubnetInfo = {
            netuid: String(netuid),
            name: name.trim(),
            symbol: symbol.trim(),
            last_updated: this.now().toISOString()
        };
        await this.subnetRepository.upsert(subnet);
        logger.info(`[SubnetService] Updated metadata for subnet ${netuid}`);
        return subnet;
    }
}
