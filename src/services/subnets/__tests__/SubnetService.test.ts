import { describe, it, expect } from 'vitest';
import { SubnetService, DEFAULT_SUBNETS } from '../SubnetService';
import { InMemorySubnetRepository } from '../../../tests/fakes/InMemoryRepositories';
import { ValidationError } from '../../../types/errors';

const fixedNow = () => new Date('2026-03-01T00:00:00.000Z');

describe('SubnetService', () => {
    it('seeds the default catalogue when empty', async () => {
        const repository = new InMemorySubnetRepository();

        const subnets = await new SubnetService(repository, fixedNow).listSubnets();

        expect(subnets).toHaveLength(DEFAULT_SUBNETS.length);
        expect(subnets[4]).toEqual({ netuid: '4', name: 'Voice Subnet', symbol: 'VOICE', last_updated: '2026-03-01T00:00:00.000Z' });
    });

    it('returns stored subnets without seeding', async () => {
        const repository = new InMemorySubnetRepository();
        await repository.upsert({ netuid: '12', name: 'Custom', symbol: 'CST', last_updated: null });

        const subnets = await new SubnetService(repository, fixedNow).listSubnets();

        expect(subnets).toEqual([{ netuid: '12', name: 'Custom', symbol: 'CST', last_updated: null }]);
    });

    it('trims and stores an update', async () => {
        const repository = new InMemorySubnetRepository();
        const service = new SubnetService(repository, fixedNow);

        await expect(service.updateSubnet(3, '  Miner  ', ' MN ')).resolves.toEqual({
            netuid: '3',
            name: 'Miner',
            symbol: 'MN',
            last_updated: '2026-03-01T00:00:00.000Z'
        });
        expect(repository.subnets.get('3')?.symbol).toBe('MN');
    });

    it('rejects blank names and symbols', async () => {
        const service = new SubnetService(new InMemorySubnetRepository(), fixedNow);

        await expect(service.updateSubnet(3, '   ', 'MN')).rejects.toThrow(ValidationError);
        await expect(service.updateSubnet(3, 'Miner', '')).rejects.toThrow('symbol must not be empty');
    });
});
