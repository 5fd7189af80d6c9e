import { describe, it, expect } from 'vitest';
import { DEFAULT_DESCRIPTION, YieldDocumentMapper } from '../YieldDocumentMapper';
import { metadata, subnetRecord } from '../../../tests/fakes/builders';

describe('YieldDocumentMapper.toStoredSubnet', () => {
    it('stores amounts as strings and APYs with two decimals', () => {
        const stored = YieldDocumentMapper.toStoredSubnet(subnetRecord(1, 1100n, { '24h': 1000n }));

        expect(stored).toEqual({
            latestStake: '1100',
            lastStake: '1100',
            stake1hAgo: null,
            stake24hAgo: '1000',
            stake7dAgo: null,
            stake30dAgo: null,
            hourlyYield: null,
            dailyYield: '100',
            weeklyYield: null,
            monthlyYield: null,
            hourlyApy: null,
            dailyApy: '3650.00',
            weeklyApy: null,
            monthlyApy: null
        });
    });
});

describe('YieldDocumentMapper.toBaseDocument', () => {
    it('fills display defaults for missing identity fields', () => {
        const base = YieldDocumentMapper.toBaseDocument(metadata('5FHneW46xGXgs5mUiveU'), '2026-01-01T00:00:00.000Z');

        expect(base).toEqual({
            id: null,
            hotkey: '5FHneW46xGXgs5mUiveU',
            coldkey: 'cold-5FHneW46xGXgs5mUiveU',
            take: '0.1800000000000000',
            verified: false,
            name: 'Validator 5FHneW46',
            logo: null,
            url: null,
            description: DEFAULT_DESCRIPTION,
            verifiedBadge: false,
            twitter: null,
            last_updated: '2026-01-01T00:00:00.000Z'
        });
    });

    it('keeps synced identity fields', () => {
        const base = YieldDocumentMapper.toBaseDocument(
            metadata('hk1', { name: 'Alpha', description: 'Runs nodes' }),
            '2026-01-01T00:00:00.000Z'
        );

        expect(base.name).toBe('Alpha');
        expect(base.description).toBe('Runs nodes');
    });
});

describe('YieldDocumentMapper.fromDocument', () => {
    it('drops documents without a hotkey', () => {
        expect(YieldDocumentMapper.fromDocument({ name: 'orphan' })).toBeNull();
        expect(YieldDocumentMapper.fromDocument({ hotkey: '' })).toBeNull();
        expect(YieldDocumentMapper.fromDocument('not a document')).toBeNull();
    });

    it('skips empty and malformed subnet entries', () => {
        const record = YieldDocumentMapper.fromDocument({
            hotkey: 'hk1',
            subnetsData: {
                '3': {},
                '4': 'garbage',
                'abc': { latestStake: '10' },
                '8': { latestStake: '10' }
            }
        });

        expect(record?.subnets.map(subnet => subnet.subnetId)).toEqual([8]);
        expect(Object.keys(record?.subnetsData ?? {})).toEqual(['8']);
    });

    it('reads a malformed latest stake as zero and recomputes missing derived fields', () => {
        const record = YieldDocumentMapper.fromDocument({
            hotkey: 'hk1',
            subnetsData: { '5': { latestStake: 'bad', stake24hAgo: '10' } }
        });

        expect(record?.subnets[0]).toEqual({
            subnetId: 5,
            latestStake: 0n,
            lastStake: null,
            windows: {
                '1h': { stakeAgo: null, yieldAmount: null, apy: null },
                '24h': { stakeAgo: 10n, yieldAmount: 0n, apy: 0 },
                '7d': { stakeAgo: null, yieldAmount: null, apy: null },
                '30d': { stakeAgo: null, yieldAmount: null, apy: null }
            }
        });
        expect(record?.subnetsData['5'].dailyApy).toBe('0.00');
    });

    it('prefers stored yield and APY values', () => {
        const record = YieldDocumentMapper.fromDocument({
            hotkey: 'hk1',
            subnetsData: { '6': { latestStake: '1100', stake24hAgo: '1000', dailyYield: '7', dailyApy: '1.23' } }
        });

        expect(record?.subnets[0].windows['24h']).toEqual({ stakeAgo: 1000n, yieldAmount: 7n, apy: 1.23 });
    });

    it('applies identity defaults', () => {
        const record = YieldDocumentMapper.fromDocument({ hotkey: 'hk1234567890', id: 'x', verified: 'yes' });

        expect(record?.identity).toEqual({
            id: null,
            coldkey: '',
            take: '0.0',
            verified: false,
            name: 'Validator hk123456',
            logo: null,
            url: null,
            description: DEFAULT_DESCRIPTION,
            verifiedBadge: false,
            twitter: null
        });
        expect(record?.lastUpdated).toBeNull();
        expect(record?.subnets).toEqual([]);
    });
});

describe('YieldDocumentMapper.metadataFromDocument', () => {
    it('keeps unknown identity fields null', () => {
        expect(YieldDocumentMapper.metadataFromDocument({ hotkey: 'hk1', coldkey: 'ck1', name: 'Alpha' })).toEqual({
            hotkey: 'hk1',
            coldkey: 'ck1',
            take: '0.0000000000000000',
            verified: false,
            name: 'Alpha',
            logo: null,
            url: null,
            description: null,
            verifiedBadge: false,
            twitter: null
        });
        expect(YieldDocumentMapper.metadataFromDocument({ coldkey: 'ck1' })).toBeNull();
    });
});
