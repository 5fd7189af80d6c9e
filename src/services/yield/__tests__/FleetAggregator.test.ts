import { describe, it, expect } from 'vitest';
import { aggregateValidator, formatAggregate, rankFleet, subnetStake, totalStake } from '../FleetAggregator';
import { ValidationError } from '../../../types/errors';
import { subnetRecord, validatorRecord } from '../../../tests/fakes/builders';
import type { FleetQuery } from '../../../types/yield';

const baseQuery: FleetQuery = { sortBy: 'total_stake', sortOrder: 'desc', batchSize: 32 };

describe('aggregateValidator', () => {
    it('sums only the subnets that have a sample for the window', () => {
        const a = subnetRecord(1, 105n, { '24h': 100n });
        const b = subnetRecord(2, 200n);

        const view = aggregateValidator([a, b]);

        expect(view.subnetCount).toBe(2);
        expect(view.latestStake).toBe(305n);
        expect(view.windows['24h']).toEqual({ stakeAgo: 100n, yieldAmount: 5n, apy: 1825, contributingSubnets: 1 });
        expect(view.windows['1h']).toEqual({ stakeAgo: null, yieldAmount: null, apy: null, contributingSubnets: 0 });
    });

    it('derives the APY from summed figures', () => {
        const view = aggregateValidator([
            subnetRecord(1, 1100n, { '24h': 1000n }),
            subnetRecord(2, 3000n, { '24h': 3000n })
        ]);

        // 100 over 4000 in a day, not the mean of 3650 and 0
        expect(view.windows['24h'].apy).toBe(912.5);
    });

    it('does not depend on record order', () => {
        const records = [
            subnetRecord(1, 1100n, { '1h': 1090n, '24h': 1000n }),
            subnetRecord(4, 50n, { '7d': 40n }),
            subnetRecord(9, 7n, { '24h': 7n, '30d': 1n })
        ];

        expect(aggregateValidator([...records].reverse())).toEqual(aggregateValidator(records));
    });

    it('has no latest stake without records', () => {
        expect(aggregateValidator([]).latestStake).toBeNull();
    });
});

describe('formatAggregate', () => {
    it('renders strings and keeps nulls', () => {
        const fields = formatAggregate(aggregateValidator([subnetRecord(1, 1100n, { '24h': 1000n })]));

        expect(fields).toEqual({
            latestStake: '1100',
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

describe('stake helpers', () => {
    it('totals latest stake and reads one subnet', () => {
        const records = [subnetRecord(1, 10n), subnetRecord(2, 32n)];

        expect(totalStake(records)).toBe(42n);
        expect(subnetStake(records, 2)).toBe(32n);
        expect(subnetStake(records, 3)).toBe(0n);
    });
});

describe('rankFleet', () => {
    const fleet = Array.from({ length: 100 }, (_, index) =>
        validatorRecord(`hk${index + 1}`, [subnetRecord(1, BigInt(index + 1))])
    );

    it('splits the fleet into batches', () => {
        const page = rankFleet(fleet, { ...baseQuery, batch: 3, batchSize: 32 });

        expect(page.pagination).toEqual({ total: 100, batch_size: 32, current_batch: 3, total_batches: 4 });
        expect(page.items.map(entry => entry.validator.hotkey)).toEqual(['hk4', 'hk3', 'hk2', 'hk1']);
    });

    it('returns an empty page past the last batch', () => {
        const page = rankFleet(fleet, { ...baseQuery, batch: 4, batchSize: 32 });

        expect(page.items).toEqual([]);
        expect(page.pagination.total_batches).toBe(4);
    });

    it('applies limit without batch and leaves batch fields null', () => {
        const page = rankFleet(fleet, { ...baseQuery, sortOrder: 'asc', limit: 3 });

        expect(page.items.map(entry => entry.totalStake)).toEqual([1n, 2n, 3n]);
        expect(page.pagination).toEqual({ total: 100, batch_size: null, current_batch: null, total_batches: null });
    });

    it('prefers batch over limit', () => {
        const page = rankFleet(fleet, { ...baseQuery, limit: 1, batch: 0, batchSize: 5 });

        expect(page.items).toHaveLength(5);
    });

    it('keeps stored order for equal keys in both directions', () => {
        const tied = ['a', 'b', 'c'].map(hotkey => validatorRecord(hotkey, [subnetRecord(1, 10n)]));
        const withTop = [...tied, validatorRecord('top', [subnetRecord(1, 99n)])];

        expect(rankFleet(withTop, baseQuery).items.map(entry => entry.validator.hotkey)).toEqual(['top', 'a', 'b', 'c']);
        expect(rankFleet(withTop, { ...baseQuery, sortOrder: 'asc' }).items.map(entry => entry.validator.hotkey))
            .toEqual(['a', 'b', 'c', 'top']);
    });

    it('filters to validators with stake in the requested subnet', () => {
        const validators = [
            validatorRecord('only1', [subnetRecord(1, 500n)]),
            validatorRecord('both', [subnetRecord(1, 10n), subnetRecord(2, 20n)]),
            validatorRecord('only2', [subnetRecord(2, 30n)]),
            validatorRecord('zero2', [subnetRecord(2, 0n)])
        ];

        const page = rankFleet(validators, { ...baseQuery, sortBy: 'subnet_stake', subnetId: 2 });

        expect(page.items.map(entry => [entry.validator.hotkey, entry.subnetStake])).toEqual([
            ['only2', 30n],
            ['both', 20n]
        ]);
        expect(page.pagination.total).toBe(2);
    });

    it('sorts by total stake while filtering by subnet', () => {
        const validators = [
            validatorRecord('small', [subnetRecord(2, 5n)]),
            validatorRecord('large', [subnetRecord(1, 1000n), subnetRecord(2, 1n)])
        ];

        const page = rankFleet(validators, { ...baseQuery, subnetId: 2 });

        expect(page.items.map(entry => entry.validator.hotkey)).toEqual(['large', 'small']);
    });

    it('requires a subnet when sorting by subnet stake', () => {
        expect(() => rankFleet(fleet, { ...baseQuery, sortBy: 'subnet_stake' })).toThrow(ValidationError);
    });
});
