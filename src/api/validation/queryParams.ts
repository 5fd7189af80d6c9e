import type { FleetQuery, SortKey, SortOrder } from '../../types/yield';
import { ValidationError } from '../../types/errors';

export type QueryParams = Record<string, unknown>;

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parses an optional integer query parameter. Absent or empty values give
 * undefined; anything that is not an integer at or above `min` is rejected.
 */
export function optionalInteger(query: QueryParams, name: string, min: number): number | undefined {
    const value = query[name];
    if (value === undefined || value === '') {
        return undefined;
    }
    if (typeof value !== 'string' || !INTEGER_PATTERN.test(value.trim())) {
        throw new ValidationError(`${name} must be an integer`, name);
    }

    const parsed = Number(value.trim());
    if (!Number.isSafeInteger(parsed) || parsed < min) {
        throw new ValidationError(`${name} must be an integer >= ${min}`, name);
    }
    return parsed;
}

export function requiredInteger(value: unknown, name: string, min: number): number {
    const parsed = optionalInteger({ [name]: value }, name, min);
    if (parsed === undefined) {
        throw new ValidationError(`${name} is required`, name);
    }
    return parsed;
}

export function parseSortOrder(query: QueryParams): SortOrder {
    const value = query.sort_order;
    if (value === undefined || value === '') {
        return 'desc';
    }
    const normalized = typeof value === 'string' ? value.toLowerCase() : '';
    if (normalized !== 'asc' && normalized !== 'desc') {
        throw new ValidationError('sort_order must be "asc" or "desc"', 'sort_order');
    }
    return normalized;
}

export function parseSortKey(query: QueryParams): SortKey {
    const value = query.sort_by;
    if (value === undefined || value === '') {
        return 'total_stake';
    }
    if (value !== 'total_stake' && value !== 'subnet_stake') {
        throw new ValidationError('sort_by must be "total_stake" or "subnet_stake"', 'sort_by');
    }
    return value;
}

/**
 * Pagination parameters shared by every listing: `limit`, `batch`, `batch_size`
 */
export function parsePagination(query: QueryParams, defaultBatchSize: number): Pick<FleetQuery, 'limit' | 'batch' | 'batchSize'> {
    return {
        limit: optionalInteger(query, 'limit', 1),
        batch: optionalInteger(query, 'batch', 0),
        batchSize: optionalInteger(query, 'batch_size', 1) ?? defaultBatchSize
    };
}

export function parseFleetQuery(query: QueryParams, defaultBatchSize: number): FleetQuery {
    const sortBy = parseSortKey(query);
    const subnetId = optionalInteger(query, 'subnet_id', 0);
    if (sortBy === 'subnet_stake' && subnetId === undefined) {
        throw new ValidationError('sort_by=subnet_stake requires subnet_id', 'subnet_id');
    }

    return {
        sortBy,
        sortOrder: parseSortOrder(query),
        subnetId,
        ...parsePagination(query, defaultBatchSize)
    };
}
