import type { SubnetMetricsBuilder } from './SubnetMetricsBuilder';
import type { SubnetYieldRecord } from '../../types/yield';
import { errorMessage } from '../../types/errors';
import { logger } from '../../utils/logger';

export interface SubnetScanResult {
    records: SubnetYieldRecord[];
    skipped: number;
    failed: number;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    const step = Math.max(1, Math.floor(size));
    for (let i = 0; i < items.length; i += step) {
        chunks.push(items.slice(i, i + step));
    }
    return chunks;
}

/**
 * Builds one validator's records across subnets, `concurrency` subnets at a
 * time. Each subnet settles on its own: a rejection from the builder or from
 * `onRecord` is counted and logged without affecting its siblings.
 */
export async function scanSubnets(
    builder: SubnetMetricsBuilder,
    hotkey: string,
    subnetIds: readonly number[],
    currentBlock: number,
    currentTimestamp: number,
    concurrency: number,
    onRecord?: (record: SubnetYieldRecord) => Promise<void>
): Promise<SubnetScanResult> {
    const result: SubnetScanResult = { records: [], skipped: 0, failed: 0 };

    for (const group of chunk(subnetIds, concurrency)) {
        const settled = await Promise.allSettled(
            group.map(async subnetId => {
                const built = await builder.buildSubnetRecord(hotkey, subnetId, currentBlock, currentTimestamp);
                if (built.status === 'built' && onRecord) {
                    await onRecord(built.record);
                }
                return built;
            })
        );

        settled.forEach((outcome, index) => {
            if (outcome.status === 'rejected') {
                result.failed++;
                logger.error(`[SubnetScan] Subnet ${group[index]} failed for ${hotkey}: ${errorMessage(outcome.reason)}`);
                return;
            }
            if (outcome.value.status === 'built') {
                result.records.push(outcome.value.record);
            } else {
                result.skipped++;
            }
        });
    }

    return result;
}
