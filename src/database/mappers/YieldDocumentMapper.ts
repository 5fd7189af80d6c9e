/**
 * Yield Document Mapper
 * Converts between in-memory yield records and their stored MongoDB shape
 */

import { mapWindows } from '../../types/yield';
import type {
  LookbackWindow,
  StoredSubnetYield,
  SubnetYieldRecord,
  ValidatorIdentity,
  ValidatorRecord,
  WindowMetrics
} from '../../types/yield';
import type { ValidatorMetadata } from '../../types/metadata';
import { calculateApy, clampedYield } from '../../services/yield/ApyCalculator';
import { formatAmount, formatApy } from '../../utils/format';

export type RawDocument = Record<string, unknown>;

export type ValidatorBaseDocument = ValidatorIdentity & {
  hotkey: string;
  last_updated: string;
};

export const DEFAULT_DESCRIPTION = 'Validator on Bittensor network';

const DECIMAL_PATTERN = /^\d+$/;
const APY_PATTERN = /^-?\d+(\.\d+)?$/;

function isRecord(value: unknown): value is RawDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseStoredAmount(value: unknown): bigint | null {
  return typeof value === 'string' && DECIMAL_PATTERN.test(value) ? BigInt(value) : null;
}

function parseStoredApy(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return typeof value === 'string' && APY_PATTERN.test(value) ? Number(value) : null;
}

function stringOr<T extends string | null>(value: unknown, fallback: T): string | T {
  return typeof value === 'string' ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

export function defaultValidatorName(hotkey: string): string {
  return `Validator ${hotkey.slice(0, 8)}`;
}

export class YieldDocumentMapper {
  /**
   * Maps a record to the stored shape: decimal strings, 2-decimal APYs, explicit nulls
   */
  public static toStoredSubnet(record: SubnetYieldRecord): StoredSubnetYield {
    const { '1h': hour, '24h': day, '7d': week, '30d': month } = record.windows;

    return {
      latestStake: formatAmount(record.latestStake),
      lastStake: formatAmount(record.lastStake),
      stake1hAgo: formatAmount(hour.stakeAgo),
      stake24hAgo: formatAmount(day.stakeAgo),
      stake7dAgo: formatAmount(week.stakeAgo),
      stake30dAgo: formatAmount(month.stakeAgo),
      hourlyYield: formatAmount(hour.yieldAmount),
      dailyYield: formatAmount(day.yieldAmount),
      weeklyYield: formatAmount(week.yieldAmount),
      monthlyYield: formatAmount(month.yieldAmount),
      hourlyApy: formatApy(hour.apy),
      dailyApy: formatApy(day.apy),
      weeklyApy: formatApy(week.apy),
      monthlyApy: formatApy(month.apy)
    };
  }

  /**
   * Base fields written for a validator before its subnet records
   */
  public static toBaseDocument(metadata: ValidatorMetadata, lastUpdated: string): ValidatorBaseDocument {
    return {
      id: null,
      hotkey: metadata.hotkey,
      coldkey: metadata.coldkey,
      take: metadata.take,
      verified: metadata.verified,
      name: metadata.name ?? defaultValidatorName(metadata.hotkey),
      logo: metadata.logo,
      url: metadata.url,
      description: metadata.description ?? DEFAULT_DESCRIPTION,
      verifiedBadge: metadata.verifiedBadge,
      twitter: metadata.twitter,
      last_updated: lastUpdated
    };
  }

  /**
   * Decodes one stored subnet entry. Empty or non-object entries carry no data
   * and yield null; a missing or malformed stake reads as zero.
   */
  public static fromStoredSubnet(subnetId: number, raw: unknown): SubnetYieldRecord | null {
    if (!isRecord(raw) || Object.keys(raw).length === 0) {
      return null;
    }

    const latestStake = parseStoredAmount(raw.latestStake) ?? 0n;

    return {
      subnetId,
      latestStake,
      lastStake: parseStoredAmount(raw.lastStake),
      windows: mapWindows(window => YieldDocumentMapper.fromStoredWindow(raw, window, latestStake))
    };
  }

  /**
   * Decodes a stored validator document. Documents without a hotkey are
   * unaddressable and decode to null; every other field falls back to a default.
   */
  public static fromDocument(raw: unknown): ValidatorRecord | null {
    if (!isRecord(raw) || typeof raw.hotkey !== 'string' || raw.hotkey.length === 0) {
      return null;
    }

    const hotkey = raw.hotkey;
    const subnets: SubnetYieldRecord[] = [];
    const subnetsData: Record<string, StoredSubnetYield> = {};

    if (isRecord(raw.subnetsData)) {
      for (const [key, value] of Object.entries(raw.subnetsData)) {
        if (!DECIMAL_PATTERN.test(key)) {
          continue;
        }
        const record = YieldDocumentMapper.fromStoredSubnet(Number(key), value);
        if (record) {
          subnets.push(record);
          subnetsData[key] = YieldDocumentMapper.toStoredSubnet(record);
        }
      }
    }

    return {
      hotkey,
      identity: YieldDocumentMapper.identityFromDocument(raw, hotkey),
      lastUpdated: stringOr(raw.last_updated, null),
      subnets,
      subnetsData
    };
  }

  public static identityFromDocument(raw: RawDocument, hotkey: string): ValidatorIdentity {
    return {
      id: typeof raw.id === 'number' && Number.isInteger(raw.id) ? raw.id : null,
      coldkey: stringOr(raw.coldkey, ''),
      take: stringOr(raw.take, '0.0'),
      verified: booleanOr(raw.verified, false),
      name: stringOr(raw.name, defaultValidatorName(hotkey)),
      logo: stringOr(raw.logo, null),
      url: stringOr(raw.url, null),
      description: stringOr(raw.description, DEFAULT_DESCRIPTION),
      verifiedBadge: booleanOr(raw.verifiedBadge, false),
      twitter: stringOr(raw.twitter, null)
    };
  }

  public static metadataFromDocument(raw: unknown): ValidatorMetadata | null {
    if (!isRecord(raw) || typeof raw.hotkey !== 'string' || raw.hotkey.length === 0) {
      return null;
    }

    return {
      hotkey: raw.hotkey,
      coldkey: stringOr(raw.coldkey, ''),
      take: stringOr(raw.take, '0.0000000000000000'),
      verified: booleanOr(raw.verified, false),
      name: stringOr(raw.name, null),
      logo: stringOr(raw.logo, null),
      url: stringOr(raw.url, null),
      description: stringOr(raw.description, null),
      verifiedBadge: booleanOr(raw.verifiedBadge, false),
      twitter: stringOr(raw.twitter, null)
    };
  }

  private static fromStoredWindow(raw: RawDocument, window: LookbackWindow, latestStake: bigint): WindowMetrics {
    const stakeAgo = parseStoredAmount(raw[window.stakeField]);
    if (stakeAgo === null) {
      return { stakeAgo: null, yieldAmount: null, apy: null };
    }

    return {
      stakeAgo,
      yieldAmount: parseStoredAmount(raw[window.yieldField]) ?? clampedYield(latestStake, stakeAgo),
      apy: parseStoredApy(raw[window.apyField]) ?? calculateApy(latestStake, stakeAgo, window.seconds)
    };
  }
}
