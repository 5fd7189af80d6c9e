/**
 * Validator Yield Repository Interface
 * Upsert-by-key access to the `yield` collection
 */

import type { StoredSubnetYield } from '../../types/yield';
import type { RawDocument, ValidatorBaseDocument } from '../mappers/YieldDocumentMapper';

export interface IValidatorYieldRepository {
  /**
   * Creates the validator document or merges its base fields
   */
  upsertValidatorBase(base: ValidatorBaseDocument): Promise<void>;

  /**
   * Sets `subnetsData.<subnetId>` without touching other subnets
   */
  upsertSubnetRecord(hotkey: string, subnetId: number, record: StoredSubnetYield, lastUpdated: string): Promise<void>;

  /**
   * All documents without `_id`, in stored order
   */
  findAll(): Promise<RawDocument[]>;

  findByHotkey(hotkey: string): Promise<RawDocument | null>;
}
