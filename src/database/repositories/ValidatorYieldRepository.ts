/**
 * Validator Yield Repository
 * MongoDB implementation of IValidatorYieldRepository
 */

import { ValidatorYield } from '../models/ValidatorYield';
import type { StoredSubnetYield } from '../../types/yield';
import type { RawDocument, ValidatorBaseDocument } from '../mappers/YieldDocumentMapper';
import { IValidatorYieldRepository } from './IValidatorYieldRepository';
import { errorMessage } from '../../types/errors';
import { logger } from '../../utils/logger';

export class ValidatorYieldRepository implements IValidatorYieldRepository {
  private static instance: ValidatorYieldRepository | null = null;

  private constructor() {}

  public static getInstance(): ValidatorYieldRepository {
    if (!ValidatorYieldRepository.instance) {
      ValidatorYieldRepository.instance = new ValidatorYieldRepository();
    }
    return ValidatorYieldRepository.instance;
  }

  public async upsertValidatorBase(base: ValidatorBaseDocument): Promise<void> {
    try {
      await ValidatorYield.updateOne(
        { hotkey: base.hotkey },
        { $set: base },
        { upsert: true }
      );
    } catch (error) {
      logger.error(`[ValidatorYieldRepository] Error upserting validator ${base.hotkey}: ${errorMessage(error)}`);
      throw error;
    }
  }

  public async upsertSubnetRecord(
    hotkey: string,
    subnetId: number,
    record: StoredSubnetYield,
    lastUpdated: string
  ): Promise<void> {
    try {
      await ValidatorYield.updateOne(
        { hotkey },
        {
          $set: {
            [`subnetsData.${subnetId}`]: record,
            last_updated: lastUpdated
          }
        },
        { upsert: true }
      );
      logger.debug(`[ValidatorYieldRepository] Stored subnet ${subnetId} for ${hotkey}`);
    } catch (error) {
      logger.error(`[ValidatorYieldRepository] Error storing subnet ${subnetId} for ${hotkey}: ${errorMessage(error)}`);
      throw error;
    }
  }

  public async findAll(): Promise<RawDocument[]> {
    try {
      return await ValidatorYield.find({}, { _id: 0 }).lean<RawDocument[]>().exec();
    } catch (error) {
      logger.error(`[ValidatorYieldRepository] Error reading validators: ${errorMessage(error)}`);
      throw error;
    }
  }

  public async findByHotkey(hotkey: string): Promise<RawDocument | null> {
    try {
      return await ValidatorYield.findOne({ hotkey }, { _id: 0 }).lean<RawDocument>().exec();
    } catch (error) {
      logger.error(`[ValidatorYieldRepository] Error reading validator ${hotkey}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
