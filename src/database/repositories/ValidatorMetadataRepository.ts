import { ValidatorMetadataModel } from '../models/ValidatorMetadata';
import { YieldDocumentMapper } from '../mappers/YieldDocumentMapper';
import type { RawDocument } from '../mappers/YieldDocumentMapper';
import type { ValidatorMetadata } from '../../types/metadata';
import { IValidatorMetadataRepository } from './IValidatorMetadataRepository';
import { errorMessage } from '../../types/errors';
import { logger } from '../../utils/logger';

export class ValidatorMetadataRepository implements IValidatorMetadataRepository {
  private static instance: ValidatorMetadataRepository | null = null;

  private constructor() {}

  public static getInstance(): ValidatorMetadataRepository {
    if (!ValidatorMetadataRepository.instance) {
      ValidatorMetadataRepository.instance = new ValidatorMetadataRepository();
    }
    return ValidatorMetadataRepository.instance;
  }

  public async upsertMany(entries: ValidatorMetadata[]): Promise<number> {
    if (entries.length === 0) {
      return 0;
    }

    try {
      const result = await ValidatorMetadataModel.bulkWrite(
        entries.map(entry => ({
          updateOne: {
            filter: { hotkey: entry.hotkey },
            update: { $set: { ...entry } },
            upsert: true
          }
        })),
        { ordered: false }
      );
      return result.upsertedCount + result.modifiedCount;
    } catch (error) {
      logger.error(`[ValidatorMetadataRepository] Error upserting metadata: ${errorMessage(error)}`);
      throw error;
    }
  }

  public async findAll(): Promise<ValidatorMetadata[]> {
    try {
      const docs = await ValidatorMetadataModel.find({}, { _id: 0 }).lean<RawDocument[]>().exec();
      return docs
        .map(doc => YieldDocumentMapper.metadataFromDocument(doc))
        .filter((entry): entry is ValidatorMetadata => entry !== null);
    } catch (error) {
      logger.error(`[ValidatorMetadataRepository] Error reading metadata: ${errorMessage(error)}`);
      throw error;
    }
  }
}
