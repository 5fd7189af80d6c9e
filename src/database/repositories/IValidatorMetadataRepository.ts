import type { ValidatorMetadata } from '../../types/metadata';

export interface IValidatorMetadataRepository {
  /**
   * Upserts every entry by hotkey and returns how many documents changed
   */
  upsertMany(entries: ValidatorMetadata[]): Promise<number>;

  findAll(): Promise<ValidatorMetadata[]>;
}
