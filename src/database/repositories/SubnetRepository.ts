import { SubnetInfoModel } from '../models/SubnetInfo';
import type { RawDocument } from '../mappers/YieldDocumentMapper';
import type { SubnetInfo } from '../../types/metadata';
import { ISubnetRepository } from './ISubnetRepository';
import { errorMessage } from '../../types/errors';
import { logger } from '../../utils/logger';

function toSubnetInfo(doc: RawDocument): SubnetInfo | null {
  const { netuid, name, symbol, last_updated } = doc;
  if (typeof netuid !== 'string' || typeof name !== 'string' || typeof symbol !== 'string') {
    return null;
  }
  return {
    netuid,
    name,
    symbol,
    last_updated: typeof last_updated === 'string' ? last_updated : null
  };
}

export class SubnetRepository implements ISubnetRepository {
  private static instance: SubnetRepository | null = null;

  private constructor() {}

  public static getInstance(): SubnetRepository {
    if (!SubnetRepository.instance) {
      SubnetRepository.instance = new SubnetRepository();
    }
    return SubnetRepository.instance;
  }

  public async findAll(): Promise<SubnetInfo[]> {
    try {
      const docs = await SubnetInfoModel.find({}, { _id: 0 }).lean<RawDocument[]>().exec();
      return docs
        .map(toSubnetInfo)
        .filter((subnet): subnet is SubnetInfo => subnet !== null);
    } catch (error) {
      logger.error(`[SubnetRepository] Error reading subnets: ${errorMessage(error)}`);
      throw error;
    }
  }

  public async upsert(subnet: SubnetInfo): Promise<void> {
    try {
      await SubnetInfoModel.updateOne(
        { netuid: subnet.netuid },
        { $set: { ...subnet } },
        { upsert: true }
      );
    } catch (error) {
      logger.error(`[SubnetRepository] Error upserting subnet ${subnet.netuid}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
