import type { SubnetInfo } from '../../types/metadata';

export interface ISubnetRepository {
  findAll(): Promise<SubnetInfo[]>;

  /**
   * Creates or renames one subnet, keyed by netuid
   */
  upsert(subnet: SubnetInfo): Promise<void>;
}
