import { Request, Response } from 'express';
import { SubnetService } from '../../services/subnets/SubnetService';
import { requiredInteger } from '../validation/queryParams';
import { ValidationError } from '../../types/errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyString(body: unknown, field: string): string {
  const value = isRecord(body) ? body[field] : undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} is required`, field);
  }
  return value;
}

export class SubnetController {
  constructor(private readonly subnetService: SubnetService) {}

  /**
   * GET /subnets
   */
  public listSubnets = async (req: Request, res: Response): Promise<void> => {
    res.json(await this.subnetService.listSubnets());
  };

  /**
   * POST /admin/subnets/:netuid
   */
  public updateSubnet = async (req: Request, res: Response): Promise<void> => {
    const netuid = requiredInteger(req.params.netuid, 'netuid', 0);
    const body: unknown = req.body;
    const subnet = await this.subnetService.updateSubnet(netuid, bodyString(body, 'name'), bodyString(body, 'symbol'));

    res.json({ success: true, message: `Updated metadata for subnet ${netuid}`, data: subnet });
  };
}
