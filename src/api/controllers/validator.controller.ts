import { Request, Response } from 'express';
import { ValidatorQueryService } from '../../services/validators/ValidatorQueryService';
import { LiveYieldService } from '../../services/yield/LiveYieldService';
import { parseFleetQuery, parsePagination, parseSortOrder, requiredInteger } from '../validation/queryParams';
import { logger } from '../../utils/logger';

/**
 * Validator Controller
 * Listings and single-validator lookups over stored yield data, plus the live path
 */
export class ValidatorController {
  constructor(
    private readonly queryService: ValidatorQueryService,
    private readonly liveService: LiveYieldService,
    private readonly defaultBatchSize: number
  ) {}

  /**
   * GET /validators
   */
  public listValidators = async (req: Request, res: Response): Promise<void> => {
    const query = parseFleetQuery(req.query, this.defaultBatchSize);
    logger.debug(`[ValidatorController] Listing validators sort_by=${query.sortBy} sort_order=${query.sortOrder}`);

    res.json(await this.queryService.listValidators(query));
  };

  /**
   * GET /validators/subnet/:subnetId
   */
  public listSubnetValidators = async (req: Request, res: Response): Promise<void> => {
    const subnetId = requiredInteger(req.params.subnetId, 'subnetId', 0);
    const result = await this.queryService.listSubnetValidators(subnetId, {
      sortOrder: parseSortOrder(req.query),
      ...parsePagination(req.query, this.defaultBatchSize)
    });

    res.json(result);
  };

  /**
   * GET /validators/:hotkey
   */
  public getValidator = async (req: Request, res: Response): Promise<void> => {
    const validator = await this.queryService.getValidator(req.params.hotkey);
    if (!validator) {
      res.status(404).json({ error: 'Validator not found' });
      return;
    }

    res.json(validator);
  };

  /**
   * GET /validators/:hotkey/live
   */
  public getLiveValidator = async (req: Request, res: Response): Promise<void> => {
    const { hotkey } = req.params;
    logger.info(`[ValidatorController] Computing live yield for ${hotkey}`);

    res.json(await this.liveService.computeLive(hotkey));
  };
}
