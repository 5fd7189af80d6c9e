import { Request, Response } from 'express';
import { parsePagination } from '../validation/queryParams';
import type { DelegatePagination } from '../../services/validators/DelegateListingService';
import { errorMessage } from '../../types/errors';
import { logger } from '../../utils/logger';

export type ProcedureContext = DelegatePagination;

export type ProcedureHandler = (context: ProcedureContext) => Promise<unknown>;

export type BatchEntry =
  | { result: { data: { json: unknown } } }
  | { error: { message: string } };

/**
 * Runs every named procedure in order. The response array is aligned with
 * `names`; an unknown name or a failing procedure becomes an error entry and
 * never fails the whole batch.
 */
export async function runBatch(
  procedures: ReadonlyMap<string, ProcedureHandler>,
  names: readonly string[],
  context: ProcedureContext
): Promise<BatchEntry[]> {
  const entries: BatchEntry[] = [];

  for (const name of names) {
    const handler = procedures.get(name);
    if (!handler) {
      entries.push({ error: { message: `Unknown procedure: ${name}` } });
      continue;
    }

    try {
      entries.push({ result: { data: { json: await handler(context) } } });
    } catch (error) {
      logger.logError(error, `[TrpcController] Procedure ${name} failed`);
      entries.push({ error: { message: errorMessage(error) } });
    }
  }

  return entries;
}

/**
 * tRPC-style batch endpoint: GET or POST /trpc/<proc1>,<proc2>,...
 */
export class TrpcController {
  private readonly procedures: ReadonlyMap<string, ProcedureHandler>;

  constructor(procedures: Record<string, ProcedureHandler>, private readonly defaultBatchSize: number) {
    this.procedures = new Map(Object.entries(procedures));
  }

  public handleBatch = async (req: Request, res: Response): Promise<void> => {
    const names = req.params.procedures.split(',').map(name => name.trim());
    const context = parsePagination(req.query, this.defaultBatchSize);

    res.json(await runBatch(this.procedures, names, context));
  };
}
