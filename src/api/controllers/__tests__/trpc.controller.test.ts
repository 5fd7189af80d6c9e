import { describe, it, expect } from 'vitest';
import { runBatch } from '../trpc.controller';
import type { ProcedureHandler } from '../trpc.controller';

const context = { batchSize: 32 };

describe('runBatch', () => {
  const procedures = new Map<string, ProcedureHandler>([
    ['subnets.getSubnetsNameAndSymbol', async () => [{ netuid: '0', name: 'Root', symbol: 'ROOT' }]],
    ['delegates.getDelegates4', async ctx => ({ batchSize: ctx.batchSize })],
    ['broken', async () => {
      throw new Error('store down');
    }]
  ]);

  it('returns one entry per name in request order', async () => {
    const entries = await runBatch(procedures, ['delegates.getDelegates4', 'subnets.getSubnetsNameAndSymbol'], context);

    expect(entries).toEqual([
      { result: { data: { json: { batchSize: 32 } } } },
      { result: { data: { json: [{ netuid: '0', name: 'Root', symbol: 'ROOT' }] } } }
    ]);
  });

  it('reports unknown procedures without failing the batch', async () => {
    const entries = await runBatch(procedures, ['nope', 'subnets.getSubnetsNameAndSymbol'], context);

    expect(entries[0]).toEqual({ error: { message: 'Unknown procedure: nope' } });
    expect(entries[1]).toHaveProperty('result');
  });

  it('turns a failing procedure into an error entry', async () => {
    const entries = await runBatch(procedures, ['broken', 'delegates.getDelegates4'], context);

    expect(entries).toEqual([
      { error: { message: 'store down' } },
      { result: { data: { json: { batchSize: 32 } } } }
    ]);
  });
});
