import express, { type Response } from 'express';
import { hexlify } from 'ethers';
import { z } from 'zod';
import { DayFileNotFoundError, InvalidTimestampError, createLogger } from '@mempool-archive/archive';
import { apiLatencyMs, apiRequestsTotal, registry } from './metrics';
import type { RangeQueryEngine } from './queryEngine';

const log = createLogger('api');

const epochMs = z
  .string()
  .regex(/^\d+$/, 'expected epoch milliseconds')
  .transform(Number);

const rangeQuery = z.object({ from: epochMs, to: epochMs });

type ErrorBody = { error: string; message?: string; day?: string };

function reply(res: Response, route: string, code: number, body: object): void {
  apiRequestsTotal.inc({ route, code });
  res.status(code).json(body);
}

export function createApp(engine: Pick<RangeQueryEngine, 'queryRawTransactions'>): express.Express {
  const app = express();

  app.get('/healthz', (_req, res) => { res.json({ status: 'ok' }); });
  app.get('/metrics', async (_req, res) => { res.set('Content-Type', registry.contentType); res.send(await registry.metrics()); });

  app.get('/raw-transactions', async (req, res) => {
    const route = '/raw-transactions';
    const started = performance.now();
    try {
      const params = rangeQuery.safeParse(req.query);
      if (!params.success) {
        const message = params.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
        reply(res, route, 400, { error: 'bad_request', message } satisfies ErrorBody);
        return;
      }
      const { from, to } = params.data;
      const items = await engine.queryRawTransactions(from, to);
      reply(res, route, 200, {
        from,
        to,
        count: items.length,
        items: items.map((row) => ({ timestampMs: row.timestampMs, rawTx: hexlify(row.rawTx) })),
      });
    } catch (err) {
      if (err instanceof InvalidTimestampError) {
        reply(res, route, 400, { error: 'invalid_timestamp', message: err.message } satisfies ErrorBody);
      } else if (err instanceof DayFileNotFoundError) {
        reply(res, route, 404, { error: 'day_not_found', message: err.message, day: err.day } satisfies ErrorBody);
      } else {
        log.error({ err, url: req.originalUrl }, 'range query failed');
        reply(res, route, 500, { error: 'internal' } satisfies ErrorBody);
      }
    } finally {
      apiLatencyMs.observe({ route }, performance.now() - started);
    }
  });

  return app;
}
