import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SeriesResult, TelemetryQueryPort, TimeWindow } from '@sensorgrid/domain';

const isoTimestamp = z.string().refine((v) => !Number.isNaN(Date.parse(v)), 'must be an ISO-8601 timestamp');
const segment = z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a topic segment');

const windowSchema = z.object({
  from: isoTimestamp,
  to: isoTimestamp,
  timeoutMs: z.coerce.number().int().positive().max(120_000).optional(),
});

const sensorQuerySchema = windowSchema.extend({ sensorType: segment });

function respond(res: Response, window: TimeWindow, result: SeriesResult): void {
  res.json({
    data: result.readings,
    count: result.readings.length,
    expired: result.expired,
    window,
  });
}

export function createSeriesRouter(engine: TelemetryQueryPort): Router {
  const router = Router();

  /** GET /api/series?sensorType=&from=&to=&timeoutMs= */
  router.get('/series', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = sensorQuerySchema.parse(req.query);
      const window = { from: query.from, to: query.to };
      const result = await engine.series({ sensorType: query.sensorType }, window, {
        timeoutMs: query.timeoutMs,
      });
      respond(res, window, result);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/devices/:deviceId/series?from=&to=&timeoutMs= */
  router.get('/devices/:deviceId/series', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const deviceId = segment.parse(req.params['deviceId']);
      const query = windowSchema.parse(req.query);
      const window = { from: query.from, to: query.to };
      const result = await engine.series({ deviceId }, window, { timeoutMs: query.timeoutMs });
      respond(res, window, result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
