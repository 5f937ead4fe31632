import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetryIngestionPort } from '@sensorgrid/domain';

const messageSchema = z.object({
  topic: z.string().min(1).max(512),
  // Either the raw message text or an already-parsed JSON body.
  payload: z.union([z.string(), z.record(z.unknown())]),
});

export function createIngestRouter(ingestion: TelemetryIngestionPort): Router {
  const router = Router();

  /** POST /api/ingest/messages: one transport message, routed like an MQTT delivery */
  router.post('/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = messageSchema.parse(req.body);
      const payload = typeof body.payload === 'string' ? body.payload : JSON.stringify(body.payload);
      const outcome = await ingestion.route({ topic: body.topic, payload });
      res.status(202).json({ outcome });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
