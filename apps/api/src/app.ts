import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AccessGatePort, TelemetryIngestionPort, TelemetryQueryPort } from '@sensorgrid/domain';

import { createSeriesRouter } from './controllers/series.controller.js';
import { createIngestRouter } from './controllers/ingest.controller.js';
import { requireAccess } from './middleware/access-gate.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDependencies {
  queryEngine: TelemetryQueryPort;
  ingestion: TelemetryIngestionPort;
  /** When absent the API is served without authentication. */
  accessGate?: AccessGatePort;
  corsOrigin?: string;
  storeDriver: string;
  /** Access log format; false disables it. */
  httpLog?: string | false;
}

export function buildApp(deps: AppDependencies): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (deps.httpLog !== false) app.use(morgan(deps.httpLog ?? 'combined'));
  app.use(express.json({ limit: '1mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString(), store: deps.storeDriver });
  });

  // ─── Routes ─────────────────────────────────────────────────────────────────
  if (deps.accessGate) app.use('/api', requireAccess(deps.accessGate));
  app.use('/api', createSeriesRouter(deps.queryEngine));
  app.use('/api/ingest', createIngestRouter(deps.ingestion));

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
