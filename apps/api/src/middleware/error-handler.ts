import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isTelemetryError } from '@sensorgrid/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (isTelemetryError(err)) {
    if (err.status >= 500) console.warn(`[api] ${err.kind}: ${err.message}`);
    // authentication failures carry no detail
    res.status(err.status).json(
      err.kind === 'AuthenticationFailure' ? { error: err.code } : { error: err.code, message: err.message },
    );
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'internal_error' });
}
