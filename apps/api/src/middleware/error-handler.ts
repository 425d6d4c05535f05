import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isRentalError } from '@rentdesk/domain';

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
  if (isRentalError(err)) {
    if (err.status >= 500) console.error(`[api] ${err.code}`, err);
    res.status(err.status).json({ error: err.code, message: err.message, details: err.details });
    return;
  }
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'validation_error', message: 'malformed JSON body' });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
}
