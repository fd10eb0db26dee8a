import { Response } from 'express';
import { LoanScheduleError } from '../loan/errors';
import logger from '../lib/logger';

/** Domain errors are the caller's input problem (422); anything else is ours (500). */
export function handleRouteError(err: unknown, res: Response, route: string): void {
  if (err instanceof LoanScheduleError) {
    logger.warn({ code: err.code, err: err.message }, `${route} rejected`);
    res.status(422).json({ error: err.message, code: err.code });
    return;
  }
  logger.error({ err: err instanceof Error ? err.message : err }, `${route} error`);
  res.status(500).json({ error: 'Internal server error' });
}
