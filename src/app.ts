import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import logger from './lib/logger';

import schedulesRouter from './api/routes/schedules';
import dayCountRouter from './api/routes/dayCount';

export function createApp(): express.Express {
  const app = express();

  // ── Security middleware ─────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));

  // Global rate limit: RATE_LIMIT_MAX requests per 15 min per IP
  app.use(rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: config.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  }));

  app.use(express.json({ limit: config.bodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/schedules', schedulesRouter);
  app.use('/api/day-count', dayCountRouter);

  // 404 fallback
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON lands here as a 400 from body-parser; everything else is a 500
  app.use((err: Error & { status?: number; type?: string }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err.type === 'entity.parse.failed' || err.type === 'entity.too.large') {
      res.status(err.status ?? 400).json({ error: err.message });
      return;
    }
    logger.error({ err: err.message }, 'Unhandled Express error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
