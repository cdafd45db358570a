import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import path from 'path';
import { fileURLToPath } from 'url';
import reindexRouter from './routes/reindex.js';
import searchRouter from './routes/search.js';
import { HttpError, errorMessage, statusCodeOf } from './errors.js';
import { logger } from './logger.js';
import { pingIndex } from './vector.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const INDEX_PAGE = path.resolve(__dirname, '../public/index.html');

export function createApp() {
  const app = express();

  // Core middleware
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  // Static search page
  app.get('/', (_req: Request, res: Response) => {
    res.sendFile(INDEX_PAGE);
  });

  // Healthcheck: the index must answer
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      await pingIndex();
    } catch (err) {
      logger.warn({ err }, 'health.index_unreachable');
      throw new HttpError(503, errorMessage(err));
    }
    res.status(200).json({ ok: true });
  });

  // Mount routes
  app.use('/search', searchRouter);   // GET /search
  app.use('/reindex', reindexRouter); // POST /reindex

  // 404
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusCodeOf(err);
    if (status >= 500) {
      logger.error({ err, method: req.method, path: req.path }, 'request.failed');
    }
    const body: { error: string; details?: unknown } = { error: errorMessage(err) || 'Internal Server Error' };
    if (err instanceof HttpError && err.details !== undefined) body.details = err.details;
    res.status(status).json(body);
  });

  return app;
}
