/**
 * NewsPulse — HTTP API
 *
 * Thin Express layer over the query service.
 *
 * Endpoints:
 * - GET /api/articles   — newest items, `?limit=N&source=NAME`
 * - GET /api/sources    — configured feeds
 * - GET /health         — health check for monitoring
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { errorMessage, logger } from '../lib/logger';
import { serializeItem } from '../feeds/normalizer';
import type { FeedQueryService } from '../feeds/query';
import type { SourceRegistry } from '../feeds/registry';

export const SERVICE_NAME = 'newspulse';
export const SERVICE_VERSION = '1.0.0';

export interface ApiDeps {
  query: FeedQueryService;
  registry: SourceRegistry;
  /** Largest `limit` a caller may ask for */
  maxLimit: number;
}

function articlesQuerySchema(maxLimit: number) {
  return z.object({
    limit: z.coerce
      .number({ invalid_type_error: 'limit must be a number' })
      .int('limit must be an integer')
      .min(1, 'limit must be at least 1')
      .max(maxLimit, `limit must be at most ${maxLimit}`)
      .optional(),
    source: z.string().trim().min(1).optional(),
  });
}

export function createApiServer(deps: ApiDeps): express.Express {
  const app = express();
  const articlesQuery = articlesQuerySchema(deps.maxLimit);

  app.disable('x-powered-by');

  // ============================================================
  // CORS
  // ============================================================

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', '*');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // ============================================================
  // HEALTH ENDPOINT
  // ============================================================

  app.get('/health', (_req: Request, res: Response) => {
    const stats = deps.query.stats();

    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      items: stats.items,
      lastRefresh: stats.lastRefresh
        ? {
            completedAt: stats.lastRefresh.completedAt,
            durationMs: stats.lastRefresh.durationMs,
            failedSources: stats.lastRefresh.errors.length,
          }
        : null,
    });
  });

  // ============================================================
  // ARTICLES
  // ============================================================

  app.get('/api/articles', (req: Request, res: Response) => {
    const parsed = articlesQuery.safeParse(req.query);

    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => issue.message).join('; ');
      logger.debug('Rejected articles query', { query: req.query, error: message });
      res.status(400).json({ error: message });
      return;
    }

    const { limit, source } = parsed.data;
    const items = source
      ? deps.query.latestBySource(source, limit)
      : deps.query.latest(limit);

    res.json(items.map(serializeItem));
  });

  app.get('/api/sources', (_req: Request, res: Response) => {
    res.json(deps.registry.list().map(({ name, url }) => ({ name, url })));
  });

  // ============================================================
  // FALLTHROUGH + ERROR HANDLER
  // ============================================================

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in API server', { error: errorMessage(err) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Listen on `port`; resolves once the socket is bound.
 */
export function startServer(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`API server listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
