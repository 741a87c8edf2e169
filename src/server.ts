/**
 * Express server configuration.
 *
 * Assembles the release API surface with middleware and routes over a
 * prepared release context.
 */

import express from 'express';
import { ReleaseContext } from './context';
import { createReleaseRoutes } from './api/releases';
import { errorHandler, requestLogger } from './api/middleware';

const startTime = Date.now();

/** What the HTTP surface needs from a release context. */
export type AppContext = Pick<ReleaseContext, 'pipeline' | 'store'>;

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
    });
  });

  const v1 = express.Router();
  v1.use('/', createReleaseRoutes(ctx.pipeline, ctx.store.releases));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
