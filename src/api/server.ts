import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import type { SourceRegistry } from '../source/registry.js';
import type { ContentStore } from '../storage/contentStore.js';
import type { SourceStateTracker } from '../state/sourceState.js';
import type { Coordinator } from '../collect/coordinator.js';
import { DaybriefError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { briefRoutes } from './routes/briefs.js';
import { statusRoutes } from './routes/status.js';
import { collectRoutes } from './routes/collect.js';

export interface AppContext {
  config: Config;
  registry: SourceRegistry;
  store: ContentStore;
  state: SourceStateTracker;
  coordinator: Coordinator;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', briefRoutes(ctx));
  app.route('/api', statusRoutes(ctx));
  app.route('/api', collectRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof DaybriefError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'COLLECTION_BUSY':
      return 409;
    case 'BRIEF_ERROR':
      return 422;
    case 'FETCH_ERROR':
    case 'LLM_ERROR':
      return 502;
    default:
      return 500;
  }
}

export function startServer(ctx: AppContext, opts: { port?: number; host?: string } = {}): void {
  const port = opts.port ?? ctx.config.server.port;
  const hostname = opts.host ?? ctx.config.server.host;
  const app = createApp(ctx);

  logger.info({ port, host: hostname }, 'Starting daybrief server');
  serve({ fetch: app.fetch, port, hostname }, (info) => {
    logger.info(`Listening on http://${hostname}:${info.port}`);
  });
}
