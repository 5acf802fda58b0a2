import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import type { CollectionStats } from '../../collect/coordinator.js';

export function collectRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  let lastCollectStats: CollectionStats | null = null;

  // POST /api/collect — run a collection for all sources or one
  app.post('/collect', async (c) => {
    type CollectBody = { source?: string; force?: boolean };
    const body = await c.req.json<CollectBody>().catch((): CollectBody => ({}));
    const force = body.force === true;

    let stats: CollectionStats | null;
    if (body.source) {
      stats = await ctx.coordinator.collectById(body.source, force);
      if (!stats) {
        return c.json({ error: 'Source not found', source: body.source }, 404);
      }
    } else {
      stats = await ctx.coordinator.collectAll(force);
    }

    lastCollectStats = stats;
    return c.json(stats);
  });

  // GET /api/collect/last — stats of the last run started through the API
  app.get('/collect/last', (c) => {
    if (!lastCollectStats) {
      return c.json({ message: 'No collection has been run yet' }, 404);
    }
    return c.json(lastCollectStats);
  });

  return app;
}
