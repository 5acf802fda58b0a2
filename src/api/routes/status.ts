import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { buildStatusReport } from '../../state/report.js';

export function statusRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health
  app.get('/health', (c) => {
    return c.json({ status: 'ok', uptime: process.uptime() });
  });

  // GET /api/status — per-source health joined with recorded state
  app.get('/status', (c) => {
    return c.json(buildStatusReport(ctx.registry.getAllSources(), ctx.state));
  });

  // GET /api/status/:id
  app.get('/status/:id', (c) => {
    const id = c.req.param('id');
    const source = ctx.registry.getSourceById(id);
    if (!source) {
      return c.json({ error: 'Source not found' }, 404);
    }
    return c.json({ source, state: ctx.state.getState(id) ?? null });
  });

  return app;
}
