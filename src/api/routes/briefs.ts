import { Hono } from 'hono';
import type { AppContext } from '../server.js';

function decodePath(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

export function briefRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/briefs — list brief dates, newest first
  app.get('/briefs', (c) => {
    return c.json(ctx.store.listBriefs().map((b) => ({ date: b.date })));
  });

  // GET /api/briefs/latest
  app.get('/briefs/latest', (c) => {
    const brief = ctx.store.getLatestBrief();
    if (!brief) {
      return c.json({ error: 'No briefs yet' }, 404);
    }
    return c.json(brief);
  });

  // GET /api/briefs/:date
  app.get('/briefs/:date', (c) => {
    const brief = ctx.store.getBriefByDate(c.req.param('date'));
    if (!brief) {
      return c.json({ error: 'Brief not found' }, 404);
    }
    return c.json(brief);
  });

  // GET /api/source/<source_id>/<file>.md — one stored content record
  app.get('/source/*', (c) => {
    const prefix = '/api/source/';
    const rest = c.req.path.startsWith(prefix) ? c.req.path.slice(prefix.length) : '';
    const relativePath = rest ? decodePath(rest) : null;
    const content = relativePath ? ctx.store.getContentByPath(relativePath) : null;
    if (!content) {
      return c.json({ error: 'Content not found' }, 404);
    }
    const { file_path: _filePath, ...record } = content;
    return c.json(record);
  });

  return app;
}
