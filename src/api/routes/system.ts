import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { getStats } from '../../store/footprintDb.js';
import { resolveUid } from '../uid.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
      fetchRunning: ctx.fetchJobs.running,
    });
  });

  // GET /api/stats?uid=: counts by kind, deleted flag and source, plus last sync times
  app.get('/stats', async (c) => {
    const uid = await resolveUid(ctx, c.req.query('uid'));
    if (uid === null) {
      return c.json({ error: 'uid must be a positive integer' }, 400);
    }
    return c.json(getStats(ctx.db, uid));
  });

  return app;
}
