import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';

const FetchBody = z.object({
  archive: z.boolean().optional(),
  save: z.boolean().default(true),
  fresh: z.boolean().default(false),
});

export function fetchRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/fetch: start (or resume) a full fetch in the background
  app.post('/fetch', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = FetchBody.safeParse(raw);
    if (!body.success) {
      return c.json({ error: 'Invalid request', errors: body.error.flatten().fieldErrors }, 400);
    }

    const job = ctx.fetchJobs.start({
      includeArchive: body.data.archive ?? ctx.config.archive.enabled,
      save: body.data.save,
      fresh: body.data.fresh,
    });
    return c.json(job, 202);
  });

  // GET /api/fetch/status
  app.get('/fetch/status', (c) => {
    const job = ctx.fetchJobs.snapshot();
    if (!job) {
      return c.json({ message: 'No fetch has been run yet' }, 404);
    }
    return c.json(job);
  });

  // POST /api/fetch/stop: pause at the next page boundary
  app.post('/fetch/stop', (c) => {
    if (!ctx.fetchJobs.stop()) {
      return c.json({ error: 'No fetch is running' }, 409);
    }
    return c.json({ ok: true });
  });

  return app;
}
