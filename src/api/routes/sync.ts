import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { runIncrementalSync } from '../../store/incremental.js';

const SyncBody = z.object({ archive: z.boolean().optional() });

export function syncRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sync: incremental catch-up; responds when done, 409 while a fetch runs
  app.post('/sync', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = SyncBody.safeParse(raw);
    if (!body.success) {
      return c.json({ error: 'Invalid request', errors: body.error.flatten().fieldErrors }, 400);
    }

    const includeArchive = body.data.archive ?? ctx.config.archive.enabled;
    const summary = await ctx.walks.hold('sync', async () => {
      const session = await ctx.openSession({ archive: includeArchive });
      try {
        const result = await runIncrementalSync(
          ctx.db,
          { platform: session.platform, archive: session.archive ?? undefined },
          {
            uid: session.uid,
            includeArchive,
            settings: ctx.config.incremental,
            archivePageSize: ctx.config.archive.page_size,
            sleep: ctx.sleep,
          },
        );
        return {
          uid: result.uid,
          types: result.types,
          added: {
            notifications: result.added.notifications.size,
            comments: result.added.comments.size,
            danmus: result.added.danmus.size,
          },
        };
      } finally {
        session.close();
      }
    });
    return c.json(summary);
  });

  return app;
}
