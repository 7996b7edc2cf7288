import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { planDeletion, type DeletionPlan } from '../../delete/plan.js';

const DeleteBody = z.object({
  kind: z.enum(['comment', 'danmu', 'notification']),
  ids: z.array(z.string().regex(/^\d+$/, 'ids must be decimal strings')).min(1),
  cascade: z.boolean().default(false),
  local_action: z.enum(['none', 'soft', 'hard']).optional(),
  delay_seconds: z.number().nonnegative().optional(),
});

export function deleteRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/delete: start a deletion job
  app.post('/delete', async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = DeleteBody.safeParse(raw);
    if (!body.success) {
      return c.json({ error: 'Invalid request', errors: body.error.flatten().fieldErrors }, 400);
    }

    const session = await ctx.openSession({ archive: false });
    let plan: DeletionPlan;
    try {
      plan = planDeletion(ctx.db, session.uid, body.data);
    } catch (err) {
      session.close();
      throw err;
    }
    if (plan.tasks.length === 0) {
      session.close();
      return c.json({ error: 'None of the requested records are stored', missing: plan.missing }, 404);
    }

    const job = ctx.deleteJobs.start(session, plan.tasks, {
      localAction: body.data.local_action ?? ctx.config.delete.local_action,
      delaySeconds: body.data.delay_seconds ?? ctx.config.delete.delay_seconds,
    });
    return c.json({ ...job, missing: plan.missing }, 202);
  });

  // GET /api/delete/:jobId
  app.get('/delete/:jobId', (c) => {
    const job = ctx.deleteJobs.get(c.req.param('jobId'));
    if (!job) {
      return c.json({ error: 'Job not found' }, 404);
    }
    return c.json(job);
  });

  // POST /api/delete/:jobId/stop
  app.post('/delete/:jobId/stop', (c) => {
    if (!ctx.deleteJobs.stop(c.req.param('jobId'))) {
      return c.json({ error: 'Job not found or already finished' }, 409);
    }
    return c.json({ ok: true });
  });

  return app;
}
