import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { countRecords, listRecords } from '../../store/footprintDb.js';
import { RECORD_KINDS, type RecordKind } from '../../store/models.js';
import { resolveUid } from '../uid.js';

function isRecordKind(value: string): value is RecordKind {
  return RECORD_KINDS.some((k) => k === value);
}

export function recordRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/records/:kind?uid=&limit=&offset=&include_deleted=1
  app.get('/records/:kind', async (c) => {
    const kind = c.req.param('kind');
    if (!isRecordKind(kind)) {
      return c.json({ error: `Unknown record kind: ${kind}`, kinds: RECORD_KINDS }, 400);
    }
    const uid = await resolveUid(ctx, c.req.query('uid'));
    if (uid === null) {
      return c.json({ error: 'uid must be a positive integer' }, 400);
    }

    const limit = Math.min(Math.max(Number(c.req.query('limit') ?? 50) || 50, 1), 500);
    const offset = Math.max(Number(c.req.query('offset') ?? 0) || 0, 0);
    const includeDeleted = c.req.query('include_deleted') === '1';

    return c.json({
      kind,
      uid,
      total: countRecords(ctx.db, kind, uid, { includeDeleted }),
      limit,
      offset,
      records: listRecords(ctx.db, kind, uid, { limit, offset, includeDeleted }),
    });
  });

  return app;
}
