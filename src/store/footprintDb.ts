import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { nowUnix } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import type { Comment, Danmu, EntityId, Notification } from '../fetch/types.js';
import type {
  CommentRecord,
  DanmuRecord,
  FootprintStats,
  KindStats,
  ListOptions,
  LocalRecordStore,
  NotificationRecord,
  RecordByKind,
  RecordKind,
  SyncCursor,
  SyncDataType,
} from './models.js';

const TABLES: Record<RecordKind, string> = {
  comment: 'comments',
  danmu: 'danmus',
  notification: 'notifications',
};

function wrap<T>(what: string, fn: () => T, details?: Record<string, unknown>): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof DbError) throw err;
    throw new DbError(`Failed to ${what}: ${errorMessage(err)}`, details);
  }
}

// ================================================================
// Upserts
// ================================================================

/**
 * Insert or overwrite by (id, uid). The local soft-delete flag survives an overwrite.
 */
export function upsertComments(
  db: Database.Database,
  uid: number,
  entries: Iterable<[EntityId, Comment]>,
  syncedTime = nowUnix(),
): number {
  const stmt = db.prepare(
    `INSERT INTO comments
       (id, uid, oid, type, content, notify_id, tp, source, created_time, synced_time, video_uri, like_count)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(id, uid) DO UPDATE SET
       oid = excluded.oid, type = excluded.type, content = excluded.content,
       notify_id = excluded.notify_id, tp = excluded.tp, source = excluded.source,
       created_time = excluded.created_time, synced_time = excluded.synced_time,
       video_uri = excluded.video_uri, like_count = excluded.like_count`,
  );
  return wrap('upsert comments', () =>
    db.transaction(() => {
      let n = 0;
      for (const [id, c] of entries) {
        stmt.run(id, uid, c.oid, c.type, c.content, c.notifyId, c.tp, c.source, c.createdTime, syncedTime, c.videoUri, c.likeCount);
        n++;
      }
      return n;
    })(),
  );
}

export function upsertDanmus(
  db: Database.Database,
  uid: number,
  entries: Iterable<[EntityId, Danmu]>,
  syncedTime = nowUnix(),
): number {
  const stmt = db.prepare(
    `INSERT INTO danmus (id, uid, content, cid, notify_id, source, created_time, synced_time, video_url)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(id, uid) DO UPDATE SET
       content = excluded.content, cid = excluded.cid, notify_id = excluded.notify_id,
       source = excluded.source, created_time = excluded.created_time,
       synced_time = excluded.synced_time, video_url = excluded.video_url`,
  );
  return wrap('upsert danmus', () =>
    db.transaction(() => {
      let n = 0;
      for (const [id, d] of entries) {
        stmt.run(id, uid, d.content, d.cid, d.notifyId, d.source, d.createdTime, syncedTime, d.videoUrl);
        n++;
      }
      return n;
    })(),
  );
}

export function upsertNotifications(
  db: Database.Database,
  uid: number,
  entries: Iterable<[EntityId, Notification]>,
  syncedTime = nowUnix(),
): number {
  const stmt = db.prepare(
    `INSERT INTO notifications (id, uid, content, tp, system_notify_api, source, created_time, synced_time)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(id, uid) DO UPDATE SET
       content = excluded.content, tp = excluded.tp, system_notify_api = excluded.system_notify_api,
       source = excluded.source, created_time = excluded.created_time, synced_time = excluded.synced_time`,
  );
  return wrap('upsert notifications', () =>
    db.transaction(() => {
      let n = 0;
      for (const [id, x] of entries) {
        stmt.run(id, uid, x.content, x.tp, x.systemNotifyApi, x.source, x.createdTime, syncedTime);
        n++;
      }
      return n;
    })(),
  );
}

// ================================================================
// Reads
// ================================================================

/** Newest first. */
export function listRecords<K extends RecordKind>(
  db: Database.Database,
  kind: K,
  uid: number,
  opts: ListOptions = {},
): RecordByKind[K][] {
  const where = opts.includeDeleted ? 'uid = ?' : 'uid = ? AND is_deleted = 0';
  return db
    .prepare(`SELECT * FROM ${TABLES[kind]} WHERE ${where} ORDER BY created_time DESC, id DESC LIMIT ? OFFSET ?`)
    .all(uid, opts.limit ?? 100, opts.offset ?? 0) as RecordByKind[K][];
}

export function listComments(db: Database.Database, uid: number, opts?: ListOptions): CommentRecord[] {
  return listRecords(db, 'comment', uid, opts);
}

export function listDanmus(db: Database.Database, uid: number, opts?: ListOptions): DanmuRecord[] {
  return listRecords(db, 'danmu', uid, opts);
}

export function listNotifications(db: Database.Database, uid: number, opts?: ListOptions): NotificationRecord[] {
  return listRecords(db, 'notification', uid, opts);
}

export function getRecord<K extends RecordKind>(
  db: Database.Database,
  kind: K,
  uid: number,
  id: EntityId,
): RecordByKind[K] | undefined {
  return db.prepare(`SELECT * FROM ${TABLES[kind]} WHERE id = ? AND uid = ?`).get(id, uid) as
    | RecordByKind[K]
    | undefined;
}

export function countRecords(
  db: Database.Database,
  kind: RecordKind,
  uid: number,
  opts: { includeDeleted?: boolean } = {},
): number {
  const where = opts.includeDeleted ? 'uid = ?' : 'uid = ? AND is_deleted = 0';
  const row = db.prepare(`SELECT COUNT(*) AS n FROM ${TABLES[kind]} WHERE ${where}`).get(uid) as { n: number };
  return row.n;
}

/** Ids from `ids` that are not stored yet for this uid, in input order. */
export function filterExistingIds(db: Database.Database, kind: RecordKind, uid: number, ids: Iterable<EntityId>): EntityId[] {
  const stmt = db.prepare(`SELECT 1 FROM ${TABLES[kind]} WHERE id = ? AND uid = ?`);
  const fresh: EntityId[] = [];
  for (const id of ids) {
    if (stmt.get(id, uid) === undefined) fresh.push(id);
  }
  return fresh;
}

// ================================================================
// Deletion
// ================================================================

export function markDeleted(db: Database.Database, kind: RecordKind, uid: number, id: EntityId): boolean {
  return wrap(
    'mark record deleted',
    () => db.prepare(`UPDATE ${TABLES[kind]} SET is_deleted = 1 WHERE id = ? AND uid = ?`).run(id, uid).changes > 0,
    { kind, id },
  );
}

export function deletePermanently(db: Database.Database, kind: RecordKind, uid: number, id: EntityId): boolean {
  return wrap(
    'delete record',
    () => db.prepare(`DELETE FROM ${TABLES[kind]} WHERE id = ? AND uid = ?`).run(id, uid).changes > 0,
    { kind, id },
  );
}

export interface ClearResult {
  comments: number;
  danmus: number;
  notifications: number;
  cursors: number;
}

export function clearUserData(db: Database.Database, uid: number): ClearResult {
  return wrap('clear user data', () =>
    db.transaction(() => ({
      comments: db.prepare('DELETE FROM comments WHERE uid = ?').run(uid).changes,
      danmus: db.prepare('DELETE FROM danmus WHERE uid = ?').run(uid).changes,
      notifications: db.prepare('DELETE FROM notifications WHERE uid = ?').run(uid).changes,
      cursors: db.prepare('DELETE FROM sync_cursors WHERE uid = ?').run(uid).changes,
    }))(),
  );
}

// ================================================================
// Stats
// ================================================================

function kindStats(db: Database.Database, table: string, uid: number): KindStats {
  const totals = db
    .prepare(
      `SELECT COUNT(*) AS total, COALESCE(SUM(is_deleted), 0) AS deleted FROM ${table} WHERE uid = ?`,
    )
    .get(uid) as { total: number; deleted: number };
  const sources = db
    .prepare(`SELECT source, COUNT(*) AS n FROM ${table} WHERE uid = ? GROUP BY source ORDER BY source`)
    .all(uid) as Array<{ source: string; n: number }>;

  const bySource: Record<string, number> = {};
  for (const s of sources) bySource[s.source] = s.n;
  return { total: totals.total, active: totals.total - totals.deleted, deleted: totals.deleted, bySource };
}

export function getStats(db: Database.Database, uid: number): FootprintStats {
  const cursors = db.prepare('SELECT data_type, last_sync FROM sync_cursors WHERE uid = ?').all(uid) as Array<{
    data_type: SyncDataType;
    last_sync: number;
  }>;
  const lastSync: FootprintStats['lastSync'] = {};
  for (const c of cursors) lastSync[c.data_type] = c.last_sync;

  return {
    uid,
    comments: kindStats(db, 'comments', uid),
    danmus: kindStats(db, 'danmus', uid),
    notifications: kindStats(db, 'notifications', uid),
    lastSync,
  };
}

// ================================================================
// Sync cursors & watermarks
// ================================================================

interface CursorRow {
  uid: number;
  data_type: SyncDataType;
  cursor_id: number | null;
  cursor_time: number | null;
  last_sync: number;
  extra_data: string;
}

function parseExtra(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch (err) {
    logger.debug({ error: errorMessage(err) }, 'Unreadable cursor extra_data, ignoring');
  }
  return {};
}

export function getCursor(db: Database.Database, uid: number, dataType: SyncDataType): SyncCursor | null {
  const row = db.prepare('SELECT * FROM sync_cursors WHERE uid = ? AND data_type = ?').get(uid, dataType) as
    | CursorRow
    | undefined;
  if (!row) return null;
  return { ...row, extra_data: parseExtra(row.extra_data) };
}

export function saveCursor(db: Database.Database, cursor: SyncCursor): void {
  wrap(
    'save sync cursor',
    () =>
      db
        .prepare(
          `INSERT INTO sync_cursors (uid, data_type, cursor_id, cursor_time, last_sync, extra_data)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(uid, data_type) DO UPDATE SET
             cursor_id = excluded.cursor_id, cursor_time = excluded.cursor_time,
             last_sync = excluded.last_sync, extra_data = excluded.extra_data`,
        )
        .run(
          cursor.uid,
          cursor.data_type,
          cursor.cursor_id,
          cursor.cursor_time,
          cursor.last_sync,
          JSON.stringify(cursor.extra_data),
        ),
    { dataType: cursor.data_type },
  );
}

const WATERMARK_QUERIES: Record<SyncDataType, string> = {
  liked: 'SELECT MAX(created_time) AS t FROM notifications WHERE uid = ? AND tp = 0 AND system_notify_api IS NULL',
  replied: 'SELECT MAX(created_time) AS t FROM notifications WHERE uid = ? AND tp = 1 AND system_notify_api IS NULL',
  ated: 'SELECT MAX(created_time) AS t FROM notifications WHERE uid = ? AND tp = 2 AND system_notify_api IS NULL',
  system_notify: 'SELECT MAX(created_time) AS t FROM notifications WHERE uid = ? AND system_notify_api IS NOT NULL',
  aicu_comments: "SELECT MAX(created_time) AS t FROM comments WHERE uid = ? AND source = 'aicu'",
  aicu_danmus: "SELECT MAX(created_time) AS t FROM danmus WHERE uid = ? AND source = 'aicu'",
};

/** Newest stored `created_time` for a data type, 0 when nothing is stored. */
export function getWatermark(db: Database.Database, uid: number, dataType: SyncDataType): number {
  const row = db.prepare(WATERMARK_QUERIES[dataType]).get(uid) as { t: number | null };
  return row.t ?? 0;
}

export function bindRecordStore(db: Database.Database, uid: number): LocalRecordStore {
  return {
    markDeleted: (kind, id) => markDeleted(db, kind, uid, id),
    deletePermanently: (kind, id) => deletePermanently(db, kind, uid, id),
  };
}
