import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import {
  bindRecordStore,
  clearUserData,
  countRecords,
  deletePermanently,
  filterExistingIds,
  getCursor,
  getRecord,
  getStats,
  getWatermark,
  listComments,
  listRecords,
  markDeleted,
  saveCursor,
  upsertComments,
  upsertDanmus,
  upsertNotifications,
} from '../footprintDb.js';
import { comment, danmu, notification, openTestDb } from './fixtures.js';

const UID = 42;
let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

describe('upserts', () => {
  it('overwrites by id and uid, leaving one row', () => {
    upsertComments(db, UID, [['1', comment({ content: 'first' })]], 10);
    const n = upsertComments(db, UID, [['1', comment({ content: 'second', likeCount: 4 })]], 20);

    expect(n).toBe(1);
    expect(countRecords(db, 'comment', UID)).toBe(1);
    expect(getRecord(db, 'comment', UID, '1')).toMatchObject({ content: 'second', like_count: 4, synced_time: 20 });
  });

  it('keeps the same id apart across uids', () => {
    upsertDanmus(db, 1, [['9', danmu()]]);
    upsertDanmus(db, 2, [['9', danmu()]]);
    expect(countRecords(db, 'danmu', 1)).toBe(1);
    expect(countRecords(db, 'danmu', 2)).toBe(1);
  });

  it('keeps the soft-delete flag across an overwrite', () => {
    upsertNotifications(db, UID, [['5', notification()]]);
    markDeleted(db, 'notification', UID, '5');
    upsertNotifications(db, UID, [['5', notification({ content: 'refetched' })]]);

    expect(getRecord(db, 'notification', UID, '5')).toMatchObject({ content: 'refetched', is_deleted: 1 });
  });

  it('stores ids beyond double precision unchanged', () => {
    upsertDanmus(db, UID, [['90071992547409931', danmu()]]);
    expect(getRecord(db, 'danmu', UID, '90071992547409931')?.id).toBe('90071992547409931');
  });
});

describe('listing', () => {
  beforeEach(() => {
    upsertComments(db, UID, [
      ['a', comment({ createdTime: 300 })],
      ['b', comment({ createdTime: 100 })],
      ['c', comment({ createdTime: 300 })],
      ['d', comment({ createdTime: 200 })],
    ]);
    markDeleted(db, 'comment', UID, 'd');
  });

  it('lists newest first and hides deleted rows', () => {
    expect(listComments(db, UID).map((r) => r.id)).toEqual(['c', 'a', 'b']);
    expect(listRecords(db, 'comment', UID, { includeDeleted: true }).map((r) => r.id)).toEqual(['c', 'a', 'd', 'b']);
  });

  it('pages with limit and offset', () => {
    expect(listComments(db, UID, { limit: 2, offset: 1 }).map((r) => r.id)).toEqual(['a', 'b']);
  });

  it('counts with and without deleted rows', () => {
    expect(countRecords(db, 'comment', UID)).toBe(3);
    expect(countRecords(db, 'comment', UID, { includeDeleted: true })).toBe(4);
  });

  it('reports which ids are not stored yet', () => {
    expect(filterExistingIds(db, 'comment', UID, ['x', 'a', 'd', 'y'])).toEqual(['x', 'y']);
    expect(filterExistingIds(db, 'comment', 7, ['a'])).toEqual(['a']);
  });
});

describe('deletion', () => {
  it('soft and hard deletes report whether a row matched', () => {
    upsertComments(db, UID, [['1', comment()]]);
    expect(markDeleted(db, 'comment', UID, '1')).toBe(true);
    expect(markDeleted(db, 'comment', UID, 'missing')).toBe(false);
    expect(deletePermanently(db, 'comment', UID, '1')).toBe(true);
    expect(getRecord(db, 'comment', UID, '1')).toBeUndefined();
    expect(deletePermanently(db, 'comment', UID, '1')).toBe(false);
  });

  it('binds a record store to one uid', () => {
    upsertDanmus(db, UID, [['1', danmu()]]);
    upsertDanmus(db, 7, [['1', danmu()]]);
    const store = bindRecordStore(db, UID);

    expect(store.markDeleted('danmu', '1')).toBe(true);
    expect(getRecord(db, 'danmu', UID, '1')?.is_deleted).toBe(1);
    expect(getRecord(db, 'danmu', 7, '1')?.is_deleted).toBe(0);

    expect(store.deletePermanently('danmu', '1')).toBe(true);
    expect(countRecords(db, 'danmu', 7)).toBe(1);
  });

  it('clears one user and leaves the others', () => {
    upsertComments(db, UID, [['1', comment()], ['2', comment()]]);
    upsertNotifications(db, UID, [['3', notification()]]);
    upsertComments(db, 7, [['1', comment()]]);
    saveCursor(db, { uid: UID, data_type: 'liked', cursor_id: null, cursor_time: 5, last_sync: 6, extra_data: {} });

    expect(clearUserData(db, UID)).toEqual({ comments: 2, danmus: 0, notifications: 1, cursors: 1 });
    expect(countRecords(db, 'comment', 7)).toBe(1);
  });
});

describe('getStats', () => {
  it('summarizes each kind by state and source', () => {
    upsertComments(db, UID, [
      ['1', comment()],
      ['2', comment({ source: 'aicu' })],
    ]);
    markDeleted(db, 'comment', UID, '1');
    saveCursor(db, { uid: UID, data_type: 'replied', cursor_id: null, cursor_time: null, last_sync: 1234, extra_data: {} });

    expect(getStats(db, UID)).toEqual({
      uid: UID,
      comments: { total: 2, active: 1, deleted: 1, bySource: { aicu: 1, bilibili: 1 } },
      danmus: { total: 0, active: 0, deleted: 0, bySource: {} },
      notifications: { total: 0, active: 0, deleted: 0, bySource: {} },
      lastSync: { replied: 1234 },
    });
  });
});

describe('sync cursors', () => {
  it('round-trips and overwrites per data type', () => {
    expect(getCursor(db, UID, 'liked')).toBeNull();

    saveCursor(db, { uid: UID, data_type: 'liked', cursor_id: 3, cursor_time: 100, last_sync: 200, extra_data: { pages: 2 } });
    saveCursor(db, {
      uid: UID,
      data_type: 'liked',
      cursor_id: null,
      cursor_time: 150,
      last_sync: 300,
      extra_data: { pages: 1, truncated: true },
    });

    expect(getCursor(db, UID, 'liked')).toEqual({
      uid: UID,
      data_type: 'liked',
      cursor_id: null,
      cursor_time: 150,
      last_sync: 300,
      extra_data: { pages: 1, truncated: true },
    });
  });

  it('reads unparseable extra data as empty', () => {
    db.prepare("INSERT INTO sync_cursors (uid, data_type, last_sync, extra_data) VALUES (?, 'ated', 1, 'not json')").run(UID);
    expect(getCursor(db, UID, 'ated')?.extra_data).toEqual({});
  });
});

describe('getWatermark', () => {
  it('takes the newest time per data type', () => {
    upsertNotifications(db, UID, [
      ['l1', notification({ tp: 0, createdTime: 500 })],
      ['l2', notification({ tp: 0, createdTime: 400 })],
      ['r1', notification({ tp: 1, createdTime: 300 })],
      ['s1', notification({ tp: 0, systemNotifyApi: 0, createdTime: 900 })],
      ['s2', notification({ tp: 4, systemNotifyApi: 1, createdTime: 800 })],
    ]);
    upsertComments(db, UID, [
      ['c1', comment({ source: 'aicu', createdTime: 700 })],
      ['c2', comment({ source: 'bilibili', createdTime: 950 })],
    ]);

    expect(getWatermark(db, UID, 'liked')).toBe(500);
    expect(getWatermark(db, UID, 'replied')).toBe(300);
    expect(getWatermark(db, UID, 'ated')).toBe(0);
    expect(getWatermark(db, UID, 'system_notify')).toBe(900);
    expect(getWatermark(db, UID, 'aicu_comments')).toBe(700);
    expect(getWatermark(db, UID, 'aicu_danmus')).toBe(0);
  });

  it('ignores other users', () => {
    upsertNotifications(db, 7, [['1', notification({ createdTime: 999 })]]);
    expect(getWatermark(db, UID, 'liked')).toBe(0);
  });
});
