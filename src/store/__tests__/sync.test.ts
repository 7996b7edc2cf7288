import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { loadMergedResult, saveMergedResult } from '../sync.js';
import { getRecord, markDeleted } from '../footprintDb.js';
import type { MergedResult } from '../../fetch/types.js';
import { comment, danmu, notification, openTestDb } from './fixtures.js';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

function result(): MergedResult {
  return {
    notifications: new Map([
      ['n1', notification({ tp: 1, createdTime: 50 })],
      ['n2', notification({ tp: 4, systemNotifyApi: 1, createdTime: 60 })],
    ]),
    comments: new Map([['c1', comment({ notifyId: 'n1', tp: 1, videoUri: 'https://www.bilibili.com/video/BV1' })]]),
    danmus: new Map([['90071992547409931', danmu({ notifyId: null, source: 'aicu' })]]),
  };
}

describe('saveMergedResult', () => {
  it('writes every map and reports the counts', () => {
    const counts = saveMergedResult(db, 42, result(), 1000);
    expect(counts).toEqual({ notifications: 2, comments: 1, danmus: 1 });
    expect(getRecord(db, 'comment', 42, 'c1')).toMatchObject({
      notify_id: 'n1',
      tp: 1,
      synced_time: 1000,
      video_uri: 'https://www.bilibili.com/video/BV1',
    });
    expect(getRecord(db, 'notification', 42, 'n2')).toMatchObject({ tp: 4, system_notify_api: 1 });
  });
});

describe('loadMergedResult', () => {
  it('reads back what was saved', () => {
    saveMergedResult(db, 42, result(), 1000);
    expect(loadMergedResult(db, 42)).toEqual(result());
  });

  it('leaves out soft-deleted records', () => {
    saveMergedResult(db, 42, result(), 1000);
    markDeleted(db, 'notification', 42, 'n1');
    const loaded = loadMergedResult(db, 42);
    expect([...loaded.notifications.keys()]).toEqual(['n2']);
    expect(loaded.comments.size).toBe(1);
  });

  it('returns empty maps for an unknown uid', () => {
    const loaded = loadMergedResult(db, 7);
    expect(loaded.notifications.size + loaded.comments.size + loaded.danmus.size).toBe(0);
  });
});
