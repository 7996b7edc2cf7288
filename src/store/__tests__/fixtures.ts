import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import type { Comment, Danmu, Notification } from '../../fetch/types.js';

export function openTestDb(): Database.Database {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
}

export function comment(overrides: Partial<Comment> = {}): Comment {
  return {
    oid: 777,
    type: 1,
    content: 'a comment',
    notifyId: null,
    tp: null,
    source: 'bilibili',
    createdTime: 100,
    videoUri: null,
    likeCount: 0,
    ...overrides,
  };
}

export function danmu(overrides: Partial<Danmu> = {}): Danmu {
  return {
    content: 'a danmu',
    cid: 4242,
    notifyId: null,
    source: 'bilibili',
    createdTime: 100,
    videoUrl: null,
    ...overrides,
  };
}

export function notification(overrides: Partial<Notification> = {}): Notification {
  return {
    content: 'a notification',
    tp: 0,
    systemNotifyApi: null,
    source: 'bilibili',
    createdTime: 100,
    ...overrides,
  };
}
