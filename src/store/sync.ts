import type Database from 'better-sqlite3';
import type { Comment, Danmu, EntityId, MergedResult, Notification, NotifyTp, SystemNotifyApi } from '../fetch/types.js';
import { nowUnix } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { listComments, listDanmus, listNotifications, upsertComments, upsertDanmus, upsertNotifications } from './footprintDb.js';
import type { CommentRecord, DanmuRecord, NotificationRecord } from './models.js';

export interface SaveCounts {
  notifications: number;
  comments: number;
  danmus: number;
}

/** Persist a merged fetch result for `uid` in one transaction. */
export function saveMergedResult(db: Database.Database, uid: number, result: MergedResult, syncedTime = nowUnix()): SaveCounts {
  const counts = db.transaction(() => ({
    notifications: upsertNotifications(db, uid, result.notifications, syncedTime),
    comments: upsertComments(db, uid, result.comments, syncedTime),
    danmus: upsertDanmus(db, uid, result.danmus, syncedTime),
  }))();
  logger.info({ uid, ...counts }, 'Saved fetch result');
  return counts;
}

function toNotifyTp(tp: number | null): NotifyTp | null {
  return tp === 0 || tp === 1 || tp === 2 || tp === 4 ? tp : null;
}

function toSystemApi(api: number | null): SystemNotifyApi | null {
  return api === 0 || api === 1 ? api : null;
}

export function commentFromRecord(r: CommentRecord): [EntityId, Comment] {
  return [
    r.id,
    {
      oid: r.oid,
      type: r.type,
      content: r.content,
      notifyId: r.notify_id,
      tp: toNotifyTp(r.tp),
      source: r.source,
      createdTime: r.created_time,
      videoUri: r.video_uri,
      likeCount: r.like_count,
    },
  ];
}

export function danmuFromRecord(r: DanmuRecord): [EntityId, Danmu] {
  return [
    r.id,
    {
      content: r.content,
      cid: r.cid,
      notifyId: r.notify_id,
      source: r.source,
      createdTime: r.created_time,
      videoUrl: r.video_url,
    },
  ];
}

export function notificationFromRecord(r: NotificationRecord): [EntityId, Notification] {
  return [
    r.id,
    {
      content: r.content,
      tp: r.tp,
      systemNotifyApi: toSystemApi(r.system_notify_api),
      source: r.source,
      createdTime: r.created_time,
    },
  ];
}

const PAGE = 1000;

function readAll<T>(list: (offset: number) => T[]): T[] {
  const out: T[] = [];
  for (let offset = 0; ; offset += PAGE) {
    const page = list(offset);
    out.push(...page);
    if (page.length < PAGE) return out;
  }
}

/** Load the live (not soft-deleted) records for `uid` back into fetch-shaped maps. */
export function loadMergedResult(db: Database.Database, uid: number): MergedResult {
  return {
    notifications: new Map(readAll((offset) => listNotifications(db, uid, { limit: PAGE, offset })).map(notificationFromRecord)),
    comments: new Map(readAll((offset) => listComments(db, uid, { limit: PAGE, offset })).map(commentFromRecord)),
    danmus: new Map(readAll((offset) => listDanmus(db, uid, { limit: PAGE, offset })).map(danmuFromRecord)),
  };
}
