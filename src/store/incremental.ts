import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';
import type { Config } from '../shared/config.js';
import type { SleepFn } from '../shared/utils.js';
import type { ArchiveApi, PlatformApi } from '../remote/types.js';
import type { FeedEntry, SystemEntry } from '../fetch/decode.js';
import { FixedPacer, walkPages, type PagedSource } from '../fetch/paging.js';
import { ActivityTracker, ARCHIVE_THRESHOLDS, FEED_THRESHOLDS, safeCallback } from '../fetch/tracker.js';
import { FEED_HEAD, feedSource } from '../fetch/sources/feed.js';
import { SYSTEM_HEAD, systemNotifySource } from '../fetch/sources/systemNotify.js';
import {
  ARCHIVE_COMMENTS_PATH,
  ARCHIVE_DANMUS_PATH,
  archiveHead,
  archiveSource,
} from '../fetch/sources/archive.js';
import { decodeArchiveCommentPage, decodeArchiveDanmuPage } from '../fetch/decode.js';
import type {
  ActivityCallback,
  Comment,
  Danmu,
  EntityId,
  FeedCheckpoint,
  MergedResult,
  Notification,
  SystemNotifyCheckpoint,
} from '../fetch/types.js';
import {
  filterExistingIds,
  getWatermark,
  saveCursor,
  upsertComments,
  upsertDanmus,
  upsertNotifications,
} from './footprintDb.js';
import { ARCHIVE_DATA_TYPES, FEED_DATA_TYPES, type RecordKind, type SyncDataType } from './models.js';

export interface IncrementalOptions {
  uid: number;
  includeArchive: boolean;
  settings: Config['incremental'];
  archivePageSize: number;
  onActivity?: ActivityCallback;
  shouldStop?: () => boolean;
  sleep?: SleepFn;
  now?: () => number;
}

export interface AddedCounts {
  notifications: number;
  comments: number;
  danmus: number;
}

export interface IncrementalTypeResult {
  dataType: SyncDataType;
  status: 'ok' | 'failed' | 'stopped';
  watermark: number;
  pages: number;
  added: AddedCounts;
  error?: string;
}

export interface IncrementalResult {
  uid: number;
  types: IncrementalTypeResult[];
  /** Only the records this run inserted. */
  added: MergedResult;
}

interface Collected {
  notifications: Map<EntityId, Notification>;
  comments: Map<EntityId, Comment>;
  danmus: Map<EntityId, Danmu>;
  newest: number;
}

function emptyCollected(): Collected {
  return { notifications: new Map(), comments: new Map(), danmus: new Map(), newest: 0 };
}

function keepFirst<V>(map: Map<EntityId, V>, id: EntityId, value: V): void {
  if (!map.has(id)) map.set(id, value);
}

function freshOnly<V>(db: Database.Database, kind: RecordKind, uid: number, map: Map<EntityId, V>): Map<EntityId, V> {
  const fresh = new Set(filterExistingIds(db, kind, uid, map.keys()));
  return new Map([...map].filter(([id]) => fresh.has(id)));
}

interface CatchUp<P, T> {
  source: PagedSource<P, T>;
  head: P;
  maxPages: number;
  delayMs: number;
  timeOf: (item: T) => number;
  collect: (item: T, into: Collected) => void;
}

/**
 * Catch up every data type from the head of its live feed down to the stored watermark.
 * Each type stands alone: a failing page ends that type's walk, stores nothing for it,
 * and the remaining types still run.
 */
export async function runIncrementalSync(
  db: Database.Database,
  clients: { platform: PlatformApi; archive?: ArchiveApi },
  opts: IncrementalOptions,
): Promise<IncrementalResult> {
  const { uid, settings } = opts;
  const onActivity = safeCallback(opts.onActivity);
  const now = opts.now ?? Date.now;
  const feedDelay = settings.feed_delay_seconds * 1000;
  const archiveDelay = settings.archive_delay_seconds * 1000;

  const added: MergedResult = { notifications: new Map(), comments: new Map(), danmus: new Map() };
  const types: IncrementalTypeResult[] = [];

  const fromFeed = (source: PagedSource<FeedCheckpoint, FeedEntry>): CatchUp<FeedCheckpoint, FeedEntry> => ({
    source,
    head: FEED_HEAD,
    maxPages: settings.feed_max_pages,
    delayMs: feedDelay,
    timeOf: (e) => e.notification.createdTime,
    collect: (e, into) => {
      keepFirst(into.notifications, e.notifyId, e.notification);
      if (e.comment) keepFirst(into.comments, e.comment.id, e.comment.comment);
      if (e.danmu) keepFirst(into.danmus, e.danmu.id, e.danmu.danmu);
    },
  });

  const runType = async <P, T>(dataType: SyncDataType, plan: CatchUp<P, T>): Promise<void> => {
    const watermark = getWatermark(db, uid, dataType);
    const collected = emptyCollected();
    const tracker = new ActivityTracker(
      dataType,
      `Syncing ${dataType}`,
      onActivity,
      ARCHIVE_DATA_TYPES.includes(dataType) ? ARCHIVE_THRESHOLDS : FEED_THRESHOLDS,
      now,
    );

    const outcome = await walkPages(
      plan.source,
      plan.head,
      (item) => {
        const t = plan.timeOf(item);
        if (watermark > 0 && t <= watermark) return false;
        collected.newest = Math.max(collected.newest, t);
        plan.collect(item, collected);
        tracker.update();
      },
      {
        pacer: new FixedPacer(plan.delayMs),
        shouldStop: opts.shouldStop,
        sleep: opts.sleep,
        maxPages: plan.maxPages,
      },
    );
    tracker.finish();

    const none: AddedCounts = { notifications: 0, comments: 0, danmus: 0 };
    if (outcome.status === 'paused') {
      logger.warn({ dataType, reason: outcome.reason, error: outcome.error }, 'Incremental sync for data type ended early');
      types.push({
        dataType,
        status: outcome.reason === 'stopped' ? 'stopped' : 'failed',
        watermark,
        pages: outcome.pages,
        added: none,
        error: outcome.error,
      });
      return;
    }

    const notifications = freshOnly(db, 'notification', uid, collected.notifications);
    const comments = freshOnly(db, 'comment', uid, collected.comments);
    const danmus = freshOnly(db, 'danmu', uid, collected.danmus);
    const syncedTime = Math.floor(now() / 1000);

    db.transaction(() => {
      upsertNotifications(db, uid, notifications, syncedTime);
      upsertComments(db, uid, comments, syncedTime);
      upsertDanmus(db, uid, danmus, syncedTime);
      saveCursor(db, {
        uid,
        data_type: dataType,
        cursor_id: null,
        cursor_time: Math.max(watermark, collected.newest) || null,
        last_sync: syncedTime,
        extra_data: { pages: outcome.pages, truncated: outcome.truncated },
      });
    })();

    for (const [id, v] of notifications) added.notifications.set(id, v);
    for (const [id, v] of comments) added.comments.set(id, v);
    for (const [id, v] of danmus) added.danmus.set(id, v);

    const counts = { notifications: notifications.size, comments: comments.size, danmus: danmus.size };
    logger.info({ dataType, watermark, pages: outcome.pages, ...counts }, 'Incremental sync for data type done');
    types.push({ dataType, status: 'ok', watermark, pages: outcome.pages, added: counts });
  };

  for (const dataType of FEED_DATA_TYPES) {
    if (opts.shouldStop?.()) break;
    onActivity(`Checking ${dataType} for new records`);
    if (dataType === 'system_notify') {
      await runType<SystemNotifyCheckpoint, SystemEntry>(dataType, {
        source: systemNotifySource(clients.platform),
        head: SYSTEM_HEAD,
        maxPages: settings.feed_max_pages,
        delayMs: feedDelay,
        timeOf: (e) => e.notification.createdTime,
        collect: (e, into) => keepFirst(into.notifications, e.id, e.notification),
      });
    } else {
      const kind = dataType === 'liked' ? 'liked' : dataType === 'replied' ? 'replied' : 'ated';
      await runType(dataType, fromFeed(feedSource(clients.platform, kind)));
    }
  }

  if (opts.includeArchive && clients.archive) {
    const archive = clients.archive;
    for (const dataType of ARCHIVE_DATA_TYPES) {
      if (opts.shouldStop?.()) break;
      onActivity(`Checking ${dataType} for new records`);
      if (dataType === 'aicu_comments') {
        await runType(dataType, {
          source: archiveSource<Comment>(archive, 'archive-comments', ARCHIVE_COMMENTS_PATH, opts.archivePageSize, decodeArchiveCommentPage),
          head: archiveHead(uid),
          maxPages: settings.archive_max_pages,
          delayMs: archiveDelay,
          timeOf: (item) => item.value.createdTime,
          collect: (item, into) => keepFirst(into.comments, item.id, item.value),
        });
      } else {
        await runType(dataType, {
          source: archiveSource<Danmu>(archive, 'archive-danmus', ARCHIVE_DANMUS_PATH, opts.archivePageSize, decodeArchiveDanmuPage),
          head: archiveHead(uid),
          maxPages: settings.archive_max_pages,
          delayMs: archiveDelay,
          timeOf: (item) => item.value.createdTime,
          collect: (item, into) => keepFirst(into.danmus, item.id, item.value),
        });
      }
    }
  }

  return { uid, types, added };
}

