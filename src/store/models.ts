import type { RecordSource } from '../fetch/types.js';

export type RecordKind = 'comment' | 'danmu' | 'notification';

export const RECORD_KINDS: readonly RecordKind[] = ['comment', 'danmu', 'notification'];

export interface CommentRecord {
  id: string;
  uid: number;
  oid: number;
  type: number;
  content: string;
  notify_id: string | null;
  tp: number | null;
  source: RecordSource;
  created_time: number;
  synced_time: number;
  is_deleted: number;
  video_uri: string | null;
  like_count: number;
}

export interface DanmuRecord {
  id: string;
  uid: number;
  content: string;
  cid: number;
  notify_id: string | null;
  source: RecordSource;
  created_time: number;
  synced_time: number;
  is_deleted: number;
  video_url: string | null;
}

export interface NotificationRecord {
  id: string;
  uid: number;
  content: string;
  tp: number;
  system_notify_api: number | null;
  source: RecordSource;
  created_time: number;
  synced_time: number;
  is_deleted: number;
}

export interface RecordByKind {
  comment: CommentRecord;
  danmu: DanmuRecord;
  notification: NotificationRecord;
}

export type SyncDataType = 'liked' | 'replied' | 'ated' | 'system_notify' | 'aicu_comments' | 'aicu_danmus';

export const FEED_DATA_TYPES: readonly SyncDataType[] = ['liked', 'replied', 'ated', 'system_notify'];
export const ARCHIVE_DATA_TYPES: readonly SyncDataType[] = ['aicu_comments', 'aicu_danmus'];

export interface SyncCursor {
  uid: number;
  data_type: SyncDataType;
  cursor_id: number | null;
  cursor_time: number | null;
  last_sync: number;
  extra_data: Record<string, unknown>;
}

export interface KindStats {
  total: number;
  active: number;
  deleted: number;
  bySource: Record<string, number>;
}

export interface FootprintStats {
  uid: number;
  comments: KindStats;
  danmus: KindStats;
  notifications: KindStats;
  lastSync: Partial<Record<SyncDataType, number>>;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
  includeDeleted?: boolean;
}

/** Local follow-up after a confirmed remote deletion, bound to one uid. */
export interface LocalRecordStore {
  markDeleted(kind: RecordKind, id: string): boolean;
  deletePermanently(kind: RecordKind, id: string): boolean;
}
