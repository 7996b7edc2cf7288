/**
 * In-memory shapes produced by the fetchers and consumed by the merge, the store
 * and the deletion executor.
 */

/** Remote ids travel as strings: danmu ids do not fit in a double. */
export type EntityId = string;

export type RecordSource = 'bilibili' | 'aicu';

/** Notification kind on the platform: 0 liked, 1 replied, 2 at-mention, 4 system. */
export type NotifyTp = 0 | 1 | 2 | 4;

/** Which of the two system-notification list APIs an entry came from. */
export type SystemNotifyApi = 0 | 1;

export interface Comment {
  /** Id of the object the comment hangs off (video aid, dynamic id, article id...). */
  oid: number;
  /** Comment-area type of that object. */
  type: number;
  content: string;
  notifyId: EntityId | null;
  tp: NotifyTp | null;
  source: RecordSource;
  createdTime: number;
  videoUri: string | null;
  likeCount: number;
}

export interface Danmu {
  content: string;
  cid: number;
  notifyId: EntityId | null;
  source: RecordSource;
  createdTime: number;
  videoUrl: string | null;
}

export interface Notification {
  content: string;
  tp: number;
  systemNotifyApi: SystemNotifyApi | null;
  source: RecordSource;
  createdTime: number;
}

export type CommentMap = Map<EntityId, Comment>;
export type DanmuMap = Map<EntityId, Danmu>;
export type NotificationMap = Map<EntityId, Notification>;

// ── Recovery checkpoints ───────────────────────────────────────────

/** Position in a cursor feed. Both null means the head of the feed. */
export interface FeedCheckpoint {
  cursorId: number | null;
  cursorTime: number | null;
}

export interface SystemNotifyCheckpoint {
  cursor: number | null;
  apiVariant: SystemNotifyApi;
}

export interface ArchiveCheckpoint {
  uid: number;
  page: number;
  allCount: number;
}

// ── Per-source accumulated data ────────────────────────────────────

export interface LikedData {
  notifications: NotificationMap;
  comments: CommentMap;
  danmus: DanmuMap;
}

export interface RepliedData {
  notifications: NotificationMap;
  comments: CommentMap;
}

export interface SourceProgress<D, C> {
  data: D;
  checkpoint: C | null;
  /** Set once the source walked to its end, so an empty source is not walked again. */
  completed: boolean;
}

export type SourceKey = 'liked' | 'replied' | 'ated' | 'system' | 'archiveComments' | 'archiveDanmus';

export const SOURCE_ORDER: readonly SourceKey[] = [
  'liked',
  'replied',
  'ated',
  'system',
  'archiveComments',
  'archiveDanmus',
];

export interface FetchProgressState {
  liked: SourceProgress<LikedData, FeedCheckpoint>;
  replied: SourceProgress<RepliedData, FeedCheckpoint>;
  ated: SourceProgress<NotificationMap, FeedCheckpoint>;
  system: SourceProgress<NotificationMap, SystemNotifyCheckpoint>;
  archiveComments: SourceProgress<CommentMap, ArchiveCheckpoint>;
  archiveDanmus: SourceProgress<DanmuMap, ArchiveCheckpoint>;
  archiveEnabledLastRun: boolean;
}

export function createProgressState(): FetchProgressState {
  return {
    liked: {
      data: { notifications: new Map(), comments: new Map(), danmus: new Map() },
      checkpoint: null,
      completed: false,
    },
    replied: {
      data: { notifications: new Map(), comments: new Map() },
      checkpoint: null,
      completed: false,
    },
    ated: { data: new Map(), checkpoint: null, completed: false },
    system: { data: new Map(), checkpoint: null, completed: false },
    archiveComments: { data: new Map(), checkpoint: null, completed: false },
    archiveDanmus: { data: new Map(), checkpoint: null, completed: false },
    archiveEnabledLastRun: false,
  };
}

export interface MergedResult {
  notifications: NotificationMap;
  comments: CommentMap;
  danmus: DanmuMap;
}

// ── Progress reporting ─────────────────────────────────────────────

export interface ActivityInfo {
  message: string;
  currentCount: number;
  /** Items per second; 0 marks the final snapshot of a stage. */
  speed: number;
  elapsedTime: number;
  category: string;
}

export type ActivityCallback = (update: string | ActivityInfo) => void;

export function formatActivity(info: ActivityInfo): string {
  if (info.speed > 0) {
    return `${info.message} - fetched ${info.currentCount} items [${info.speed.toFixed(1)}/s] (${Math.round(info.elapsedTime)}s)`;
  }
  return `${info.message} - fetched ${info.currentCount} items`;
}
