import { z } from 'zod';
import { DecodeError, RemoteApiError } from '../shared/errors.js';
import type {
  Comment,
  Danmu,
  EntityId,
  Notification,
  NotifyTp,
  SystemNotifyApi,
} from './types.js';

/**
 * Decoding of raw feed payloads into the canonical records. Envelopes that do not
 * decode raise; single items that do not decode come back as `skip`.
 */

export type Decoded<T> = { kind: 'ok'; value: T } | { kind: 'skip'; reason: string };

const ok = <T>(value: T): Decoded<T> => ({ kind: 'ok', value });
const skip = <T>(reason: string): Decoded<T> => ({ kind: 'skip', reason });

const idSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((v) => String(v));

const numLike = z.union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)]);

const EnvelopeSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

/**
 * Check the `{ code, message, data }` envelope every endpoint returns and hand back `data`.
 */
export function unwrapEnvelope(raw: unknown, context: string): unknown {
  const env = EnvelopeSchema.safeParse(raw);
  if (!env.success) {
    throw new DecodeError(`Malformed ${context} response`, { issues: env.error.issues.length });
  }
  if (env.data.code !== 0) {
    throw new RemoteApiError(`${context} returned code ${env.data.code}: ${env.data.message ?? 'unknown error'}`, env.data.code);
  }
  return env.data.data;
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, value: unknown, context: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DecodeError(`Unexpected ${context} page shape`, {
      path: parsed.error.issues[0]?.path.join('.'),
    });
  }
  return parsed.data;
}

// ── Target parsing ─────────────────────────────────────────────────

const VIDEO_NATIVE = /bilibili:\/\/video\/(\d+)/;

export interface CommentTarget {
  oid: number;
  type: number;
}

/**
 * Work out the comment area (object id + area type) from a notification's links.
 * Returns null for link shapes that cannot be deleted against.
 */
export function parseCommentTarget(uri: string, nativeUri: string, businessId: number): CommentTarget | null {
  const tail = (prefix: string): number | null => {
    const idx = uri.indexOf(prefix);
    if (idx === -1) return null;
    const rest = uri.slice(idx + prefix.length).match(/^\d+/);
    return rest ? Number(rest[0]) : null;
  };

  let oid = tail('t.bilibili.com/');
  if (oid !== null) return { oid, type: businessId !== 0 ? businessId : 17 };

  oid = tail('h.bilibili.com/ywh/');
  if (oid !== null) return { oid, type: 11 };

  oid = tail('www.bilibili.com/read/cv');
  if (oid !== null) return { oid, type: 12 };

  oid = tail('www.bilibili.com/opus/');
  if (oid !== null) return { oid, type: businessId !== 0 ? businessId : 17 };

  if (uri.includes('www.bilibili.com/video/') || uri.includes('www.bilibili.com/bangumi/play/')) {
    const m = nativeUri.match(VIDEO_NATIVE);
    if (m?.[1]) return { oid: Number(m[1]), type: 1 };
  }
  return null;
}

export function extractCid(nativeUri: string): number | null {
  const m = nativeUri.match(/cid=(\d+)/);
  return m?.[1] ? Number(m[1]) : null;
}

/** Parse `YYYY-MM-DD HH:mm:ss` (local time) into Unix seconds; 0 when absent or unparseable. */
export function parseTimeAt(value: string | undefined): number {
  if (!value) return 0;
  const m = value.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/);
  if (!m) return 0;
  const [y, mo, d, h, mi, s] = m.slice(1).map(Number);
  const date = new Date(y, mo - 1, d, h, mi, s);
  const t = date.getTime();
  return Number.isNaN(t) ? 0 : Math.floor(t / 1000);
}

// ── Cursor feeds (liked / replied / at) ────────────────────────────

const FeedCursorSchema = z
  .object({
    is_end: z.boolean().default(false),
    id: numLike.nullish(),
    time: numLike.nullish(),
  })
  .nullish();

export interface FeedCursor {
  isEnd: boolean;
  id: number | null;
  time: number | null;
}

function toFeedCursor(c: z.infer<typeof FeedCursorSchema>): FeedCursor | null {
  if (!c) return null;
  return { isEnd: c.is_end, id: c.id ?? null, time: c.time ?? null };
}

export interface FeedPage<T> {
  items: Decoded<T>[];
  cursor: FeedCursor | null;
}

const FeedItemDetail = z.object({
  type: z.string().default(''),
  item_id: idSchema.optional(),
  target_id: idSchema.optional(),
  title: z.string().default(''),
  uri: z.string().default(''),
  native_uri: z.string().default(''),
  business_id: z.number().default(0),
  target_reply_content: z.string().optional(),
});

const LikedItemSchema = z.object({
  id: idSchema,
  like_time: z.number().default(0),
  counts: z.number().default(0),
  item: FeedItemDetail,
});

const RepliedItemSchema = z.object({
  id: idSchema,
  reply_time: z.number().default(0),
  counts: z.number().default(0),
  item: FeedItemDetail,
});

const AtItemSchema = z.object({
  id: idSchema,
  at_time: z.number().default(0),
  item: z.object({ title: z.string().default('') }),
});

const LikedPageSchema = z.object({
  total: z.object({
    items: z.array(z.unknown()).nullish(),
    cursor: FeedCursorSchema,
  }),
});

const FlatPageSchema = z.object({
  items: z.array(z.unknown()).nullish(),
  cursor: FeedCursorSchema,
});

export interface LinkedComment {
  id: EntityId;
  comment: Comment;
}

export interface LinkedDanmu {
  id: EntityId;
  danmu: Danmu;
}

export interface FeedEntry {
  notifyId: EntityId;
  notification: Notification;
  comment: LinkedComment | null;
  danmu: LinkedDanmu | null;
}

function notification(content: string, tp: number, createdTime: number, api: SystemNotifyApi | null = null): Notification {
  return { content, tp, systemNotifyApi: api, source: 'bilibili', createdTime };
}

function linkedComment(
  id: EntityId | undefined,
  detail: z.infer<typeof FeedItemDetail>,
  content: string,
  notifyId: EntityId,
  tp: NotifyTp,
  createdTime: number,
  likeCount: number,
): LinkedComment | null {
  if (!id) return null;
  const target = parseCommentTarget(detail.uri, detail.native_uri, detail.business_id);
  if (!target) return null;
  return {
    id,
    comment: {
      oid: target.oid,
      type: target.type,
      content,
      notifyId,
      tp,
      source: 'bilibili',
      createdTime,
      videoUri: detail.uri || null,
      likeCount,
    },
  };
}

export function decodeLikedItem(raw: unknown): Decoded<FeedEntry> {
  const parsed = LikedItemSchema.safeParse(raw);
  if (!parsed.success) return skip('malformed liked item');
  const { id, like_time, counts, item } = parsed.data;

  let comment: LinkedComment | null = null;
  let danmu: LinkedDanmu | null = null;
  if (item.type === 'reply') {
    comment = linkedComment(item.item_id, item, item.title, id, 0, like_time, counts);
  } else if (item.type === 'danmu' && item.item_id) {
    danmu = {
      id: item.item_id,
      danmu: {
        content: item.title,
        cid: extractCid(item.native_uri) ?? 0,
        notifyId: id,
        source: 'bilibili',
        createdTime: like_time,
        videoUrl: item.uri || null,
      },
    };
  }

  return ok({
    notifyId: id,
    notification: notification(`${item.title || 'Unknown'} (liked)`, 0, like_time),
    comment,
    danmu,
  });
}

export function decodeRepliedItem(raw: unknown): Decoded<FeedEntry> {
  const parsed = RepliedItemSchema.safeParse(raw);
  if (!parsed.success) return skip('malformed replied item');
  const { id, reply_time, counts, item } = parsed.data;

  const comment =
    item.type === 'reply'
      ? linkedComment(item.target_id, item, item.target_reply_content || item.title, id, 1, reply_time, counts)
      : null;

  return ok({
    notifyId: id,
    notification: notification(`${item.title || 'Unknown'} (reply)`, 1, reply_time),
    comment,
    danmu: null,
  });
}

export function decodeAtItem(raw: unknown): Decoded<FeedEntry> {
  const parsed = AtItemSchema.safeParse(raw);
  if (!parsed.success) return skip('malformed at-mention item');
  const { id, at_time, item } = parsed.data;
  return ok({
    notifyId: id,
    notification: notification(`${item.title} (@)`, 2, at_time),
    comment: null,
    danmu: null,
  });
}

export type FeedKind = 'liked' | 'replied' | 'ated';

const FEED_DECODERS: Record<FeedKind, (raw: unknown) => Decoded<FeedEntry>> = {
  liked: decodeLikedItem,
  replied: decodeRepliedItem,
  ated: decodeAtItem,
};

export function decodeFeedPage(kind: FeedKind, data: unknown): FeedPage<FeedEntry> {
  let rawItems: unknown[];
  let cursor: FeedCursor | null;
  if (kind === 'liked') {
    const page = decodeWith(LikedPageSchema, data, 'liked');
    rawItems = page.total.items ?? [];
    cursor = toFeedCursor(page.total.cursor);
  } else {
    const page = decodeWith(FlatPageSchema, data, kind);
    rawItems = page.items ?? [];
    cursor = toFeedCursor(page.cursor);
  }
  const decode = FEED_DECODERS[kind];
  return { items: rawItems.map(decode), cursor };
}

// ── System notifications ───────────────────────────────────────────

const SystemItemSchema = z.object({
  id: idSchema,
  title: z.string().default(''),
  content: z.string().default(''),
  type: z.number().default(0),
  time_at: z.string().optional(),
  cursor: numLike.nullish(),
});

const SystemFirstPageSchema = z.object({
  system_notify_list: z.array(z.unknown()).nullish(),
});

export interface SystemEntry {
  id: EntityId;
  notification: Notification;
}

export interface SystemPage {
  items: Decoded<SystemEntry>[];
  /** Cursor carried by the last entry on the page, null when there is none. */
  nextCursor: number | null;
}

export function decodeSystemItem(raw: unknown, api: SystemNotifyApi): Decoded<SystemEntry> {
  const parsed = SystemItemSchema.safeParse(raw);
  if (!parsed.success) return skip('malformed system notification');
  const { id, title, content, type, time_at } = parsed.data;
  return ok({ id, notification: notification(`${title}\n${content}`, type, parseTimeAt(time_at), api) });
}

/**
 * The first page nests the list under `system_notify_list`; later pages return a bare array.
 */
export function decodeSystemPage(data: unknown, first: boolean, api: SystemNotifyApi): SystemPage {
  const rawItems = first
    ? decodeWith(SystemFirstPageSchema, data ?? {}, 'system notification').system_notify_list ?? []
    : decodeWith(z.array(z.unknown()).nullish(), data, 'system notification') ?? [];

  const last = rawItems[rawItems.length - 1];
  const lastParsed = last === undefined ? null : SystemItemSchema.safeParse(last);
  return {
    items: rawItems.map((r) => decodeSystemItem(r, api)),
    nextCursor: lastParsed?.success ? lastParsed.data.cursor ?? null : null,
  };
}

// ── Archive service ────────────────────────────────────────────────

const ArchiveCursorSchema = z
  .object({
    is_end: z.boolean().default(false),
    all_count: z.number().default(0),
  })
  .default({});

const ArchiveCommentPageSchema = z.object({
  cursor: ArchiveCursorSchema,
  replies: z.array(z.unknown()).nullish(),
});

const ArchiveDanmuPageSchema = z.object({
  cursor: ArchiveCursorSchema,
  videodmlist: z.array(z.unknown()).nullish(),
});

const ArchiveCommentSchema = z.object({
  rpid: idSchema,
  message: z.string().default(''),
  time: z.number().default(0),
  dyn: z.object({ oid: numLike, type: numLike }),
});

const ArchiveDanmuSchema = z.object({
  id: idSchema,
  content: z.string().default(''),
  ctime: z.number().default(0),
  oid: numLike,
});

export interface ArchivePage<T> {
  items: Decoded<{ id: EntityId; value: T }>[];
  isEnd: boolean;
  allCount: number;
}

export function decodeArchiveComment(raw: unknown): Decoded<{ id: EntityId; value: Comment }> {
  const parsed = ArchiveCommentSchema.safeParse(raw);
  if (!parsed.success) return skip('malformed archived comment');
  const { rpid, message, time, dyn } = parsed.data;
  return ok({
    id: rpid,
    value: {
      oid: dyn.oid,
      type: dyn.type,
      content: message,
      notifyId: null,
      tp: null,
      source: 'aicu',
      createdTime: time,
      videoUri: null,
      likeCount: 0,
    },
  });
}

export function decodeArchiveDanmu(raw: unknown): Decoded<{ id: EntityId; value: Danmu }> {
  const parsed = ArchiveDanmuSchema.safeParse(raw);
  if (!parsed.success) return skip('malformed archived danmu');
  const { id, content, ctime, oid } = parsed.data;
  if (!oid) return skip('archived danmu without cid');
  return ok({
    id,
    value: { content, cid: oid, notifyId: null, source: 'aicu', createdTime: ctime, videoUrl: null },
  });
}

export function decodeArchiveCommentPage(data: unknown): ArchivePage<Comment> {
  const page = decodeWith(ArchiveCommentPageSchema, data, 'archived comment');
  const raw = page.replies ?? [];
  return {
    items: raw.map(decodeArchiveComment),
    isEnd: page.cursor.is_end,
    allCount: page.cursor.all_count,
  };
}

export function decodeArchiveDanmuPage(data: unknown): ArchivePage<Danmu> {
  const page = decodeWith(ArchiveDanmuPageSchema, data, 'archived danmu');
  const raw = page.videodmlist ?? [];
  return {
    items: raw.map(decodeArchiveDanmu),
    isEnd: page.cursor.is_end,
    allCount: page.cursor.all_count,
  };
}
