import type { PlatformApi } from '../../remote/types.js';
import { decodeFeedPage, unwrapEnvelope, type FeedEntry, type FeedKind } from '../decode.js';
import type { PagedSource, PageResult } from '../paging.js';
import type { FeedCheckpoint } from '../types.js';

const FEED_PATHS: Record<FeedKind, { path: string; timeParam: string }> = {
  liked: { path: '/x/msgfeed/like?platform=web&build=0&mobi_app=web', timeParam: 'like_time' },
  replied: { path: '/x/msgfeed/reply?platform=web&build=0&mobi_app=web', timeParam: 'reply_time' },
  ated: { path: '/x/msgfeed/at?build=0&mobi_app=web', timeParam: 'at_time' },
};

export const FEED_HEAD: FeedCheckpoint = { cursorId: null, cursorTime: null };

export function feedPageUrl(api: PlatformApi, kind: FeedKind, position: FeedCheckpoint): string {
  const { path, timeParam } = FEED_PATHS[kind];
  const base = `${api.apiBase}${path}`;
  if (position.cursorId === null || position.cursorTime === null) return base;
  return `${base}&id=${position.cursorId}&${timeParam}=${position.cursorTime}`;
}

/**
 * One of the cursor-paged message feeds. The page after this one is addressed by the
 * `(id, time)` pair in the response cursor; a missing pair, `is_end`, or an empty page
 * ends the feed.
 */
export function feedSource(api: PlatformApi, kind: FeedKind): PagedSource<FeedCheckpoint, FeedEntry> {
  return {
    name: kind,
    async fetchPage(position): Promise<PageResult<FeedCheckpoint, FeedEntry>> {
      const raw = await api.getJson(feedPageUrl(api, kind, position));
      const page = decodeFeedPage(kind, unwrapEnvelope(raw, `${kind} feed`));
      const c = page.cursor;
      const next =
        c && !c.isEnd && page.items.length > 0 && c.id !== null && c.time !== null
          ? { cursorId: c.id, cursorTime: c.time }
          : null;
      return { items: page.items, next };
    },
  };
}
