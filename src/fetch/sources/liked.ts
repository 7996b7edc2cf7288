import type { PlatformApi } from '../../remote/types.js';
import type { FeedCheckpoint, LikedData, SourceProgress } from '../types.js';
import { FEED_HEAD, feedSource } from './feed.js';
import { putFirst, runSource, type SourceContext, type SourceRunResult } from './run.js';

/** Likes received: notifications, plus the liked comments and danmus they point at. */
export function fetchLiked(
  api: PlatformApi,
  progress: SourceProgress<LikedData, FeedCheckpoint>,
  ctx: SourceContext,
): Promise<SourceRunResult<LikedData, FeedCheckpoint>> {
  return runSource(
    {
      source: feedSource(api, 'liked'),
      progress,
      head: FEED_HEAD,
      pacer: ctx.pacing.feed,
      category: 'liked',
      message: 'Fetching liked notifications',
      apply: (entry, data) => {
        const added = putFirst(data.notifications, entry.notifyId, entry.notification);
        if (entry.comment) putFirst(data.comments, entry.comment.id, entry.comment.comment);
        if (entry.danmu) putFirst(data.danmus, entry.danmu.id, entry.danmu.danmu);
        return added;
      },
    },
    ctx,
  );
}
