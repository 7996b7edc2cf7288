import type { PlatformApi } from '../../remote/types.js';
import type { FeedCheckpoint, RepliedData, SourceProgress } from '../types.js';
import { FEED_HEAD, feedSource } from './feed.js';
import { putFirst, runSource, type SourceContext, type SourceRunResult } from './run.js';

export function fetchReplied(
  api: PlatformApi,
  progress: SourceProgress<RepliedData, FeedCheckpoint>,
  ctx: SourceContext,
): Promise<SourceRunResult<RepliedData, FeedCheckpoint>> {
  return runSource(
    {
      source: feedSource(api, 'replied'),
      progress,
      head: FEED_HEAD,
      pacer: ctx.pacing.feed,
      category: 'replied',
      message: 'Fetching reply notifications',
      apply: (entry, data) => {
        const added = putFirst(data.notifications, entry.notifyId, entry.notification);
        if (entry.comment) putFirst(data.comments, entry.comment.id, entry.comment.comment);
        return added;
      },
    },
    ctx,
  );
}
