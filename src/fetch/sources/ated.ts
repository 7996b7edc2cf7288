import type { PlatformApi } from '../../remote/types.js';
import type { FeedCheckpoint, NotificationMap, SourceProgress } from '../types.js';
import { FEED_HEAD, feedSource } from './feed.js';
import { putFirst, runSource, type SourceContext, type SourceRunResult } from './run.js';

export function fetchAted(
  api: PlatformApi,
  progress: SourceProgress<NotificationMap, FeedCheckpoint>,
  ctx: SourceContext,
): Promise<SourceRunResult<NotificationMap, FeedCheckpoint>> {
  return runSource(
    {
      source: feedSource(api, 'ated'),
      progress,
      head: FEED_HEAD,
      pacer: ctx.pacing.light,
      category: 'ated',
      message: 'Fetching @-mentions',
      apply: (entry, data) => putFirst(data, entry.notifyId, entry.notification),
    },
    ctx,
  );
}
