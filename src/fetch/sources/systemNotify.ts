import { logger } from '../../shared/logger.js';
import type { PlatformApi } from '../../remote/types.js';
import { decodeSystemPage, unwrapEnvelope, type SystemEntry } from '../decode.js';
import type { PagedSource, PageResult } from '../paging.js';
import type { NotificationMap, SourceProgress, SystemNotifyApi, SystemNotifyCheckpoint } from '../types.js';
import { putFirst, runSource, type SourceContext, type SourceRunResult } from './run.js';

export const SYSTEM_HEAD: SystemNotifyCheckpoint = { cursor: null, apiVariant: 0 };

export function systemNotifyUrl(api: PlatformApi, position: SystemNotifyCheckpoint): string {
  const csrf = encodeURIComponent(api.csrf);
  const base = `${api.messageBase}/x/sys-msg`;
  if (position.cursor !== null) {
    return `${base}/query_notify_list?csrf=${csrf}&data_type=1&cursor=${position.cursor}&build=0&mobi_app=web`;
  }
  return position.apiVariant === 0
    ? `${base}/query_user_notify?csrf=${csrf}&page_size=20&build=0&mobi_app=web`
    : `${base}/query_unified_notify?csrf=${csrf}&page_size=10&build=0&mobi_app=web`;
}

/**
 * System notifications. Some accounts get nothing from the per-user list but do from
 * the unified one, so an empty first page retries once on the other variant; every
 * entry remembers which variant it came from because deletion differs between them.
 */
export function systemNotifySource(api: PlatformApi): PagedSource<SystemNotifyCheckpoint, SystemEntry> {
  const load = async (position: SystemNotifyCheckpoint) => {
    const raw = await api.getJson(systemNotifyUrl(api, position));
    return decodeSystemPage(unwrapEnvelope(raw, 'system notification'), position.cursor === null, position.apiVariant);
  };

  return {
    name: 'system',
    async fetchPage(position): Promise<PageResult<SystemNotifyCheckpoint, SystemEntry>> {
      let variant: SystemNotifyApi = position.apiVariant;
      let page = await load(position);

      if (page.items.length === 0 && position.cursor === null && variant === 0) {
        logger.info('Per-user system list empty, trying the unified list');
        variant = 1;
        page = await load({ cursor: null, apiVariant: 1 });
      }

      const next =
        page.items.length > 0 && page.nextCursor !== null ? { cursor: page.nextCursor, apiVariant: variant } : null;
      return { items: page.items, next };
    },
  };
}

export function fetchSystemNotify(
  api: PlatformApi,
  progress: SourceProgress<NotificationMap, SystemNotifyCheckpoint>,
  ctx: SourceContext,
): Promise<SourceRunResult<NotificationMap, SystemNotifyCheckpoint>> {
  return runSource(
    {
      source: systemNotifySource(api),
      progress,
      head: SYSTEM_HEAD,
      pacer: ctx.pacing.light,
      category: 'system',
      message: 'Fetching system notifications',
      apply: (entry, data) => putFirst(data, entry.id, entry.notification),
    },
    ctx,
  );
}
