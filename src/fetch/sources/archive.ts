import { logger } from '../../shared/logger.js';
import type { ArchiveApi } from '../../remote/types.js';
import {
  decodeArchiveCommentPage,
  decodeArchiveDanmuPage,
  unwrapEnvelope,
  type ArchivePage,
} from '../decode.js';
import type { PagedSource, PageResult } from '../paging.js';
import { ARCHIVE_THRESHOLDS } from '../tracker.js';
import type { ArchiveCheckpoint, Comment, CommentMap, Danmu, DanmuMap, EntityId, SourceProgress } from '../types.js';
import { putFirst, runSource, type SourceContext, type SourceRunResult } from './run.js';

export const ARCHIVE_COMMENTS_PATH = '/api/v3/search/getreply';
export const ARCHIVE_DANMUS_PATH = '/api/v3/search/getvideodm';

export function archiveHead(uid: number): ArchiveCheckpoint {
  return { uid, page: 1, allCount: 0 };
}

type ArchiveItem<T> = { id: EntityId; value: T };

/**
 * Page-numbered search over the third-party archive. A zero `all_count` means the
 * archive holds nothing for this uid.
 */
export function archiveSource<T>(
  api: ArchiveApi,
  name: string,
  path: string,
  pageSize: number,
  decode: (data: unknown) => ArchivePage<T>,
): PagedSource<ArchiveCheckpoint, ArchiveItem<T>> {
  return {
    name,
    async fetchPage(position): Promise<PageResult<ArchiveCheckpoint, ArchiveItem<T>>> {
      const raw = await api.getJson(path, {
        uid: position.uid,
        pn: position.page,
        ps: pageSize,
        mode: 0,
        keyword: '',
      });
      const page = decode(unwrapEnvelope(raw, name));

      if (page.allCount === 0 && position.allCount === 0) {
        logger.info({ source: name, uid: position.uid }, 'Archive has no records for this uid');
        return { items: [], next: null };
      }
      const allCount = position.allCount || page.allCount;
      const next =
        page.isEnd || page.items.length === 0 ? null : { uid: position.uid, page: position.page + 1, allCount };
      return { items: page.items, next };
    },
  };
}

export function fetchArchiveComments(
  api: ArchiveApi,
  uid: number,
  pageSize: number,
  progress: SourceProgress<CommentMap, ArchiveCheckpoint>,
  ctx: SourceContext,
): Promise<SourceRunResult<CommentMap, ArchiveCheckpoint>> {
  return runSource(
    {
      source: archiveSource<Comment>(api, 'archive-comments', ARCHIVE_COMMENTS_PATH, pageSize, decodeArchiveCommentPage),
      progress,
      head: archiveHead(uid),
      pacer: ctx.pacing.archive,
      category: 'aicu_comments',
      message: 'Fetching archived comments',
      thresholds: ARCHIVE_THRESHOLDS,
      apply: (item, data) => putFirst(data, item.id, item.value),
    },
    ctx,
  );
}

export function fetchArchiveDanmus(
  api: ArchiveApi,
  uid: number,
  pageSize: number,
  progress: SourceProgress<DanmuMap, ArchiveCheckpoint>,
  ctx: SourceContext,
): Promise<SourceRunResult<DanmuMap, ArchiveCheckpoint>> {
  return runSource(
    {
      source: archiveSource<Danmu>(api, 'archive-danmus', ARCHIVE_DANMUS_PATH, pageSize, decodeArchiveDanmuPage),
      progress,
      head: archiveHead(uid),
      pacer: ctx.pacing.archive,
      category: 'aicu_danmus',
      message: 'Fetching archived danmus',
      thresholds: ARCHIVE_THRESHOLDS,
      apply: (item, data) => putFirst(data, item.id, item.value),
    },
    ctx,
  );
}
