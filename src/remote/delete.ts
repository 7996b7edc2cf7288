import { z } from 'zod';
import { DeleteError } from '../shared/errors.js';
import type { Comment, Danmu, EntityId, Notification } from '../fetch/types.js';
import type { PlatformApi } from './types.js';

const ResultSchema = z.object({ code: z.number(), message: z.string().optional() });

function expectDeleted(raw: unknown, what: string, id: EntityId): void {
  const parsed = ResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DeleteError(`Unexpected response deleting ${what} ${id}`, { id });
  }
  if (parsed.data.code !== 0) {
    throw new DeleteError(`Deleting ${what} ${id} failed: ${parsed.data.message ?? 'unknown error'} (code ${parsed.data.code})`, {
      id,
      remoteCode: parsed.data.code,
    });
  }
}

/** Picture-dynamic comments (area type 11) take the CSRF token in the query string. */
export async function removeComment(api: PlatformApi, id: EntityId, comment: Pick<Comment, 'oid' | 'type'>): Promise<void> {
  const form: Record<string, string> = { oid: String(comment.oid), type: String(comment.type), rpid: id };
  let url = `${api.apiBase}/x/v2/reply/del`;
  if (comment.type === 11) {
    url += `?csrf=${encodeURIComponent(api.csrf)}`;
  } else {
    form.csrf = api.csrf;
  }
  expectDeleted(await api.postForm(url, form), 'comment', id);
}

/**
 * The platform no longer honours this endpoint for danmus; a zero code is still taken
 * as success.
 */
export async function removeDanmu(api: PlatformApi, id: EntityId, danmu: Pick<Danmu, 'cid'>): Promise<void> {
  const raw = await api.postForm(`${api.apiBase}/x/msgfeed/del`, {
    dmid: id,
    cid: String(danmu.cid),
    type: '1',
    csrf: api.csrf,
  });
  expectDeleted(raw, 'danmu', id);
}

export async function removeNotification(
  api: PlatformApi,
  id: EntityId,
  notification: Pick<Notification, 'tp' | 'systemNotifyApi'>,
): Promise<void> {
  if (notification.systemNotifyApi === null) {
    const raw = await api.postForm(`${api.apiBase}/x/msgfeed/del`, {
      tp: String(notification.tp),
      id,
      build: '0',
      mobi_app: 'web',
      csrf_token: api.csrf,
      csrf: api.csrf,
    });
    expectDeleted(raw, 'notification', id);
    return;
  }

  const numericId = Number(id);
  const url = `${api.messageBase}/x/sys-msg/del_notify_list?build=8140300&mobi_app=android&csrf=${encodeURIComponent(api.csrf)}`;
  const raw = await api.postJson(url, {
    csrf: api.csrf,
    ids: notification.systemNotifyApi === 0 ? [numericId] : [],
    station_ids: notification.systemNotifyApi === 1 ? [numericId] : [],
    type: notification.tp,
    build: 8140300,
    mobi_app: 'android',
  });
  expectDeleted(raw, 'system notification', id);
}
