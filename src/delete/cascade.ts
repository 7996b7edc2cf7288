import type { CommentMap, DanmuMap, EntityId, Notification } from '../fetch/types.js';
import type { DeleteTask } from './tasks.js';

/**
 * Expand selected notifications into one ordered task list: each notification, then
 * every comment and danmu whose `notifyId` points at it.
 */
export function buildCascadeTasks(
  selected: Iterable<[EntityId, Notification]>,
  comments: CommentMap,
  danmus: DanmuMap,
): DeleteTask[] {
  const tasks: DeleteTask[] = [];
  for (const [notifyId, notification] of selected) {
    tasks.push({ kind: 'notification', id: notifyId, entity: notification });
    for (const [id, comment] of comments) {
      if (comment.notifyId === notifyId) tasks.push({ kind: 'comment', id, entity: comment });
    }
    for (const [id, danmu] of danmus) {
      if (danmu.notifyId === notifyId) tasks.push({ kind: 'danmu', id, entity: danmu });
    }
  }
  return tasks;
}
