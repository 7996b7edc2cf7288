import type { Comment, Danmu, EntityId, Notification } from '../fetch/types.js';
import type { RecordKind } from '../store/models.js';
import type { PlatformApi } from '../remote/types.js';
import { removeComment, removeDanmu, removeNotification } from '../remote/delete.js';

export type DeleteTask =
  | { kind: 'comment'; id: EntityId; entity: Comment }
  | { kind: 'danmu'; id: EntityId; entity: Danmu }
  | { kind: 'notification'; id: EntityId; entity: Notification };

export interface TaskRef {
  kind: RecordKind;
  id: EntityId;
}

export function removeRemote(api: PlatformApi, task: DeleteTask): Promise<void> {
  switch (task.kind) {
    case 'comment':
      return removeComment(api, task.id, task.entity);
    case 'danmu':
      return removeDanmu(api, task.id, task.entity);
    case 'notification':
      return removeNotification(api, task.id, task.entity);
  }
}
