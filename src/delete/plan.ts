import type Database from 'better-sqlite3';
import type { EntityId, Notification } from '../fetch/types.js';
import { getRecord } from '../store/footprintDb.js';
import { commentFromRecord, danmuFromRecord, loadMergedResult, notificationFromRecord } from '../store/sync.js';
import type { RecordKind } from '../store/models.js';
import { buildCascadeTasks } from './cascade.js';
import type { DeleteTask } from './tasks.js';

export interface DeletionPlan {
  tasks: DeleteTask[];
  /** Requested ids with no stored record. */
  missing: EntityId[];
}

/**
 * Turn stored records into delete tasks. With `cascade`, selected notifications pull in
 * the comments and danmus that reference them.
 */
export function planDeletion(
  db: Database.Database,
  uid: number,
  req: { kind: RecordKind; ids: readonly EntityId[]; cascade?: boolean },
): DeletionPlan {
  const missing: EntityId[] = [];
  const tasks: DeleteTask[] = [];

  if (req.kind === 'notification') {
    const selected: Array<[EntityId, Notification]> = [];
    for (const id of req.ids) {
      const row = getRecord(db, 'notification', uid, id);
      if (row) selected.push(notificationFromRecord(row));
      else missing.push(id);
    }
    if (req.cascade) {
      const loaded = loadMergedResult(db, uid);
      return { tasks: buildCascadeTasks(selected, loaded.comments, loaded.danmus), missing };
    }
    for (const [id, entity] of selected) tasks.push({ kind: 'notification', id, entity });
    return { tasks, missing };
  }

  for (const id of req.ids) {
    if (req.kind === 'comment') {
      const row = getRecord(db, 'comment', uid, id);
      if (row) tasks.push({ kind: 'comment', id, entity: commentFromRecord(row)[1] });
      else missing.push(id);
    } else {
      const row = getRecord(db, 'danmu', uid, id);
      if (row) tasks.push({ kind: 'danmu', id, entity: danmuFromRecord(row)[1] });
      else missing.push(id);
    }
  }
  return { tasks, missing };
}
