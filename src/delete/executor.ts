import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { sleep as defaultSleep, type SleepFn } from '../shared/utils.js';
import type { PlatformApi } from '../remote/types.js';
import type { LocalRecordStore } from '../store/models.js';
import { removeRemote, type DeleteTask, type TaskRef } from './tasks.js';

export type LocalAction = 'none' | 'soft' | 'hard';

export type DeleteEvent =
  | { type: 'started'; total: number }
  | { type: 'deleted'; index: number; task: TaskRef }
  | { type: 'failed'; index: number; task: TaskRef; error: string }
  | { type: 'store-error'; index: number; task: TaskRef; error: string }
  | { type: 'finished'; tally: DeleteTally };

export interface DeleteTally {
  total: number;
  succeeded: TaskRef[];
  failed: Array<TaskRef & { error: string }>;
  stopped: boolean;
}

export interface ExecutorOptions {
  delayMs: number;
  /** Minimum wait after a failed item. */
  errorBackoffMs: number;
  localAction: LocalAction;
  /** Required unless `localAction` is `none`. */
  store?: LocalRecordStore;
  onEvent?: (event: DeleteEvent) => void;
  sleep?: SleepFn;
  /** Overrides the remote call; defaults to the platform delete endpoints. */
  remove?: (task: DeleteTask) => Promise<void>;
}

/**
 * Deletes items one at a time against the remote service. A failed item is reported
 * and the batch moves on; `stop()` takes effect before the next item starts.
 */
export class DeletionExecutor {
  private stopRequested = false;
  private readonly sleep: SleepFn;
  private readonly remove: (task: DeleteTask) => Promise<void>;

  constructor(
    api: PlatformApi,
    private readonly opts: ExecutorOptions,
  ) {
    this.sleep = opts.sleep ?? defaultSleep;
    this.remove = opts.remove ?? ((task) => removeRemote(api, task));
  }

  stop(): void {
    this.stopRequested = true;
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  async run(tasks: readonly DeleteTask[]): Promise<DeleteTally> {
    const tally: DeleteTally = { total: tasks.length, succeeded: [], failed: [], stopped: false };
    this.emit({ type: 'started', total: tasks.length });

    let lastFailed = false;
    for (let index = 0; index < tasks.length; index++) {
      if (index > 0 && !this.stopRequested) {
        await this.sleep(lastFailed ? Math.max(this.opts.delayMs, this.opts.errorBackoffMs) : this.opts.delayMs);
      }
      if (this.stopRequested) {
        tally.stopped = true;
        logger.info({ done: index, total: tasks.length }, 'Deletion stopped on request');
        break;
      }

      const task = tasks[index];
      const ref: TaskRef = { kind: task.kind, id: task.id };

      try {
        await this.remove(task);
      } catch (err) {
        const error = errorMessage(err);
        logger.warn({ ...ref, error }, 'Remote deletion failed');
        tally.failed.push({ ...ref, error });
        this.emit({ type: 'failed', index, task: ref, error });
        lastFailed = true;
        continue;
      }

      lastFailed = false;
      tally.succeeded.push(ref);
      this.emit({ type: 'deleted', index, task: ref });
      this.applyLocal(index, ref);
    }

    logger.info(
      { total: tally.total, succeeded: tally.succeeded.length, failed: tally.failed.length, stopped: tally.stopped },
      'Deletion batch finished',
    );
    this.emit({ type: 'finished', tally });
    return tally;
  }

  private applyLocal(index: number, ref: TaskRef): void {
    const { localAction, store } = this.opts;
    if (localAction === 'none' || !store) return;
    try {
      if (localAction === 'soft') store.markDeleted(ref.kind, ref.id);
      else store.deletePermanently(ref.kind, ref.id);
    } catch (err) {
      const error = errorMessage(err);
      logger.error({ ...ref, error }, 'Local store update failed after remote deletion');
      this.emit({ type: 'store-error', index, task: ref, error });
    }
  }

  private emit(event: DeleteEvent): void {
    if (!this.opts.onEvent) return;
    try {
      this.opts.onEvent(event);
    } catch (err) {
      logger.debug({ event: event.type, error: errorMessage(err) }, 'Delete event handler threw');
    }
  }
}
