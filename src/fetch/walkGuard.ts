import { JobError } from '../shared/errors.js';

export type WalkKind = 'fetch' | 'sync';

/**
 * One account, one request cadence: a full fetch and an incremental sync never walk
 * the feeds at the same time.
 */
export class WalkGuard {
  private holder: WalkKind | null = null;

  get active(): WalkKind | null {
    return this.holder;
  }

  tryAcquire(kind: WalkKind): boolean {
    if (this.holder !== null) return false;
    this.holder = kind;
    return true;
  }

  release(kind: WalkKind): void {
    if (this.holder === kind) this.holder = null;
  }

  /** Run `fn` holding the guard; throws `JobError` when another walk holds it. */
  async hold<T>(kind: WalkKind, fn: () => Promise<T>): Promise<T> {
    if (!this.tryAcquire(kind)) {
      throw new JobError(`Cannot start a ${kind} while a ${this.holder ?? 'walk'} is running`, { active: this.holder });
    }
    try {
      return await fn();
    } finally {
      this.release(kind);
    }
  }
}
