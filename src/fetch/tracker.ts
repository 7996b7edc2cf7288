import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { ActivityCallback, ActivityInfo } from './types.js';

export interface TrackerThresholds {
  intervalMs: number;
  everyItems: number;
}

export const FEED_THRESHOLDS: TrackerThresholds = { intervalMs: 2000, everyItems: 100 };
/** Archive pages carry hundreds of items, so report less often. */
export const ARCHIVE_THRESHOLDS: TrackerThresholds = { intervalMs: 3000, everyItems: 200 };

/**
 * Throttled progress reporting for a fetch loop. `update` emits a snapshot only when
 * the time or the count threshold has passed since the last one; `finish` always emits
 * a final snapshot with speed 0.
 */
export class ActivityTracker {
  private readonly startedAt: number;
  private lastEmitAt: number;
  private count = 0;
  private lastReported = 0;

  constructor(
    private readonly category: string,
    private readonly message: string,
    private readonly callback: ActivityCallback,
    private readonly thresholds: TrackerThresholds = FEED_THRESHOLDS,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
    this.lastEmitAt = this.startedAt;
  }

  get currentCount(): number {
    return this.count;
  }

  update(n = 1): void {
    this.count += n;
    const t = this.now();
    if (
      t - this.lastEmitAt >= this.thresholds.intervalMs ||
      this.count - this.lastReported >= this.thresholds.everyItems
    ) {
      const elapsed = (t - this.startedAt) / 1000;
      this.emit({
        message: this.message,
        currentCount: this.count,
        speed: elapsed > 0 ? this.count / elapsed : 0,
        elapsedTime: elapsed,
        category: this.category,
      });
      this.lastEmitAt = t;
      this.lastReported = this.count;
    }
  }

  finish(): void {
    this.emit({
      message: `${this.message} - done`,
      currentCount: this.count,
      speed: 0,
      elapsedTime: (this.now() - this.startedAt) / 1000,
      category: this.category,
    });
  }

  private emit(info: ActivityInfo): void {
    try {
      this.callback(info);
    } catch (err) {
      logger.debug({ category: this.category, error: errorMessage(err) }, 'Activity callback threw');
    }
  }
}

/** Wrap a callback so a throwing consumer never reaches the fetch loop. */
export function safeCallback(callback: ActivityCallback | undefined): ActivityCallback {
  return (update) => {
    if (!callback) return;
    try {
      callback(update);
    } catch (err) {
      logger.debug({ error: errorMessage(err) }, 'Activity callback threw');
    }
  };
}
