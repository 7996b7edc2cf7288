import { logger } from '../../shared/logger.js';
import type { SleepFn } from '../../shared/utils.js';
import type { Pacing } from '../backoff.js';
import { walkPages, type PagePacer, type PagedSource, type WalkOutcome } from '../paging.js';
import { ActivityTracker, type TrackerThresholds } from '../tracker.js';
import type { ActivityCallback, SourceProgress } from '../types.js';

export interface SourceContext {
  pacing: Pacing;
  onActivity: ActivityCallback;
  shouldStop?: () => boolean;
  sleep?: SleepFn;
  now?: () => number;
}

export interface SourceRunResult<D, C> {
  progress: SourceProgress<D, C>;
  outcome: WalkOutcome<C>;
}

export interface SourceRunSpec<C, T, D> {
  source: PagedSource<C, T>;
  progress: SourceProgress<D, C>;
  head: C;
  pacer: PagePacer;
  category: string;
  message: string;
  thresholds?: TrackerThresholds;
  /** Fold one item into `data`; return whether it was new. */
  apply: (item: T, data: D) => boolean;
}

/**
 * Resume a source from its checkpoint (or the head of its feed) and fold every item
 * into the progress data. The returned progress carries a checkpoint when the walk paused.
 */
export async function runSource<C, T, D>(
  spec: SourceRunSpec<C, T, D>,
  ctx: SourceContext,
): Promise<SourceRunResult<D, C>> {
  const { data, checkpoint } = spec.progress;
  const tracker = new ActivityTracker(spec.category, spec.message, ctx.onActivity, spec.thresholds, ctx.now);

  if (checkpoint !== null) {
    logger.info({ source: spec.source.name, checkpoint }, 'Resuming from checkpoint');
  }

  const outcome = await walkPages(
    spec.source,
    checkpoint ?? spec.head,
    (item) => {
      if (spec.apply(item, data)) tracker.update();
    },
    { pacer: spec.pacer, shouldStop: ctx.shouldStop, sleep: ctx.sleep },
  );
  tracker.finish();

  if (outcome.status === 'done') {
    logger.info({ source: spec.source.name, pages: outcome.pages, total: tracker.currentCount }, 'Source complete');
    return { progress: { data, checkpoint: null, completed: true }, outcome };
  }

  logger.warn(
    { source: spec.source.name, reason: outcome.reason, position: outcome.position, error: outcome.error },
    'Source paused',
  );
  return { progress: { data, checkpoint: outcome.position, completed: false }, outcome };
}

/** Insert unless the key is already present; first occurrence wins. */
export function putFirst<K, V>(map: Map<K, V>, key: K, value: V): boolean {
  if (map.has(key)) return false;
  map.set(key, value);
  return true;
}
