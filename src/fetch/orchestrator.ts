import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import type { SleepFn } from '../shared/utils.js';
import type { ArchiveApi, PlatformApi } from '../remote/types.js';
import type { Pacing } from './backoff.js';
import type { WalkOutcome } from './paging.js';
import { safeCallback } from './tracker.js';
import { fetchLiked } from './sources/liked.js';
import { fetchReplied } from './sources/replied.js';
import { fetchAted } from './sources/ated.js';
import { fetchSystemNotify } from './sources/systemNotify.js';
import { fetchArchiveComments, fetchArchiveDanmus } from './sources/archive.js';
import type { SourceContext } from './sources/run.js';
import type {
  ActivityCallback,
  FetchProgressState,
  MergedResult,
  SourceKey,
  SourceProgress,
} from './types.js';

export interface FetchClients {
  platform: PlatformApi;
  /** Required when the archive sources are included. */
  archive?: ArchiveApi;
}

export interface FetchRunOptions {
  uid: number;
  includeArchive: boolean;
  archivePageSize: number;
  pacing: Pacing;
  onActivity?: ActivityCallback;
  shouldStop?: () => boolean;
  sleep?: SleepFn;
  now?: () => number;
}

export type FetchRunResult =
  | { status: 'complete'; result: MergedResult }
  | {
      status: 'paused';
      state: FetchProgressState;
      source: SourceKey;
      reason: 'stopped' | 'failed';
      error?: string;
    };

function cloneProgress<D, C>(p: SourceProgress<D, C>, copy: (d: D) => D): SourceProgress<D, C> {
  return { data: copy(p.data), checkpoint: p.checkpoint, completed: p.completed };
}

/** Deep enough to let a run fill its maps without touching the caller's state. */
export function cloneProgressState(s: FetchProgressState): FetchProgressState {
  return {
    liked: cloneProgress(s.liked, (d) => ({
      notifications: new Map(d.notifications),
      comments: new Map(d.comments),
      danmus: new Map(d.danmus),
    })),
    replied: cloneProgress(s.replied, (d) => ({
      notifications: new Map(d.notifications),
      comments: new Map(d.comments),
    })),
    ated: cloneProgress(s.ated, (d) => new Map(d)),
    system: cloneProgress(s.system, (d) => new Map(d)),
    archiveComments: cloneProgress(s.archiveComments, (d) => new Map(d)),
    archiveDanmus: cloneProgress(s.archiveDanmus, (d) => new Map(d)),
    archiveEnabledLastRun: s.archiveEnabledLastRun,
  };
}

function hasData(key: SourceKey, s: FetchProgressState): boolean {
  switch (key) {
    case 'liked':
      return s.liked.data.notifications.size > 0 || s.liked.data.comments.size > 0 || s.liked.data.danmus.size > 0;
    case 'replied':
      return s.replied.data.notifications.size > 0 || s.replied.data.comments.size > 0;
    case 'ated':
      return s.ated.data.size > 0;
    case 'system':
      return s.system.data.size > 0;
    case 'archiveComments':
      return s.archiveComments.data.size > 0;
    case 'archiveDanmus':
      return s.archiveDanmus.data.size > 0;
  }
}

/** A source runs when it left a checkpoint, or has neither finished nor produced anything yet. */
export function shouldRunSource(key: SourceKey, s: FetchProgressState): boolean {
  const p = s[key];
  return p.checkpoint !== null || !(p.completed || hasData(key, s));
}

export function mergeResults(s: FetchProgressState, includeArchive: boolean): MergedResult {
  const notifications = new Map([
    ...s.liked.data.notifications,
    ...s.replied.data.notifications,
    ...s.ated.data,
    ...s.system.data,
  ]);
  const comments = new Map([
    ...s.liked.data.comments,
    ...s.replied.data.comments,
    ...(includeArchive ? s.archiveComments.data : []),
  ]);
  const danmus = new Map([...s.liked.data.danmus, ...(includeArchive ? s.archiveDanmus.data : [])]);
  return { notifications, comments, danmus };
}

function clearArchive(s: FetchProgressState): void {
  s.archiveComments = { data: new Map(), checkpoint: null, completed: false };
  s.archiveDanmus = { data: new Map(), checkpoint: null, completed: false };
}

/**
 * Drive the six sources in their fixed order, resuming any that left a checkpoint.
 * The first source that pauses ends the run with the updated state; the caller feeds
 * that state back in to continue. Once every source has finished the maps are merged.
 */
export async function runFetch(
  clients: FetchClients,
  state: FetchProgressState,
  opts: FetchRunOptions,
): Promise<FetchRunResult> {
  const { includeArchive } = opts;
  const onActivity = safeCallback(opts.onActivity);
  const next = cloneProgressState(state);

  if (!includeArchive && next.archiveEnabledLastRun) {
    logger.info('Archive sources disabled since the last run, discarding their progress');
    clearArchive(next);
  }
  next.archiveEnabledLastRun = includeArchive;

  if (includeArchive && !clients.archive) {
    throw new ConfigError('Archive sources requested but no archive client was provided');
  }

  const ctx: SourceContext = {
    pacing: opts.pacing,
    onActivity,
    shouldStop: opts.shouldStop,
    sleep: opts.sleep,
    now: opts.now,
  };

  const paused = (source: SourceKey, outcome: WalkOutcome<unknown>): FetchRunResult | null => {
    if (outcome.status === 'done') return null;
    return { status: 'paused', state: next, source, reason: outcome.reason, error: outcome.error };
  };

  if (shouldRunSource('liked', next)) {
    const r = await fetchLiked(clients.platform, next.liked, ctx);
    next.liked = r.progress;
    const p = paused('liked', r.outcome);
    if (p) return p;
  }

  if (shouldRunSource('replied', next)) {
    const r = await fetchReplied(clients.platform, next.replied, ctx);
    next.replied = r.progress;
    const p = paused('replied', r.outcome);
    if (p) return p;
  }

  if (shouldRunSource('ated', next)) {
    const r = await fetchAted(clients.platform, next.ated, ctx);
    next.ated = r.progress;
    const p = paused('ated', r.outcome);
    if (p) return p;
  }

  if (shouldRunSource('system', next)) {
    const r = await fetchSystemNotify(clients.platform, next.system, ctx);
    next.system = r.progress;
    const p = paused('system', r.outcome);
    if (p) return p;
  }

  if (includeArchive && clients.archive) {
    if (shouldRunSource('archiveComments', next)) {
      const r = await fetchArchiveComments(clients.archive, opts.uid, opts.archivePageSize, next.archiveComments, ctx);
      next.archiveComments = r.progress;
      const p = paused('archiveComments', r.outcome);
      if (p) return p;
    }
    if (shouldRunSource('archiveDanmus', next)) {
      const r = await fetchArchiveDanmus(clients.archive, opts.uid, opts.archivePageSize, next.archiveDanmus, ctx);
      next.archiveDanmus = r.progress;
      const p = paused('archiveDanmus', r.outcome);
      if (p) return p;
    }
  }

  onActivity('Merging results');
  const result = mergeResults(next, includeArchive);
  logger.info(
    { notifications: result.notifications.size, comments: result.comments.size, danmus: result.danmus.size },
    'Fetch complete',
  );
  return { status: 'complete', result };
}
