import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { JobError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId, type SleepFn } from '../shared/utils.js';
import type { Pacing } from '../fetch/backoff.js';
import type { WalkGuard } from '../fetch/walkGuard.js';
import { fetchWithResume } from '../fetch/resume.js';
import { createProgressState, formatActivity, type FetchProgressState, type SourceKey } from '../fetch/types.js';
import { DeletionExecutor, type DeleteTally, type LocalAction } from '../delete/executor.js';
import type { DeleteTask, TaskRef } from '../delete/tasks.js';
import type { RemoteSession, SessionOpener } from '../remote/session.js';
import { bindRecordStore } from '../store/footprintDb.js';
import { saveMergedResult, type SaveCounts } from '../store/sync.js';

export interface JobDeps {
  db: Database.Database;
  config: Config;
  openSession: SessionOpener;
  pacing: Pacing;
  walks: WalkGuard;
  sleep?: SleepFn;
}

// ================================================================
// Fetch job (one at a time; a paused job's progress feeds the next one)
// ================================================================

export type FetchJobStatus = 'running' | 'paused' | 'stopped' | 'complete' | 'failed';

export interface FetchJobSnapshot {
  id: string;
  status: FetchJobStatus;
  includeArchive: boolean;
  save: boolean;
  startedAt: number;
  finishedAt: number | null;
  lastActivity: string | null;
  pausedAt: SourceKey | null;
  error: string | null;
  counts: { notifications: number; comments: number; danmus: number } | null;
  saved: SaveCounts | null;
}

interface FetchJob {
  snapshot: FetchJobSnapshot;
  stopRequested: boolean;
  done: Promise<void>;
}

export class FetchJobRunner {
  private current: FetchJob | null = null;
  private progress: FetchProgressState = createProgressState();

  constructor(private readonly deps: JobDeps) {}

  get running(): boolean {
    return this.current?.snapshot.status === 'running';
  }

  /** Settles when the current job has finished; resolves immediately when idle. */
  get done(): Promise<void> {
    return this.current?.done ?? Promise.resolve();
  }

  snapshot(): FetchJobSnapshot | null {
    return this.current ? { ...this.current.snapshot } : null;
  }

  start(opts: { includeArchive: boolean; save: boolean; fresh?: boolean }): FetchJobSnapshot {
    if (this.running) {
      throw new JobError('A fetch is already running');
    }
    if (!this.deps.walks.tryAcquire('fetch')) {
      throw new JobError(`Cannot start a fetch while a ${this.deps.walks.active ?? 'walk'} is running`);
    }
    if (opts.fresh) {
      this.progress = createProgressState();
    }

    const job: FetchJob = {
      snapshot: {
        id: generateId(),
        status: 'running',
        includeArchive: opts.includeArchive,
        save: opts.save,
        startedAt: Date.now(),
        finishedAt: null,
        lastActivity: null,
        pausedAt: null,
        error: null,
        counts: null,
        saved: null,
      },
      stopRequested: false,
      done: Promise.resolve(),
    };
    this.current = job;
    job.done = this.execute(job)
      .catch((err: unknown) => {
        job.snapshot.status = 'failed';
        job.snapshot.error = errorMessage(err);
        job.snapshot.finishedAt = Date.now();
        logger.error({ jobId: job.snapshot.id, error: job.snapshot.error }, 'Fetch job failed');
      })
      .finally(() => this.deps.walks.release('fetch'));
    return { ...job.snapshot };
  }

  stop(): boolean {
    if (!this.current || !this.running) return false;
    this.current.stopRequested = true;
    return true;
  }

  private async execute(job: FetchJob): Promise<void> {
    const { db, config, pacing, sleep } = this.deps;
    const s = job.snapshot;
    const session = await this.deps.openSession({ archive: s.includeArchive });

    try {
      const result = await fetchWithResume(
        { platform: session.platform, archive: session.archive ?? undefined },
        this.progress,
        {
          uid: session.uid,
          includeArchive: s.includeArchive,
          archivePageSize: config.archive.page_size,
          pacing,
          sleep,
          shouldStop: () => job.stopRequested,
          onActivity: (update) => {
            s.lastActivity = typeof update === 'string' ? update : formatActivity(update);
          },
        },
        {
          resumeDelayMs: config.fetch.resume_delay_seconds * 1000,
          maxResumeAttempts: config.fetch.max_resume_attempts,
        },
      );

      if (result.status === 'paused') {
        this.progress = result.state;
        s.status = result.reason === 'stopped' ? 'stopped' : 'paused';
        s.pausedAt = result.source;
        s.error = result.error ?? null;
      } else {
        const { notifications, comments, danmus } = result.result;
        s.counts = { notifications: notifications.size, comments: comments.size, danmus: danmus.size };
        if (s.save) {
          s.saved = saveMergedResult(db, session.uid, result.result);
        }
        this.progress = createProgressState();
        s.status = 'complete';
      }
      s.finishedAt = Date.now();
    } finally {
      session.close();
    }
  }
}

// ================================================================
// Delete jobs (independent streams, each sequential)
// ================================================================

export interface DeleteJobSnapshot {
  id: string;
  status: 'running' | 'finished' | 'failed';
  total: number;
  processed: number;
  succeeded: number;
  failed: Array<TaskRef & { error: string }>;
  storeErrors: number;
  stopped: boolean;
  error: string | null;
}

interface DeleteJob {
  snapshot: DeleteJobSnapshot;
  executor: DeletionExecutor;
  done: Promise<void>;
}

/** Finished delete jobs kept for status polling; older ones are dropped first. */
export const FINISHED_DELETE_JOBS_KEPT = 50;

export class DeleteJobRegistry {
  private readonly jobs = new Map<string, DeleteJob>();

  constructor(
    private readonly deps: JobDeps,
    private readonly keepFinished = FINISHED_DELETE_JOBS_KEPT,
  ) {}

  /** Run `tasks` on an already-open session; the job closes it when done. */
  start(
    session: RemoteSession,
    tasks: DeleteTask[],
    opts: { localAction: LocalAction; delaySeconds: number },
  ): DeleteJobSnapshot {
    const snapshot: DeleteJobSnapshot = {
      id: generateId(),
      status: 'running',
      total: tasks.length,
      processed: 0,
      succeeded: 0,
      failed: [],
      storeErrors: 0,
      stopped: false,
      error: null,
    };

    const executor = new DeletionExecutor(session.platform, {
      delayMs: opts.delaySeconds * 1000,
      errorBackoffMs: this.deps.config.delete.error_backoff_seconds * 1000,
      localAction: opts.localAction,
      store: bindRecordStore(this.deps.db, session.uid),
      sleep: this.deps.sleep,
      onEvent: (event) => {
        if (event.type === 'deleted') {
          snapshot.processed++;
          snapshot.succeeded++;
        } else if (event.type === 'failed') {
          snapshot.processed++;
          snapshot.failed.push({ ...event.task, error: event.error });
        } else if (event.type === 'store-error') {
          snapshot.storeErrors++;
        }
      },
    });

    const job: DeleteJob = { snapshot, executor, done: Promise.resolve() };
    job.done = executor
      .run(tasks)
      .then((tally: DeleteTally) => {
        snapshot.stopped = tally.stopped;
        snapshot.status = 'finished';
      })
      .catch((err: unknown) => {
        snapshot.status = 'failed';
        snapshot.error = errorMessage(err);
        logger.error({ jobId: snapshot.id, error: snapshot.error }, 'Delete job failed');
      })
      .finally(() => session.close());

    this.prune();
    this.jobs.set(snapshot.id, job);
    return { ...snapshot, failed: [...snapshot.failed] };
  }

  get size(): number {
    return this.jobs.size;
  }

  private prune(): void {
    const finished = [...this.jobs.values()].filter((j) => j.snapshot.status !== 'running');
    const excess = finished.length - this.keepFinished;
    for (const job of finished.slice(0, Math.max(0, excess))) {
      this.jobs.delete(job.snapshot.id);
    }
  }

  get(id: string): DeleteJobSnapshot | null {
    const job = this.jobs.get(id);
    return job ? { ...job.snapshot, failed: [...job.snapshot.failed] } : null;
  }

  stop(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job || job.snapshot.status !== 'running') return false;
    job.executor.stop();
    return true;
  }

  done(id: string): Promise<void> {
    return this.jobs.get(id)?.done ?? Promise.resolve();
  }
}
