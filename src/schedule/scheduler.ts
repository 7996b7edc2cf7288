/**
 * Scheduler: node-cron job for periodic incremental sync.
 * Started by `footprint server` when `schedule.enabled` is set.
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SleepFn } from '../shared/utils.js';
import type { SessionOpener } from '../remote/session.js';
import { WalkGuard } from '../fetch/walkGuard.js';
import { runIncrementalSync, type IncrementalResult } from '../store/incremental.js';

export interface SchedulerDeps {
  db: Database.Database;
  config: Config;
  openSession: SessionOpener;
  /** Shared with the fetch job when running inside the server. */
  walks?: WalkGuard;
  sleep?: SleepFn;
}

let syncTask: cron.ScheduledTask | null = null;
const ownWalks = new WalkGuard();

/**
 * One scheduled catch-up. A tick that finds a fetch or sync already walking the feeds is
 * skipped; failures are logged and the schedule keeps going.
 */
export async function runScheduledSync(deps: SchedulerDeps): Promise<IncrementalResult | null> {
  const walks = deps.walks ?? ownWalks;
  if (!walks.tryAcquire('sync')) {
    logger.warn({ active: walks.active }, 'Feeds busy, skipping this scheduled sync');
    return null;
  }
  logger.info('Scheduled sync starting');
  try {
    const includeArchive = deps.config.archive.enabled;
    const session = await deps.openSession({ archive: includeArchive });
    try {
      const result = await runIncrementalSync(
        deps.db,
        { platform: session.platform, archive: session.archive ?? undefined },
        {
          uid: session.uid,
          includeArchive,
          settings: deps.config.incremental,
          archivePageSize: deps.config.archive.page_size,
          sleep: deps.sleep,
        },
      );
      logger.info(
        {
          notifications: result.added.notifications.size,
          comments: result.added.comments.size,
          danmus: result.added.danmus.size,
          failed: result.types.filter((t) => t.status !== 'ok').map((t) => t.dataType),
        },
        'Scheduled sync complete',
      );
      return result;
    } finally {
      session.close();
    }
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Scheduled sync failed');
    return null;
  } finally {
    walks.release('sync');
  }
}

export function startScheduler(deps: SchedulerDeps): void {
  const { schedule } = deps.config;
  if (!schedule.enabled) {
    logger.debug('Scheduler disabled');
    return;
  }
  if (!cron.validate(schedule.sync_cron)) {
    logger.error({ cron: schedule.sync_cron }, 'Invalid sync cron expression, scheduler not started');
    return;
  }

  syncTask = cron.schedule(schedule.sync_cron, () => {
    void runScheduledSync(deps);
  });
  logger.info({ cron: schedule.sync_cron }, 'Scheduler started');
}

export function stopScheduler(): void {
  if (syncTask) {
    syncTask.stop();
    syncTask = null;
    logger.info('Scheduler stopped');
  }
}
