#!/usr/bin/env node

import { Command, Option } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import type Database from 'better-sqlite3';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { getAppDir, resolvePath } from '../shared/utils.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { pacingFromConfig } from '../fetch/backoff.js';
import { fetchWithResume } from '../fetch/resume.js';
import { createProgressState, formatActivity, type ActivityCallback } from '../fetch/types.js';
import { parseCredentials } from '../remote/platform.js';
import { openSession, withSession } from '../remote/session.js';
import { DeletionExecutor, type LocalAction } from '../delete/executor.js';
import { planDeletion } from '../delete/plan.js';
import { bindRecordStore, clearUserData, countRecords, getStats, listRecords } from '../store/footprintDb.js';
import { RECORD_KINDS, type RecordKind } from '../store/models.js';
import { saveMergedResult } from '../store/sync.js';
import { runIncrementalSync } from '../store/incremental.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('footprint')
  .description('Collect, sync and clean up your comments, danmus and notifications')
  .version('0.1.0');

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

const printActivity: ActivityCallback = (update) => {
  log(typeof update === 'string' ? `  ${update}` : `  ${formatActivity(update)}`);
};

async function openDb(): Promise<{ config: Config; db: Database.Database }> {
  const config = await loadConfig();
  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);
  return { config, db };
}

async function uidFor(config: Config, raw: string | undefined): Promise<number> {
  if (raw !== undefined) {
    const uid = Number(raw);
    if (!Number.isInteger(uid) || uid <= 0) throw new Error(`Invalid uid: ${raw}`);
    return uid;
  }
  return withSession(config, { archive: false }, async (s) => s.uid);
}

function parseKind(value: string): RecordKind {
  const kind = RECORD_KINDS.find((k) => k === value);
  if (!kind) throw new Error(`Unknown kind "${value}"; expected one of ${RECORD_KINDS.join(', ')}`);
  return kind;
}

function confirm(question: string): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}

/** Run a command body, print its error, and always release the database. */
async function guarded(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    log(`✗ ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}

// === init ===
program
  .command('init')
  .description('Create the config file and the local database')
  .action(() =>
    guarded(async () => {
      const configPath = path.join(getAppDir(), 'config.yaml');
      if (!fs.existsSync(configPath)) {
        writeDefaultConfig(configPath);
        log(`✓ ${configPath} created`);
      } else {
        log(`✓ ${configPath} already exists`);
      }

      const config = await loadConfig(true);
      const db = initDb(resolvePath(config.db.path));
      const { applied } = runMigrations(db);
      log(applied.length > 0 ? `✓ database ready (${applied.length} migrations applied)` : '✓ database already up to date');
      log('  Next: put your cookie in platform.cookie (or FOOTPRINT_COOKIE) and run `footprint doctor --online`');
    }),
  );

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and credentials')
  .option('--online', 'also ask the platform which account the cookie belongs to')
  .action((opts: { online?: boolean }) =>
    guarded(async () => {
      const results: string[] = [];
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const db = initDb(resolvePath(config.db.path));
        runMigrations(db);
        results.push('DB: ok');
      } catch (err) {
        results.push(`DB: error (${errorMessage(err)})`);
      }

      try {
        parseCredentials(config.platform.cookie);
        results.push('Cookie: ok');
      } catch (err) {
        results.push(`Cookie: ${errorMessage(err)}`);
      }

      if (opts.online) {
        try {
          const uid = await uidFor(config, undefined);
          results.push(`Account: uid ${uid}`);
        } catch (err) {
          results.push(`Account: error (${errorMessage(err)})`);
        }
      }

      results.push(`Archive: ${config.archive.enabled ? 'enabled' : 'disabled'}`);
      log(`✓ ${results.join(' | ')}`);
    }),
  );

// === fetch ===
program
  .command('fetch')
  .description('Walk every source from the beginning and store what is found')
  .option('--archive', 'include the third-party archive sources')
  .option('--no-save', 'print counts without writing to the database')
  .action((opts: { archive?: boolean; save: boolean }) =>
    guarded(async () => {
      const { config, db } = await openDb();
      const includeArchive = opts.archive ?? config.archive.enabled;
      const session = await openSession(config, { archive: includeArchive });

      let stopRequested = false;
      const onSigint = () => {
        log('\n  Stopping after the current page...');
        stopRequested = true;
      };
      process.once('SIGINT', onSigint);

      try {
        log(`Fetching for uid ${session.uid}${includeArchive ? ' (with archive)' : ''}`);
        const result = await fetchWithResume(
          { platform: session.platform, archive: session.archive ?? undefined },
          createProgressState(),
          {
            uid: session.uid,
            includeArchive,
            archivePageSize: config.archive.page_size,
            pacing: pacingFromConfig(config.fetch),
            onActivity: printActivity,
            shouldStop: () => stopRequested,
          },
          {
            resumeDelayMs: config.fetch.resume_delay_seconds * 1000,
            maxResumeAttempts: config.fetch.max_resume_attempts,
          },
        );

        if (result.status === 'paused') {
          log(`✗ Fetch ${result.reason === 'stopped' ? 'stopped' : 'paused'} at ${result.source}${result.error ? `: ${result.error}` : ''}`);
          process.exitCode = 1;
          return;
        }

        const { notifications, comments, danmus } = result.result;
        log(`✓ Fetched ${notifications.size} notifications, ${comments.size} comments, ${danmus.size} danmus`);
        if (opts.save) {
          const saved = saveMergedResult(db, session.uid, result.result);
          log(`✓ Saved ${saved.notifications + saved.comments + saved.danmus} records`);
        }
      } finally {
        process.off('SIGINT', onSigint);
        session.close();
      }
    }),
  );

// === sync ===
program
  .command('sync')
  .description('Fetch only what is newer than the stored records')
  .option('--archive', 'include the third-party archive sources')
  .action((opts: { archive?: boolean }) =>
    guarded(async () => {
      const { config, db } = await openDb();
      const includeArchive = opts.archive ?? config.archive.enabled;

      await withSession(config, { archive: includeArchive }, async (session) => {
        const result = await runIncrementalSync(
          db,
          { platform: session.platform, archive: session.archive ?? undefined },
          {
            uid: session.uid,
            includeArchive,
            settings: config.incremental,
            archivePageSize: config.archive.page_size,
            onActivity: printActivity,
          },
        );

        for (const t of result.types) {
          const total = t.added.notifications + t.added.comments + t.added.danmus;
          log(t.status === 'ok' ? `  ${t.dataType}: +${total}` : `  ${t.dataType}: ${t.status} (${t.error ?? 'no detail'})`);
        }
        if (result.types.some((t) => t.status !== 'ok')) process.exitCode = 1;
        log(
          `✓ Sync added ${result.added.notifications.size} notifications, ${result.added.comments.size} comments, ${result.added.danmus.size} danmus`,
        );
      });
    }),
  );

// === stats ===
program
  .command('stats')
  .description('Show stored record counts')
  .option('--uid <uid>', 'account id (defaults to the cookie owner)')
  .action((opts: { uid?: string }) =>
    guarded(async () => {
      const { config, db } = await openDb();
      const stats = getStats(db, await uidFor(config, opts.uid));

      log(`uid ${stats.uid}`);
      for (const [label, s] of [
        ['comments', stats.comments],
        ['danmus', stats.danmus],
        ['notifications', stats.notifications],
      ] as const) {
        const sources = Object.entries(s.bySource)
          .map(([k, v]) => `${k} ${v}`)
          .join(', ');
        log(`  ${label.padEnd(14)} ${String(s.active).padStart(6)} active ${String(s.deleted).padStart(6)} deleted  (${sources || 'none'})`);
      }
      for (const [type, ts] of Object.entries(stats.lastSync)) {
        log(`  last sync ${type.padEnd(14)} ${new Date(ts * 1000).toISOString()}`);
      }
    }),
  );

// === list ===
program
  .command('list <kind>')
  .description('List stored records, newest first (comment | danmu | notification)')
  .option('--uid <uid>', 'account id (defaults to the cookie owner)')
  .option('-n, --limit <n>', 'rows per page', '20')
  .option('--offset <n>', 'rows to skip', '0')
  .option('--all', 'include soft-deleted records')
  .action((kindArg: string, opts: { uid?: string; limit: string; offset: string; all?: boolean }) =>
    guarded(async () => {
      const kind = parseKind(kindArg);
      const { config, db } = await openDb();
      const uid = await uidFor(config, opts.uid);
      const includeDeleted = opts.all ?? false;

      const rows = listRecords(db, kind, uid, {
        limit: Number(opts.limit),
        offset: Number(opts.offset),
        includeDeleted,
      });
      for (const r of rows) {
        const when = new Date(r.created_time * 1000).toISOString().slice(0, 19).replace('T', ' ');
        const flag = r.is_deleted ? ' [deleted]' : '';
        log(`${r.id.padEnd(20)} ${when}  ${r.content.replace(/\s+/g, ' ').slice(0, 60)}${flag}`);
      }
      log(`(${rows.length} of ${countRecords(db, kind, uid, { includeDeleted })})`);
    }),
  );

// === delete ===
program
  .command('delete <kind> <ids...>')
  .description('Delete stored records on the platform, one at a time')
  .option('--cascade', 'with notifications: also delete the comments and danmus linked to them')
  .addOption(new Option('--local <action>', 'what to do locally after a remote success').choices(['none', 'soft', 'hard']))
  .option('--delay <seconds>', 'wait between items')
  .action((kindArg: string, ids: string[], opts: { cascade?: boolean; local?: LocalAction; delay?: string }) =>
    guarded(async () => {
      const kind = parseKind(kindArg);
      const { config, db } = await openDb();

      await withSession(config, { archive: false }, async (session) => {
        const plan = planDeletion(db, session.uid, { kind, ids, cascade: opts.cascade });
        for (const id of plan.missing) log(`  ? ${id}: not in the local store, skipped`);
        if (plan.tasks.length === 0) {
          log('✗ Nothing to delete');
          process.exitCode = 1;
          return;
        }

        const executor = new DeletionExecutor(session.platform, {
          delayMs: (opts.delay !== undefined ? Number(opts.delay) : config.delete.delay_seconds) * 1000,
          errorBackoffMs: config.delete.error_backoff_seconds * 1000,
          localAction: opts.local ?? config.delete.local_action,
          store: bindRecordStore(db, session.uid),
          onEvent: (event) => {
            if (event.type === 'deleted') log(`  ✓ ${event.task.kind} ${event.task.id}`);
            else if (event.type === 'failed') log(`  ✗ ${event.task.kind} ${event.task.id}: ${event.error}`);
            else if (event.type === 'store-error') log(`  ! ${event.task.kind} ${event.task.id}: ${event.error}`);
          },
        });

        const onSigint = () => executor.stop();
        process.once('SIGINT', onSigint);
        try {
          const tally = await executor.run(plan.tasks);
          log(`${tally.stopped ? '✗ Stopped' : '✓ Done'}: ${tally.succeeded.length} deleted, ${tally.failed.length} failed of ${tally.total}`);
          if (tally.failed.length > 0) process.exitCode = 1;
        } finally {
          process.off('SIGINT', onSigint);
        }
      });
    }),
  );

// === clear ===
program
  .command('clear')
  .description('Remove every stored record and sync cursor for an account')
  .option('--uid <uid>', 'account id (defaults to the cookie owner)')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action((opts: { uid?: string; yes?: boolean }) =>
    guarded(async () => {
      const { config, db } = await openDb();
      const uid = await uidFor(config, opts.uid);
      if (!opts.yes && !(await confirm(`Delete all local data for uid ${uid}?`))) {
        log('  Aborted');
        return;
      }
      const cleared = clearUserData(db, uid);
      log(`✓ Cleared ${cleared.comments} comments, ${cleared.danmus} danmus, ${cleared.notifications} notifications, ${cleared.cursors} cursors`);
    }),
  );

// === server ===
program
  .command('server')
  .description('Start the HTTP API (and the sync schedule when enabled)')
  .option('-p, --port <port>', 'port to listen on')
  .action(async (opts: { port?: string }) => {
    try {
      await startServer({ port: opts.port !== undefined ? Number(opts.port) : undefined });
    } catch (err) {
      log(`✗ ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

program.parse();
