import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { runScheduledSync, startScheduler, stopScheduler } from '../scheduler.js';
import { CredentialsError } from '../../shared/errors.js';
import { WalkGuard } from '../../fetch/walkGuard.js';
import { openTestDb } from '../../store/__tests__/fixtures.js';
import { noSleep } from '../../fetch/__tests__/fakePlatform.js';
import { fakeSessions, testConfig } from '../../api/__tests__/harness.js';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  stopScheduler();
  db.close();
});

describe('runScheduledSync', () => {
  it('runs an incremental sync and closes the session', async () => {
    const sessions = fakeSessions();
    const result = await runScheduledSync({ db, config: testConfig(), openSession: sessions.opener, sleep: noSleep });

    expect(result?.types.map((t) => t.status)).toEqual(['ok', 'ok', 'ok', 'ok']);
    expect(result?.added.comments.size).toBe(1);
    expect(sessions.closed()).toBe(1);
  });

  it('skips a tick while the previous one runs', async () => {
    const sessions = fakeSessions();
    const deps = { db, config: testConfig(), openSession: sessions.opener, sleep: noSleep };

    const first = runScheduledSync(deps);
    const second = await runScheduledSync(deps);
    expect(second).toBeNull();
    expect(await first).not.toBeNull();
  });

  it('skips a tick while a fetch holds the feeds', async () => {
    const sessions = fakeSessions();
    const walks = new WalkGuard();
    walks.tryAcquire('fetch');

    const result = await runScheduledSync({ db, config: testConfig(), openSession: sessions.opener, walks, sleep: noSleep });
    expect(result).toBeNull();
    expect(sessions.opened).toHaveLength(0);
    expect(walks.active).toBe('fetch');

    walks.release('fetch');
    expect(await runScheduledSync({ db, config: testConfig(), openSession: sessions.opener, walks, sleep: noSleep })).not.toBeNull();
    expect(walks.active).toBeNull();
  });

  it('logs and returns null when the session fails', async () => {
    const result = await runScheduledSync({
      db,
      config: testConfig(),
      openSession: () => Promise.reject(new CredentialsError('expired')),
    });
    expect(result).toBeNull();
  });
});

describe('startScheduler', () => {
  it('does nothing when disabled or misconfigured', () => {
    const sessions = fakeSessions();
    expect(() => startScheduler({ db, config: testConfig(), openSession: sessions.opener })).not.toThrow();
    expect(() =>
      startScheduler({
        db,
        config: testConfig({ schedule: { enabled: true, sync_cron: 'not a cron' } }),
        openSession: sessions.opener,
      }),
    ).not.toThrow();
  });
});
