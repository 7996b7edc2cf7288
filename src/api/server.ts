import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { FootprintError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { resolvePath, getAppDir, type SleepFn } from '../shared/utils.js';
import { pacingFromConfig, type Pacing } from '../fetch/backoff.js';
import { openSession, type SessionOpener } from '../remote/session.js';
import { WalkGuard } from '../fetch/walkGuard.js';
import { startScheduler, stopScheduler } from '../schedule/scheduler.js';
import { DeleteJobRegistry, FetchJobRunner } from './jobs.js';
import { systemRoutes } from './routes/system.js';
import { recordRoutes } from './routes/records.js';
import { fetchRoutes } from './routes/fetch.js';
import { syncRoutes } from './routes/sync.js';
import { deleteRoutes } from './routes/delete.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  openSession: SessionOpener;
  pacing: Pacing;
  walks: WalkGuard;
  sleep?: SleepFn;
  fetchJobs: FetchJobRunner;
  deleteJobs: DeleteJobRegistry;
}

export function createContext(
  db: Database.Database,
  config: Config,
  overrides: { openSession?: SessionOpener; pacing?: Pacing; sleep?: SleepFn } = {},
): AppContext {
  const deps = {
    db,
    config,
    openSession: overrides.openSession ?? ((opts: { archive?: boolean }) => openSession(config, opts)),
    pacing: overrides.pacing ?? pacingFromConfig(config.fetch),
    walks: new WalkGuard(),
    sleep: overrides.sleep,
  };
  return { ...deps, fetchJobs: new FetchJobRunner(deps), deleteJobs: new DeleteJobRegistry(deps) };
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', recordRoutes(ctx));
  app.route('/api', fetchRoutes(ctx));
  app.route('/api', syncRoutes(ctx));
  app.route('/api', deleteRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof FootprintError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'CREDENTIALS_ERROR':
      return 401;
    case 'JOB_ERROR':
      return 409;
    case 'REQUEST_FAILED':
    case 'REMOTE_API_ERROR':
    case 'DECODE_ERROR':
      return 502;
    case 'DELETE_ERROR':
      return 502;
    case 'DB_ERROR':
      return 500;
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const configPath = path.join(getAppDir(), 'config.yaml');
  if (!process.env['FOOTPRINT_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: wrote default config');
  }

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  const ctx = createContext(db, config);
  const app = createApp(ctx);

  logger.info({ port, host }, 'Starting footprint server');
  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}/api/health` }, 'Server listening');
  });

  startScheduler(ctx);

  const shutdown = () => {
    logger.info('Shutting down...');
    ctx.fetchJobs.stop();
    stopScheduler();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
