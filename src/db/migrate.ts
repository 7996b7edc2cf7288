import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every `.sql` file in the migrations directory that `_migrations` does not list yet,
 * each inside its own transaction.
 */
export function runMigrations(db: Database.Database, dir = getMigrationsDir()): MigrationResult {
  ensureMigrationsTable(db);

  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const done = new Set(rows.map((r) => r.name));
  const pending = listMigrationFiles(dir).filter((f) => !done.has(f));

  const result: MigrationResult = { applied: [], skipped: [...done] };
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const name of pending) {
    const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(name);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${name}`, { migration: name, cause: errorMessage(err) });
    }
    result.applied.push(name);
    logger.info({ migration: name }, 'Migration applied');
  }

  return result;
}
