/**
 * Schema migration runner. Tracks applied migrations via schema_version table, applies pending migrations idempotently.
 */

import { z } from 'zod';

import type { Db } from './connection.js';

const versionSchema = z.object({ version: z.number().nullable() });

/** Initial schema: synced job table and execution history. */
const MIGRATION_001 = `
CREATE TABLE IF NOT EXISTS jobs (
    name            TEXT PRIMARY KEY,
    display_name    TEXT NOT NULL,
    comment         TEXT,
    command         TEXT NOT NULL,
    image           TEXT,
    container       TEXT,
    schedule        TEXT NOT NULL,
    cron            TEXT NOT NULL,
    status          TEXT NOT NULL DEFAULT 'scheduled',
    last_run        TEXT,
    updated_at      TEXT DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS job_executions (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    job_name        TEXT NOT NULL,
    start_time      TEXT NOT NULL,
    end_time        TEXT,
    duration_seconds REAL,
    exit_code       INTEGER,
    stdout_preview  TEXT,
    stderr_preview  TEXT,
    stdout_size     INTEGER,
    stderr_size     INTEGER,
    triggered_by    TEXT NOT NULL DEFAULT 'cron'
);

CREATE INDEX IF NOT EXISTS idx_executions_job_start ON job_executions(job_name, start_time DESC);
CREATE INDEX IF NOT EXISTS idx_executions_start ON job_executions(start_time);
`;

/** Migration 002: partial index for open executions. */
const MIGRATION_002 = `
CREATE INDEX IF NOT EXISTS idx_executions_open ON job_executions(end_time) WHERE end_time IS NULL;
`;

/** Registry of all migrations keyed by version number. */
const MIGRATIONS: Record<number, string> = {
  1: MIGRATION_001,
  2: MIGRATION_002,
};

/** Latest schema version. */
export const SCHEMA_VERSION = Math.max(...Object.keys(MIGRATIONS).map(Number));

/**
 * Run all pending migrations. Creates schema_version table if needed, applies migrations in order.
 */
export function runMigrations(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT (datetime('now'))
    );
  `);

  const currentVersion =
    db.get('SELECT MAX(version) as version FROM schema_version', [], versionSchema)
      ?.version ?? 0;

  const pendingVersions = Object.keys(MIGRATIONS)
    .map(Number)
    .filter((v) => v > currentVersion)
    .sort((a, b) => a - b);

  for (const version of pendingVersions) {
    db.transaction(() => {
      db.exec(MIGRATIONS[version]);
      db.run('INSERT INTO schema_version (version) VALUES (?)', [version]);
    });
  }
}
