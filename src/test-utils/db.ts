/**
 * Temp-directory SQLite database for tests.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Db } from '../db/connection.js';
import { closeConnection, createConnection } from '../db/connection.js';
import { runMigrations } from '../db/migrations.js';

export interface TestDb {
  db: Db;
  dir: string;
  dbPath: string;
  cleanup(): void;
}

/** Create a migrated database in a fresh temp directory. */
export async function createTestDb(): Promise<TestDb> {
  const dir = mkdtempSync(join(tmpdir(), 'cronbox-test-'));
  const dbPath = join(dir, 'test.db');
  const db = await createConnection(dbPath);
  runMigrations(db);
  return {
    db,
    dir,
    dbPath,
    cleanup(): void {
      closeConnection(db);
      rmSync(dir, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
    },
  };
}
