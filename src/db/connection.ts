/**
 * SQLite connection manager. The database lives in memory (sql.js) and is
 * written back to `dbPath` after every committed change.
 *
 * @module
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import * as sqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { z } from 'zod';

/** Value bound to a `?` placeholder. */
export type SqlParam = string | number | null;

/** Outcome of a write statement. */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

const insertIdSchema = z.object({ id: z.number() });

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= sqlJs.default();
  return engine;
}

/** Open database handle. */
export class Db {
  private depth = 0;
  private open = true;

  public constructor(
    private readonly database: Database,
    /** File the database is written to, or `:memory:`. */
    public readonly path: string,
  ) {}

  public get isOpen(): boolean {
    return this.open;
  }

  /** Run one or more statements without parameters. */
  public exec(sql: string): void {
    this.database.exec(sql);
    this.save();
  }

  /** Run a single write statement. */
  public run(sql: string, params: SqlParam[] = []): RunResult {
    this.database.run(sql, params);
    const changes = this.database.getRowsModified();
    const lastInsertRowid =
      this.get('SELECT last_insert_rowid() AS id', [], insertIdSchema)?.id ?? 0;
    this.save();
    return { changes, lastInsertRowid };
  }

  /** All rows of a query, each validated by `schema`. */
  public all<S extends z.ZodTypeAny>(
    sql: string,
    params: SqlParam[],
    schema: S,
  ): Array<z.output<S>> {
    const statement = this.database.prepare(sql, params);
    try {
      const rows: Array<z.output<S>> = [];
      while (statement.step()) rows.push(schema.parse(statement.getAsObject()));
      return rows;
    } finally {
      statement.free();
    }
  }

  /** First row of a query, or undefined. */
  public get<S extends z.ZodTypeAny>(
    sql: string,
    params: SqlParam[],
    schema: S,
  ): z.output<S> | undefined {
    const statement = this.database.prepare(sql, params);
    try {
      return statement.step() ? schema.parse(statement.getAsObject()) : undefined;
    } finally {
      statement.free();
    }
  }

  /** Run `fn` in a transaction; nested calls join the outer one. */
  public transaction<T>(fn: () => T): T {
    if (this.depth > 0) return fn();

    this.database.exec('BEGIN');
    this.depth = 1;
    try {
      const result = fn();
      this.database.exec('COMMIT');
      this.depth = 0;
      this.save();
      return result;
    } catch (err) {
      this.depth = 0;
      this.database.exec('ROLLBACK');
      throw err;
    }
  }

  /** Close the handle if still open. */
  public close(): void {
    if (!this.open) return;
    this.save();
    this.open = false;
    this.database.close();
  }

  /** Write the database to its file. Deferred inside a transaction. */
  public save(): void {
    if (this.depth > 0 || this.path === ':memory:') return;
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, this.database.export());
    renameSync(tmp, this.path);
  }
}

/** Open (creating if needed) the database at `dbPath`. */
export async function createConnection(dbPath: string): Promise<Db> {
  const SQL = await loadEngine();
  let database: Database;
  if (dbPath === ':memory:') {
    database = new SQL.Database();
  } else {
    mkdirSync(dirname(dbPath), { recursive: true });
    database = existsSync(dbPath)
      ? new SQL.Database(readFileSync(dbPath))
      : new SQL.Database();
  }
  const db = new Db(database, dbPath);
  db.save();
  return db;
}

/** Close the handle if still open. */
export function closeConnection(db: Db): void {
  if (db.isOpen) db.close();
}
