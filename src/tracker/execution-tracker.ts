/**
 * Execution tracker. Persists one execution record per dispatch and mirrors the
 * schedule table into the jobs table for the query surface.
 */

import { z } from 'zod';

import { describeAction } from '../compiler/actions.js';
import type { Db } from '../db/connection.js';
import type { ScheduleEntry } from '../scheduler/schedule-table.js';
import type {
  ExecutionRecord,
  JobStatus,
  TriggeredBy,
} from '../schemas/execution.js';
import { jobStatusSchema, triggeredBySchema } from '../schemas/execution.js';

/** Exit code stored on records closed by {@link ExecutionTracker.closeInterrupted}. */
export const INTERRUPTED_EXIT_CODE = -1;

/** Completion data for an execution. */
export interface ExecutionOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  stdoutSize: number;
  stderrSize: number;
}

/** Aggregate counters. */
export interface ExecutionStats {
  totalJobs: number;
  /** Executions with no end time. */
  activeJobs: number;
  /** Non-zero exits started in the trailing 24 hours. */
  recentFailures: number;
  last24hExecutions: number;
  totalExecutions: number;
}

/** Job row as mirrored from the schedule table. */
export interface JobRecord {
  name: string;
  displayName: string;
  comment: string | null;
  command: string;
  image: string | null;
  container: string | null;
  schedule: string;
  cron: string;
  status: JobStatus;
  lastRun: string | null;
}

export interface ExecutionTracker {
  /** Open a record and return its id. */
  recordStart(jobName: string, triggeredBy: TriggeredBy): number;
  /** Close a record. Records already closed are left untouched. */
  recordEnd(id: number, outcome: ExecutionOutcome): void;
  /** Most recent records for a job, newest first. */
  query(jobName: string, limit: number): ExecutionRecord[];
  getExecution(id: number): ExecutionRecord | null;
  stats(): ExecutionStats;
  /** Replace the jobs table contents with the schedule entries. */
  syncJobs(entries: readonly ScheduleEntry[]): void;
  listJobs(): JobRecord[];
  getJob(name: string): JobRecord | null;
  /** Close records left open by a previous process. Returns how many. */
  closeInterrupted(): number;
}

const executionRowSchema = z.object({
  id: z.number(),
  job_name: z.string(),
  start_time: z.string(),
  end_time: z.string().nullable(),
  duration_seconds: z.number().nullable(),
  exit_code: z.number().nullable(),
  stdout_preview: z.string().nullable(),
  stderr_preview: z.string().nullable(),
  stdout_size: z.number().nullable(),
  stderr_size: z.number().nullable(),
  triggered_by: z.string(),
});

type ExecutionRow = z.infer<typeof executionRowSchema>;

const jobRowSchema = z.object({
  name: z.string(),
  display_name: z.string(),
  comment: z.string().nullable(),
  command: z.string(),
  image: z.string().nullable(),
  container: z.string().nullable(),
  schedule: z.string(),
  cron: z.string(),
  status: z.string(),
  last_run: z.string().nullable(),
});

type JobRow = z.infer<typeof jobRowSchema>;

const countSchema = z.object({ n: z.number() });
const nameSchema = z.object({ name: z.string() });

function toRecord(row: ExecutionRow): ExecutionRecord {
  return {
    id: row.id,
    jobName: row.job_name,
    startTime: row.start_time,
    endTime: row.end_time ?? undefined,
    durationSeconds: row.duration_seconds ?? undefined,
    exitCode: row.exit_code ?? undefined,
    stdoutPreview: row.stdout_preview ?? undefined,
    stderrPreview: row.stderr_preview ?? undefined,
    stdoutSize: row.stdout_size ?? undefined,
    stderrSize: row.stderr_size ?? undefined,
    triggeredBy: triggeredBySchema.catch('cron').parse(row.triggered_by),
  };
}

function toJob(row: JobRow): JobRecord {
  return {
    name: row.name,
    displayName: row.display_name,
    comment: row.comment,
    command: row.command,
    image: row.image,
    container: row.container,
    schedule: row.schedule,
    cron: row.cron,
    status: jobStatusSchema.catch('scheduled').parse(row.status),
    lastRun: row.last_run,
  };
}

/** Create a tracker over a migrated database. */
export function createExecutionTracker(
  db: Db,
  clock: () => Date = () => new Date(),
): ExecutionTracker {
  const selectExecution = (id: number): ExecutionRow | undefined =>
    db.get('SELECT * FROM job_executions WHERE id = ?', [id], executionRowSchema);
  const count = (sql: string, ...params: string[]): number =>
    db.get(sql, params, countSchema)?.n ?? 0;

  return {
    recordStart(jobName, triggeredBy) {
      const startTime = clock().toISOString();
      return db.transaction(() => {
        const result = db.run(
          'INSERT INTO job_executions (job_name, start_time, triggered_by) VALUES (?, ?, ?)',
          [jobName, startTime, triggeredBy],
        );
        db.run(
          "UPDATE jobs SET status = 'running', last_run = ? WHERE name = ?",
          [startTime, jobName],
        );
        return result.lastInsertRowid;
      });
    },

    recordEnd(id, outcome) {
      const row = selectExecution(id);
      if (!row || row.end_time !== null) return;
      const end = clock();
      const duration =
        Math.max(0, end.getTime() - Date.parse(row.start_time)) / 1000;
      db.transaction(() => {
        db.run(
          `UPDATE job_executions SET end_time = ?, duration_seconds = ?, exit_code = ?,
             stdout_preview = ?, stderr_preview = ?, stdout_size = ?, stderr_size = ?
           WHERE id = ? AND end_time IS NULL`,
          [
            end.toISOString(),
            duration,
            outcome.exitCode,
            outcome.stdout,
            outcome.stderr,
            outcome.stdoutSize,
            outcome.stderrSize,
            id,
          ],
        );
        // Overlapping runs keep the job running until the last one ends.
        db.run(
          `UPDATE jobs SET status = ? WHERE name = ? AND NOT EXISTS (
             SELECT 1 FROM job_executions WHERE job_name = ? AND end_time IS NULL
           )`,
          [
            outcome.exitCode === 0 ? 'completed' : 'failed',
            row.job_name,
            row.job_name,
          ],
        );
      });
    },

    query(jobName, limit) {
      return db
        .all(
          `SELECT * FROM job_executions WHERE job_name = ?
           ORDER BY start_time DESC, id DESC LIMIT ?`,
          [jobName, limit],
          executionRowSchema,
        )
        .map(toRecord);
    },

    getExecution(id) {
      const row = selectExecution(id);
      return row ? toRecord(row) : null;
    },

    stats() {
      const since = new Date(clock().getTime() - 86_400_000).toISOString();
      return {
        totalJobs: count('SELECT COUNT(*) AS n FROM jobs'),
        activeJobs: count(
          'SELECT COUNT(*) AS n FROM job_executions WHERE end_time IS NULL',
        ),
        recentFailures: count(
          `SELECT COUNT(*) AS n FROM job_executions
           WHERE start_time >= ? AND exit_code IS NOT NULL AND exit_code != 0`,
          since,
        ),
        last24hExecutions: count(
          'SELECT COUNT(*) AS n FROM job_executions WHERE start_time >= ?',
          since,
        ),
        totalExecutions: count('SELECT COUNT(*) AS n FROM job_executions'),
      };
    },

    syncJobs(entries) {
      const existing = db.all('SELECT name FROM jobs', [], nameSchema);

      db.transaction(() => {
        const keep = new Set<string>();
        for (const entry of entries) {
          const { unit } = entry;
          keep.add(entry.name);
          db.run(
            `INSERT INTO jobs (name, display_name, comment, command, image, container, schedule, cron)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT(name) DO UPDATE SET
               display_name = excluded.display_name,
               comment = excluded.comment,
               command = excluded.command,
               image = excluded.image,
               container = excluded.container,
               schedule = excluded.schedule,
               cron = excluded.cron,
               updated_at = datetime('now')`,
            [
              entry.name,
              unit.name,
              entry.comment,
              describeAction(unit.primary),
              unit.primary.kind === 'run' ? unit.primary.image : null,
              unit.primary.kind === 'exec' ? unit.primary.container : null,
              unit.schedule,
              entry.cron,
            ],
          );
        }
        for (const { name } of existing) {
          if (!keep.has(name)) db.run('DELETE FROM jobs WHERE name = ?', [name]);
        }
      });
    },

    listJobs() {
      return db
        .all('SELECT * FROM jobs ORDER BY name', [], jobRowSchema)
        .map(toJob);
    },

    getJob(name) {
      const row = db.get('SELECT * FROM jobs WHERE name = ?', [name], jobRowSchema);
      return row ? toJob(row) : null;
    },

    closeInterrupted() {
      const now = clock().toISOString();
      return db.transaction(() => {
        const result = db.run(
          `UPDATE job_executions SET end_time = ?, exit_code = ?,
             stderr_preview = COALESCE(stderr_preview, 'interrupted')
           WHERE end_time IS NULL`,
          [now, INTERRUPTED_EXIT_CODE],
        );
        db.run("UPDATE jobs SET status = 'failed' WHERE status = 'running'");
        return result.changes;
      });
    },
  };
}
