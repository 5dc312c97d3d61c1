/**
 * Database maintenance: execution record retention pruning.
 */

import type { Logger } from 'pino';

import type { Db } from './connection.js';

/** Configuration for maintenance tasks. */
export interface MaintenanceConfig {
  /** Records started longer ago than this are pruned. */
  runRetentionDays: number;
  /** The newest records kept regardless of age. */
  runRetentionCount: number;
  /** Interval in milliseconds between maintenance runs. */
  intervalMs: number;
}

/** Maintenance controller with start/stop lifecycle. */
export interface Maintenance {
  /** Start maintenance tasks (runs immediately, then on interval). */
  start(): void;
  /** Stop maintenance task interval. */
  stop(): void;
  /** Run all maintenance tasks immediately. Returns the number of records pruned. */
  runNow(): number;
}

/** Delete finished executions past the retention age, keeping the newest `keep`. */
export function pruneExecutions(
  db: Db,
  days: number,
  keep: number,
  now = new Date(),
): number {
  const cutoff = new Date(now.getTime() - days * 86_400_000).toISOString();
  const result = db.run(
    `DELETE FROM job_executions
     WHERE end_time IS NOT NULL
       AND start_time < ?
       AND id NOT IN (
         SELECT id FROM job_executions ORDER BY start_time DESC, id DESC LIMIT ?
       )`,
    [cutoff, keep],
  );
  return result.changes;
}

/**
 * Create the maintenance controller. Runs cleanup tasks on startup and at configured intervals.
 */
export function createMaintenance(
  db: Db,
  config: MaintenanceConfig,
  logger: Logger,
): Maintenance {
  let interval: NodeJS.Timeout | null = null;

  function runAll(): number {
    try {
      const deleted = pruneExecutions(
        db,
        config.runRetentionDays,
        config.runRetentionCount,
      );
      if (deleted > 0) logger.info({ deleted }, 'Pruned old executions');
      return deleted;
    } catch (err) {
      logger.error({ err }, 'Execution pruning failed');
      return 0;
    }
  }

  return {
    start(): void {
      runAll();
      interval = setInterval(runAll, config.intervalMs);
      interval.unref();
    },

    stop(): void {
      if (interval) {
        clearInterval(interval);
        interval = null;
      }
    },

    runNow(): number {
      return runAll();
    },
  };
}
