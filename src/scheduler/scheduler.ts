/**
 * Croner-driven dispatcher. Ticks once a minute against the live schedule table
 * snapshot and dispatches every due entry as an independent task. Overlapping
 * runs of the same job are allowed.
 */

import { Cron } from 'croner';
import type { Logger } from 'pino';

import type { TriggeredBy } from '../schemas/execution.js';
import type { ExecutionTracker } from '../tracker/execution-tracker.js';
import type { Executor } from './executor.js';
import type { ScheduleEntry, ScheduleTable } from './schedule-table.js';
import { emptyScheduleTable, isDue } from './schedule-table.js';
import type { UnitResult } from './unit-runner.js';
import { runUnit } from './unit-runner.js';

/** Raised when a manual trigger names a job that is not in the table. */
export class JobNotFoundError extends Error {
  constructor(public readonly jobName: string) {
    super(`Job not found: ${jobName}`);
    this.name = 'JobNotFoundError';
  }
}

/** Scheduler dependencies. */
export interface SchedulerDeps {
  tracker: ExecutionTracker;
  executor: Executor;
  logger: Logger;
  /** How long stop() waits for in-flight units. */
  shutdownGraceMs: number;
  clock?: () => Date;
}

/** Handle for one dispatched unit. */
export interface Dispatch {
  /** Execution record id; null when tracking failed. */
  executionId: number | null;
  /** Settles when the unit finishes; null when it could not run. */
  done: Promise<UnitResult | null>;
}

export interface Scheduler {
  /** Swap in a new schedule table snapshot. */
  load(table: ScheduleTable): void;
  getTable(): ScheduleTable;
  /** Start the once-a-minute tick. */
  start(): void;
  /** Stop ticking; wait up to the grace period for in-flight units. */
  stop(): Promise<void>;
  /** Dispatch every entry due in the minute of `now`. Returns the count. */
  tick(now?: Date): number;
  dispatch(entry: ScheduleEntry, triggeredBy: TriggeredBy): Dispatch;
  /** Manual dispatch by job name. Throws {@link JobNotFoundError}. */
  triggerJob(name: string): Dispatch;
  /** Dispatch every onstart entry of the current table. */
  runOnstart(): Dispatch[];
  getRunningCount(): number;
}

/** Create the scheduler. The table starts empty until {@link Scheduler.load}. */
export function createScheduler(deps: SchedulerDeps): Scheduler {
  const { tracker, executor, logger, shutdownGraceMs } = deps;
  const clock = deps.clock ?? (() => new Date());

  let table = emptyScheduleTable(logger);
  let ticker: Cron | null = null;
  const running = new Set<Promise<UnitResult | null>>();

  function recordEnd(
    executionId: number | null,
    job: string,
    result: UnitResult,
  ): void {
    if (executionId === null) return;
    try {
      tracker.recordEnd(executionId, result);
    } catch (err) {
      logger.error({ job, executionId, err }, 'Failed to record execution end');
    }
  }

  function dispatch(entry: ScheduleEntry, triggeredBy: TriggeredBy): Dispatch {
    const job = entry.name;
    let executionId: number | null = null;
    try {
      executionId = tracker.recordStart(job, triggeredBy);
    } catch (err) {
      logger.error({ job, err }, 'Failed to record execution start');
    }

    logger.info({ job, executionId, triggeredBy }, 'Dispatching job');

    const done: Promise<UnitResult | null> = runUnit(entry.unit, executor, logger)
      .then(
        (result) => {
          recordEnd(executionId, job, result);
          logger.info(
            { job, executionId, exitCode: result.exitCode },
            'Job finished',
          );
          return result;
        },
        (err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ job, executionId, err }, 'Job execution failed');
          recordEnd(executionId, job, {
            exitCode: 1,
            stdout: '',
            stderr: message,
            stdoutSize: 0,
            stderrSize: Buffer.byteLength(message),
            triggerExitCodes: [],
          });
          return null;
        },
      )
      .finally(() => {
        running.delete(done);
      });

    running.add(done);
    return { executionId, done };
  }

  function tick(now: Date = clock()): number {
    const snapshot = table;
    let dispatched = 0;
    for (const entry of snapshot.entries) {
      if (isDue(entry, now)) {
        dispatch(entry, 'cron');
        dispatched++;
      }
    }
    if (dispatched > 0) {
      logger.debug({ dispatched, at: now.toISOString() }, 'Tick');
    }
    return dispatched;
  }

  return {
    load(next: ScheduleTable): void {
      table = next;
      logger.info(
        { jobs: next.entries.length, unschedulable: next.unschedulable.length },
        'Schedule table loaded',
      );
    },

    getTable(): ScheduleTable {
      return table;
    },

    start(): void {
      if (ticker) return;
      ticker = new Cron('* * * * *', () => {
        try {
          tick(clock());
        } catch (err: unknown) {
          logger.error({ err }, 'Tick failed');
        }
      });
      logger.info({ jobs: table.entries.length }, 'Scheduler started');
    },

    async stop(): Promise<void> {
      logger.info('Stopping scheduler');
      if (ticker) {
        ticker.stop();
        ticker = null;
      }

      const deadline = Date.now() + shutdownGraceMs;
      while (running.size > 0 && Date.now() < deadline) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }

      if (running.size > 0) {
        logger.warn(
          { count: running.size },
          'Scheduler stopped with units still running',
        );
      }
    },

    tick,
    dispatch,

    triggerJob(name: string): Dispatch {
      const entry = table.get(name);
      if (!entry) throw new JobNotFoundError(name);
      return dispatch(entry, 'manual');
    },

    runOnstart(): Dispatch[] {
      return table.entries
        .filter((entry) => entry.unit.onstart)
        .map((entry) => dispatch(entry, 'onstart'));
    },

    getRunningCount(): number {
      return running.size;
    },
  };
}
