/**
 * Main runner orchestrator. Loads the job set, builds and commits the schedule
 * table, wires up database, scheduler and API server, and handles signals:
 * SIGTERM/SIGINT shut down, SIGHUP reloads.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { pino } from 'pino';

import type { ReloadSummary } from './api/routes.js';
import { createServer } from './api/server.js';
import { commitScheduleTable } from './builder/commit.js';
import { buildJobSet } from './builder/job-set.js';
import type { RandomSource } from './compiler/schedule.js';
import { loadJobSet } from './config/job-set-loader.js';
import { ensureHomeDir, resolveDbPath } from './config/runner-config.js';
import type { Db } from './db/connection.js';
import { closeConnection, createConnection } from './db/connection.js';
import { createMaintenance, type Maintenance } from './db/maintenance.js';
import { runMigrations } from './db/migrations.js';
import type { Executor } from './scheduler/executor.js';
import { createProcessExecutor } from './scheduler/executor.js';
import { createScheduler, type Scheduler } from './scheduler/scheduler.js';
import type { RunnerConfig } from './schemas/config.js';
import type { ExecutionTracker } from './tracker/execution-tracker.js';
import { createExecutionTracker } from './tracker/execution-tracker.js';

/** Optional collaborators, mainly for tests. */
export interface RunnerOptions {
  executor?: Executor;
  logger?: Logger;
  random?: RandomSource;
  /** Install signal handlers. Defaults to true. */
  handleSignals?: boolean;
}

/** Runner interface for managing the runner lifecycle. */
export interface Runner {
  /** Build the schedule, run onstart jobs and start ticking and serving. */
  start(): Promise<void>;
  /** Gracefully stop all runner components and clean up resources. */
  stop(): Promise<void>;
  /** Rebuild and swap the schedule table. Onstart jobs are not re-run. */
  reload(): ReloadSummary;
  /** Bound API address once started. */
  address(): string | null;
  getScheduler(): Scheduler | null;
  getTracker(): ExecutionTracker | null;
}

/** Create the pino logger described by the log config. */
export function createLogger(config: RunnerConfig): Logger {
  return pino({
    level: config.log.level,
    ...(config.log.file
      ? {
          transport: {
            target: 'pino/file',
            options: { destination: config.log.file, mkdir: true },
          },
        }
      : {}),
  });
}

/**
 * Create the runner. Startup failures surface as StartupError from start().
 */
export function createRunner(
  config: RunnerConfig,
  options: RunnerOptions = {},
): Runner {
  let db: Db | null = null;
  let tracker: ExecutionTracker | null = null;
  let scheduler: Scheduler | null = null;
  let server: FastifyInstance | null = null;
  let maintenance: Maintenance | null = null;
  let homeDir: string | null = null;
  let boundAddress: string | null = null;
  const signalHandlers: Array<[NodeJS.Signals, () => void]> = [];

  const logger = options.logger ?? createLogger(config);

  function rebuild(): ReloadSummary {
    if (!homeDir || !scheduler || !tracker) {
      throw new Error('Runner not started');
    }
    const { path, jobSet } = loadJobSet(homeDir, config.jobsFile);
    logger.info({ path }, 'Job set loaded');

    const build = buildJobSet(jobSet, { logger, random: options.random });
    const table = commitScheduleTable(build, {
      homeDir,
      docker: config.docker,
      logger,
    });
    scheduler.load(table);

    try {
      tracker.syncJobs(table.entries);
    } catch (err) {
      logger.error({ err }, 'Failed to sync jobs table');
    }

    return { jobs: table.entries.length, skipped: build.skipped.length };
  }

  async function stop(): Promise<void> {
    logger.info('Stopping runner');

    for (const [signal, handler] of signalHandlers.splice(0)) {
      process.off(signal, handler);
    }

    if (maintenance) {
      maintenance.stop();
      maintenance = null;
    }

    if (server) {
      await server.close();
      server = null;
      boundAddress = null;
      logger.info('API server stopped');
    }

    if (scheduler) {
      await scheduler.stop();
      logger.info('Scheduler stopped');
    }

    if (db) {
      closeConnection(db);
      db = null;
      logger.info('Database closed');
    }
  }

  function installSignalHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Received shutdown signal');
      await stop();
      process.exit(0);
    };

    const handlers: Array<[NodeJS.Signals, () => void]> = [
      ['SIGTERM', () => void shutdown('SIGTERM')],
      ['SIGINT', () => void shutdown('SIGINT')],
      [
        'SIGHUP',
        () => {
          try {
            logger.info(rebuild(), 'Reloaded on SIGHUP');
          } catch (err) {
            logger.error({ err }, 'Reload failed');
          }
        },
      ],
    ];
    for (const [signal, handler] of handlers) {
      process.on(signal, handler);
      signalHandlers.push([signal, handler]);
    }
  }

  async function start(): Promise<void> {
    logger.info('Starting runner');

    homeDir = ensureHomeDir(config.homeDir);

    // Database
    const dbPath = resolveDbPath(config);
    db = await createConnection(dbPath);
    runMigrations(db);
    tracker = createExecutionTracker(db);
    const interrupted = tracker.closeInterrupted();
    if (interrupted > 0) {
      logger.warn(
        { interrupted },
        'Closed executions left open by a previous run',
      );
    }
    logger.info({ dbPath }, 'Database ready');

    // Maintenance (execution retention pruning)
    maintenance = createMaintenance(
      db,
      {
        runRetentionDays: config.runRetentionDays,
        runRetentionCount: config.runRetentionCount,
        intervalMs: config.maintenanceIntervalMs,
      },
      logger,
    );
    maintenance.start();

    // Scheduler
    scheduler = createScheduler({
      tracker,
      executor:
        options.executor ??
        createProcessExecutor({
          shell: config.shell,
          docker: config.docker,
          previewBytes: config.previewBytes,
        }),
      logger,
      shutdownGraceMs: config.shutdownGraceMs,
    });

    rebuild();

    const onstart = scheduler.runOnstart();
    if (onstart.length > 0) {
      logger.info({ count: onstart.length }, 'Onstart jobs dispatched');
    }
    scheduler.start();

    // API server
    server = createServer(config, { tracker, scheduler, reload: rebuild });
    boundAddress = await server.listen({
      port: config.port,
      host: config.host,
    });
    logger.info({ address: boundAddress }, 'API server listening');

    if (options.handleSignals ?? true) installSignalHandlers();
  }

  return {
    async start(): Promise<void> {
      try {
        await start();
      } catch (err) {
        await stop();
        throw err;
      }
    },

    stop,

    reload(): ReloadSummary {
      return rebuild();
    },

    address(): string | null {
      return boundAddress;
    },

    getScheduler(): Scheduler | null {
      return scheduler;
    },

    getTracker(): ExecutionTracker | null {
      return tracker;
    },
  };
}
