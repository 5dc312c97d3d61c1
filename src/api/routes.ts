/**
 * Fastify API routes: job list, execution history, manual triggers, stats and
 * reload.
 */

import type { FastifyInstance } from 'fastify';

import { describeAction } from '../compiler/actions.js';
import type { Scheduler } from '../scheduler/scheduler.js';
import { JobNotFoundError } from '../scheduler/scheduler.js';
import { nextRun } from '../scheduler/schedule-table.js';
import type { ExecutionRecord } from '../schemas/execution.js';
import type { ExecutionTracker } from '../tracker/execution-tracker.js';

/** Result of a reload request. */
export interface ReloadSummary {
  jobs: number;
  skipped: number;
}

/** Route dependencies. */
export interface RouteDeps {
  tracker: ExecutionTracker;
  scheduler: Scheduler;
  /** Rebuild and swap the schedule table. */
  reload?: () => ReloadSummary;
  /** Manual trigger limit per job. */
  triggerLimit?: { max: number; windowMs: number };
  clock?: () => Date;
}

/** Job names accepted in paths. */
export const JOB_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 1000;

/** Parse the `limit` query parameter, clamped to [1, 1000]. */
export function parseLimit(value: string | undefined): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  if (Number.isNaN(parsed)) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, parsed));
}

/** Sliding-window counter keyed by job name. */
export function createTriggerLimiter(max: number, windowMs: number) {
  const hits = new Map<string, number[]>();
  return {
    /** Record a hit at `now`; false when the limit is already reached. */
    take(key: string, now: number): boolean {
      const recent = (hits.get(key) ?? []).filter((t) => now - t < windowMs);
      if (recent.length >= max) {
        hits.set(key, recent);
        return false;
      }
      recent.push(now);
      hits.set(key, recent);
      return true;
    },
  };
}

function executionSummary(record: ExecutionRecord) {
  return {
    id: record.id,
    job_name: record.jobName,
    start_time: record.startTime,
    end_time: record.endTime ?? null,
    duration_seconds: record.durationSeconds ?? null,
    exit_code: record.exitCode ?? null,
    triggered_by: record.triggeredBy,
    stdout_preview: record.stdoutPreview ?? null,
    stderr_preview: record.stderrPreview ?? null,
  };
}

/**
 * Register all API routes on the Fastify instance.
 */
export function registerRoutes(app: FastifyInstance, deps: RouteDeps): void {
  const { tracker, scheduler } = deps;
  const clock = deps.clock ?? (() => new Date());
  const limit = deps.triggerLimit ?? { max: 5, windowMs: 60000 };
  const limiter = createTriggerLimiter(limit.max, limit.windowMs);

  function jobSummary(name: string) {
    const job = tracker.getJob(name);
    if (!job) return null;
    const entry = scheduler.getTable().get(name);
    const next = entry ? nextRun(entry, clock()) : null;
    return {
      name: job.name,
      display_name: job.displayName,
      comment: job.comment,
      command: job.command,
      schedule: job.schedule,
      cron: job.cron,
      next_run: next ? next.toISOString() : null,
      last_run: job.lastRun,
      status: job.status,
    };
  }

  /** GET /health — Health check. */
  app.get('/health', () => {
    return {
      ok: true,
      uptime: process.uptime(),
      jobs: scheduler.getTable().entries.length,
    };
  });

  /** GET /stats — Aggregate execution statistics. */
  app.get('/stats', () => {
    const stats = tracker.stats();
    return {
      total_jobs: stats.totalJobs,
      active_jobs: stats.activeJobs,
      recent_failures: stats.recentFailures,
      last_24h_executions: stats.last24hExecutions,
      total_executions: stats.totalExecutions,
    };
  });

  /** GET /jobs — All jobs ordered by name. */
  app.get('/jobs', () => {
    return tracker
      .listJobs()
      .map((job) => jobSummary(job.name))
      .filter((job) => job !== null);
  });

  /** GET /jobs/:name — Single job detail. */
  app.get<{ Params: { name: string } }>('/jobs/:name', (request, reply) => {
    const job = jobSummary(request.params.name);
    if (!job) {
      reply.code(404);
      return { error: 'Job not found' };
    }
    return job;
  });

  /** GET /executions/id/:id — Single execution. */
  app.get<{ Params: { id: string } }>(
    '/executions/id/:id',
    (request, reply) => {
      const id = Number(request.params.id);
      const record = Number.isInteger(id) ? tracker.getExecution(id) : null;
      if (!record) {
        reply.code(404);
        return { error: 'Execution not found' };
      }
      return {
        ...executionSummary(record),
        stdout_size: record.stdoutSize ?? null,
        stderr_size: record.stderrSize ?? null,
      };
    },
  );

  /** GET /executions/:jobName — Recent executions, newest first. */
  app.get<{ Params: { jobName: string }; Querystring: { limit?: string } }>(
    '/executions/:jobName',
    (request, reply) => {
      const { jobName } = request.params;
      if (!JOB_NAME_PATTERN.test(jobName)) {
        reply.code(400);
        return { error: 'Invalid job name' };
      }
      return tracker
        .query(jobName, parseLimit(request.query.limit))
        .map(executionSummary);
    },
  );

  /** POST /trigger/:jobName — Manual dispatch. */
  app.post<{ Params: { jobName: string } }>(
    '/trigger/:jobName',
    (request, reply) => {
      const { jobName } = request.params;
      if (!JOB_NAME_PATTERN.test(jobName)) {
        reply.code(400);
        return { error: 'Invalid job name' };
      }
      if (!scheduler.getTable().get(jobName)) {
        reply.code(404);
        return { error: `Job not found: ${jobName}` };
      }

      const now = clock();
      if (!limiter.take(jobName, now.getTime())) {
        reply.code(429);
        return { error: 'Too many triggers, try again later' };
      }

      try {
        const { executionId } = scheduler.triggerJob(jobName);
        return {
          status: 'triggered',
          job: jobName,
          execution_id: executionId,
          timestamp: now.toISOString(),
        };
      } catch (err) {
        if (err instanceof JobNotFoundError) {
          reply.code(404);
          return { error: err.message };
        }
        throw err;
      }
    },
  );

  /** POST /reload — Rebuild the schedule table from the job set. */
  app.post('/reload', (_request, reply) => {
    if (!deps.reload) {
      reply.code(501);
      return { ok: false, error: 'Reload not available' };
    }
    try {
      return { ok: true, ...deps.reload() };
    } catch (err) {
      reply.code(500);
      return {
        ok: false,
        error: err instanceof Error ? err.message : 'Unknown error',
      };
    }
  });
}
