/**
 * Public API exports for cronbox.
 *
 * @module
 */

// Schemas
export type { RunnerConfig } from './schemas/config.js';
export { runnerConfigSchema } from './schemas/config.js';
export type {
  JobDefinition,
  JobSet,
  TriggerDefinition,
} from './schemas/job.js';
export {
  jobDefinitionSchema,
  jobSetSchema,
  SHARED_SETTINGS_KEY,
  triggerSchema,
} from './schemas/job.js';
export type {
  ExecutionRecord,
  JobStatus,
  TriggeredBy,
} from './schemas/execution.js';
export {
  executionRecordSchema,
  jobStatusSchema,
  triggeredBySchema,
} from './schemas/execution.js';

// Compiler
export type { Action, CommandAction, ExecAction, RunAction } from './compiler/actions.js';
export { describeAction, resolveAction } from './compiler/actions.js';
export type {
  CompileDiagnostic,
  CompileResult,
  ExecutableUnit,
} from './compiler/compiler.js';
export { compileJob } from './compiler/compiler.js';
export { resolveSchedule, SCHEDULE_SHORTCUTS } from './compiler/schedule.js';
export { renderScript } from './compiler/script.js';

// Builder
export type { JobSetBuild, SkippedJob } from './builder/job-set.js';
export { buildJobSet, mergeSharedSettings } from './builder/job-set.js';
export { commitScheduleTable, renderScheduleFile } from './builder/commit.js';

// Scheduler
export type {
  ActionResult,
  Executor,
  RunOptions,
} from './scheduler/executor.js';
export { createProcessExecutor } from './scheduler/executor.js';
export type { ScheduleEntry, ScheduleTable } from './scheduler/schedule-table.js';
export { createScheduleTable, isDue, nextRun } from './scheduler/schedule-table.js';
export type { Dispatch, Scheduler } from './scheduler/scheduler.js';
export { createScheduler, JobNotFoundError } from './scheduler/scheduler.js';
export type { UnitResult } from './scheduler/unit-runner.js';
export { runUnit } from './scheduler/unit-runner.js';

// Tracker
export type {
  ExecutionStats,
  ExecutionTracker,
  JobRecord,
} from './tracker/execution-tracker.js';
export { createExecutionTracker } from './tracker/execution-tracker.js';

// Config
export { StartupError } from './config/errors.js';
export { loadJobSet } from './config/job-set-loader.js';
export { loadRunnerConfig } from './config/runner-config.js';

// Runner
export type { Runner, RunnerOptions } from './runner.js';
export { createLogger, createRunner } from './runner.js';
