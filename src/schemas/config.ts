/**
 * Runner configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal, silent). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  /** Optional log file path. */
  file: z.string().optional(),
});

/** Manual trigger rate limit sub-schema. */
const triggerLimitSchema = z.object({
  /** Maximum manual triggers per job inside one window. */
  max: z.number().int().positive().default(5),
  /** Window length in milliseconds. */
  windowMs: z.number().int().positive().default(60000),
});

/** Full runner configuration schema. Validates and provides defaults. */
export const runnerConfigSchema = z.object({
  /** Home directory holding the job set file, the schedule file and generated scripts. */
  homeDir: z.string().default('./data'),
  /** Explicit job set file. Defaults to config.json, config.yml or config.yaml in homeDir. */
  jobsFile: z.string().optional(),
  /** Path to SQLite database file. Defaults to cronbox.sqlite in homeDir. */
  dbPath: z.string().optional(),
  /** HTTP server port for the query API. */
  port: z.number().int().min(0).default(8080),
  /** HTTP server bind address. */
  host: z.string().default('127.0.0.1'),
  /** Shell used for direct command actions. */
  shell: z.string().default('bash'),
  /** Container CLI used for run and exec actions. */
  docker: z.string().default('docker'),
  /** Maximum bytes of stdout/stderr kept per execution record. */
  previewBytes: z.number().int().positive().default(10240),
  /** Number of days to retain execution records. */
  runRetentionDays: z.number().int().positive().default(30),
  /** Number of most recent execution records always kept. */
  runRetentionCount: z.number().int().nonnegative().default(1000),
  /** Interval in milliseconds between maintenance runs. */
  maintenanceIntervalMs: z.number().int().positive().default(3600000),
  /** Grace period in milliseconds for in-flight units on shutdown. */
  shutdownGraceMs: z.number().int().nonnegative().default(5000),
  /** Manual trigger rate limit. */
  triggerLimit: triggerLimitSchema.default({ max: 5, windowMs: 60000 }),
  /** Logging configuration. */
  log: logSchema.default({ level: 'info' }),
});

/** Inferred runner configuration type. */
export type RunnerConfig = z.infer<typeof runnerConfigSchema>;
