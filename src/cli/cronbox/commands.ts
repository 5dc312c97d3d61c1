/**
 * CLI command bodies, kept apart from argument parsing.
 *
 * @module
 */

import { join } from 'node:path';

import type { Logger } from 'pino';

import { jobsDir, renderScheduleFile } from '../../builder/commit.js';
import { buildJobSet } from '../../builder/job-set.js';
import { loadJobSet } from '../../config/job-set-loader.js';
import type { HttpResponse } from '../../lib/http.js';
import { httpRequest } from '../../lib/http.js';
import { createScheduleTable } from '../../scheduler/schedule-table.js';
import type { RunnerConfig } from '../../schemas/config.js';

/** Outcome of `validate`. */
export interface ValidationReport {
  path: string;
  jobs: number;
  skipped: string[];
  /** Schedule file as it would be written. */
  schedule: string;
}

/** Compile the job set and render the schedule without writing anything. */
export function validateJobSet(
  config: RunnerConfig,
  logger: Logger,
): ValidationReport {
  const { path, jobSet } = loadJobSet(config.homeDir, config.jobsFile);
  const build = buildJobSet(jobSet, { logger });
  const dir = jobsDir(config.homeDir);
  const table = createScheduleTable(build.units, {
    scriptPath: (unit) => join(dir, `${unit.id}.sh`),
    logger,
  });
  return {
    path,
    jobs: table.entries.length,
    skipped: build.skipped.map((skip) => `${skip.key}: ${skip.reason}`),
    schedule: renderScheduleFile(table),
  };
}

/** Base URL of the daemon's API. */
export function apiBaseUrl(config: RunnerConfig): string {
  const host = config.host === '0.0.0.0' ? '127.0.0.1' : config.host;
  return `http://${host}:${String(config.port)}`;
}

/** Call the daemon API; throws on non-2xx with the server's error message. */
export async function callApi(
  config: RunnerConfig,
  method: 'GET' | 'POST',
  path: string,
): Promise<unknown> {
  const response: HttpResponse = await httpRequest(
    method,
    `${apiBaseUrl(config)}${path}`,
  );
  if (response.statusCode < 200 || response.statusCode >= 300) {
    const { body } = response;
    const message =
      typeof body === 'object' && body !== null && 'error' in body
        ? String(body.error)
        : String(body);
    throw new Error(`HTTP ${String(response.statusCode)}: ${message}`);
  }
  return response.body;
}
