/**
 * Commits a build to disk: one script per job, then the schedule file, replaced
 * atomically. Returns the in-memory schedule table for the scheduler.
 */

import {
  chmodSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';

import type { Logger } from 'pino';

import { renderScript } from '../compiler/script.js';
import type { ScheduleTable } from '../scheduler/schedule-table.js';
import { createScheduleTable } from '../scheduler/schedule-table.js';
import type { JobSetBuild } from './job-set.js';

/** Commit options. */
export interface CommitOptions {
  /** Home directory; scripts go to `jobs/`, the schedule file to `crontab`. */
  homeDir: string;
  /** Container CLI named in generated scripts. */
  docker?: string;
  logger: Logger;
}

/** Directory holding generated job scripts. */
export function jobsDir(homeDir: string): string {
  return join(homeDir, 'jobs');
}

/** Path of the schedule file. */
export function scheduleFilePath(homeDir: string): string {
  return join(homeDir, 'crontab');
}

/** Render schedule file lines: optional comment lines, then `<cron> <script>`. */
export function renderScheduleFile(table: ScheduleTable): string {
  const lines: string[] = [];
  for (const entry of table.entries) {
    // Every comment line stays a comment.
    const comment = entry.comment ? entry.comment.split(/\r\n|\r|\n/) : [];
    for (const line of comment) {
      lines.push(line ? `# ${line}` : '#');
    }
    lines.push(`${entry.cron} ${entry.scriptPath}`);
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * Write scripts and the schedule file for a build. Scripts of jobs no longer
 * in the build are removed; the old schedule file is replaced, never merged.
 */
export function commitScheduleTable(
  build: JobSetBuild,
  options: CommitOptions,
): ScheduleTable {
  const { homeDir, logger } = options;
  const dir = jobsDir(homeDir);
  mkdirSync(dir, { recursive: true });

  const table = createScheduleTable(build.units, {
    scriptPath: (unit) => join(dir, `${unit.id}.sh`),
    logger,
  });

  const keep = new Set<string>();
  for (const entry of table.entries) {
    writeFileSync(
      entry.scriptPath,
      renderScript(entry.unit, { docker: options.docker }),
      { mode: 0o755 },
    );
    chmodSync(entry.scriptPath, 0o755);
    keep.add(`${entry.name}.sh`);
  }

  for (const file of readdirSync(dir)) {
    if (file.endsWith('.sh') && !keep.has(file)) {
      rmSync(join(dir, file), { force: true });
      logger.debug({ file }, 'Removed stale job script');
    }
  }

  const target = scheduleFilePath(homeDir);
  const temp = `${target}.tmp`;
  writeFileSync(temp, renderScheduleFile(table));
  renameSync(temp, target);

  logger.info(
    { jobs: table.entries.length, skipped: build.skipped.length, path: target },
    'Schedule table committed',
  );

  return table;
}
