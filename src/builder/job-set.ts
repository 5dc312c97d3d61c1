/**
 * Job set builder. Merges shared settings into every definition, compiles each
 * job and collects the units that make up the schedule, plus the onstart list.
 */

import type { Logger } from 'pino';

import type { CompileDiagnostic, ExecutableUnit } from '../compiler/compiler.js';
import { compileJob } from '../compiler/compiler.js';
import type { Environment } from '../compiler/actions.js';
import type { RandomSource } from '../compiler/schedule.js';
import type { JobSet } from '../schemas/job.js';
import { jobDefinitionSchema, SHARED_SETTINGS_KEY } from '../schemas/job.js';

/** A job left out of the schedule. */
export interface SkippedJob extends CompileDiagnostic {
  /** Job set key of the definition. */
  key: string;
}

/** Result of one build pass. */
export interface JobSetBuild {
  /** Compiled units in build order. */
  units: ExecutableUnit[];
  /** Units flagged onstart, in build order. */
  onstart: ExecutableUnit[];
  /** Jobs excluded with a diagnostic. */
  skipped: SkippedJob[];
}

/** Builder options. */
export interface BuildOptions {
  logger: Logger;
  env?: Environment;
  random?: RandomSource;
  generateId?: () => string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge shared settings into a definition. The job's own fields win; the job
 * set key becomes the name unless the definition names itself.
 */
export function mergeSharedSettings(
  key: string,
  definition: Record<string, unknown>,
  shared: Record<string, unknown>,
): Record<string, unknown> {
  return { ...shared, name: key, ...definition };
}

/** Job set keys in build order (code-point order, shared settings excluded). */
export function jobKeys(jobSet: JobSet): string[] {
  return Object.keys(jobSet)
    .filter((key) => key !== SHARED_SETTINGS_KEY)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Compile every job in the set. Skips are logged and never stop the batch.
 */
export function buildJobSet(
  jobSet: JobSet,
  options: BuildOptions,
): JobSetBuild {
  const { logger } = options;
  const sharedRaw = jobSet[SHARED_SETTINGS_KEY];
  const shared = isRecord(sharedRaw) ? sharedRaw : {};

  const units: ExecutableUnit[] = [];
  const onstart: ExecutableUnit[] = [];
  const skipped: SkippedJob[] = [];
  const taken = new Set<string>();

  const skip = (key: string, reason: string, definition: unknown): void => {
    skipped.push({ key, reason, definition });
    logger.warn({ job: key, definition }, `'${key}' skipped: ${reason}`);
  };

  for (const key of jobKeys(jobSet)) {
    const raw = jobSet[key];
    if (!isRecord(raw)) {
      skip(key, 'definition is not an object', raw);
      continue;
    }

    const merged = mergeSharedSettings(key, raw, shared);
    const parsed = jobDefinitionSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      skip(key, `invalid definition (${issues})`, merged);
      continue;
    }

    const result = compileJob(parsed.data, {
      env: options.env,
      random: options.random,
      taken,
      generateId: options.generateId,
    });

    if (!result.ok) {
      skip(key, result.diagnostic.reason, result.diagnostic.definition);
      continue;
    }

    for (const trigger of result.skippedTriggers) {
      logger.warn(
        { job: key, trigger: trigger.definition },
        `'${key}' trigger skipped: ${trigger.reason}`,
      );
    }

    const { unit } = result;
    taken.add(unit.id);
    units.push(unit);
    if (unit.onstart) onstart.push(unit);
    logger.debug({ job: unit.id, cron: unit.cron }, 'Compiled job');
  }

  return { units, onstart, skipped };
}
