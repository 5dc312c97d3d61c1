/**
 * Schedule table snapshot. Built once per job set build, immutable afterwards,
 * swapped wholesale on reload.
 */

import { Cron } from 'croner';
import type { Logger } from 'pino';

import type { ExecutableUnit } from '../compiler/compiler.js';

/** One schedule binding. */
export interface ScheduleEntry {
  /** Script identifier, also the job name used for tracking. */
  readonly name: string;
  readonly cron: string;
  readonly comment: string | null;
  readonly scriptPath: string;
  readonly unit: ExecutableUnit;
  /** Parsed cron pattern; null when the expression cannot fire. */
  readonly pattern: Cron | null;
}

/** Immutable schedule snapshot. */
export interface ScheduleTable {
  readonly builtAt: Date;
  readonly entries: readonly ScheduleEntry[];
  /** Names of entries whose cron expression can never fire. */
  readonly unschedulable: readonly string[];
  get(name: string): ScheduleEntry | undefined;
}

/** Table construction options. */
export interface ScheduleTableOptions {
  /** Script location for a unit. */
  scriptPath: (unit: ExecutableUnit) => string;
  logger: Logger;
  builtAt?: Date;
}

/** Parse a 5-field cron expression; null when it is malformed. */
export function compilePattern(cron: string): Cron | null {
  if (cron.trim().split(/\s+/).length !== 5) return null;
  try {
    return new Cron(cron, { paused: true });
  } catch {
    return null;
  }
}

/** Whether the entry fires in the minute containing `now`. */
export function isDue(entry: ScheduleEntry, now: Date): boolean {
  if (!entry.pattern) return false;
  const minute = Math.floor(now.getTime() / 60000) * 60000;
  const next = entry.pattern.nextRun(new Date(minute - 1000));
  return next !== null && next.getTime() === minute;
}

/** Next fire time after `from`, or null. */
export function nextRun(entry: ScheduleEntry, from = new Date()): Date | null {
  return entry.pattern ? entry.pattern.nextRun(from) : null;
}

/** Build a frozen schedule table from compiled units. */
export function createScheduleTable(
  units: readonly ExecutableUnit[],
  options: ScheduleTableOptions,
): ScheduleTable {
  const { logger } = options;
  const unschedulable: string[] = [];

  const entries = units.map((unit): ScheduleEntry => {
    const pattern = compilePattern(unit.cron);
    if (!pattern) {
      unschedulable.push(unit.id);
      logger.warn(
        { job: unit.id, cron: unit.cron },
        'Cron expression cannot be parsed, job will never fire on schedule',
      );
    }
    return Object.freeze({
      name: unit.id,
      cron: unit.cron,
      comment: unit.comment,
      scriptPath: options.scriptPath(unit),
      unit,
      pattern,
    });
  });

  const byName = new Map(entries.map((entry) => [entry.name, entry] as const));

  return Object.freeze({
    builtAt: options.builtAt ?? new Date(),
    entries: Object.freeze(entries),
    unschedulable: Object.freeze(unschedulable),
    get(name: string): ScheduleEntry | undefined {
      return byName.get(name);
    },
  });
}

/** Table with no entries, live before the first build. */
export function emptyScheduleTable(logger: Logger): ScheduleTable {
  return createScheduleTable([], { scriptPath: () => '', logger });
}
