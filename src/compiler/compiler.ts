/**
 * Job compiler. Turns one merged job definition into an executable unit: the
 * resolved cron expression, the primary action and the trigger chain.
 */

import type { JobDefinition } from '../schemas/job.js';
import type { Action, Environment } from './actions.js';
import { resolveAction } from './actions.js';
import { resolveIdentifier } from './naming.js';
import type { RandomSource } from './schedule.js';
import { resolveSchedule } from './schedule.js';

/** Compiled, runnable form of a job definition. */
export interface ExecutableUnit {
  /** Script identifier (slug of the name, or a random identifier). */
  id: string;
  /** Job name as declared. */
  name: string;
  /** Schedule as declared. */
  schedule: string;
  /** Resolved 5-field cron expression. */
  cron: string;
  comment: string | null;
  onstart: boolean;
  primary: Action;
  /** Trigger actions in declaration order. */
  triggers: Action[];
}

/** Why a job (or one of its triggers) was left out. */
export interface CompileDiagnostic {
  reason: string;
  definition: unknown;
}

export type CompileResult =
  | { ok: true; unit: ExecutableUnit; skippedTriggers: CompileDiagnostic[] }
  | { ok: false; diagnostic: CompileDiagnostic };

/** Compiler options. */
export interface CompileOptions {
  /** Environment for `$VAR` substitution. Defaults to process.env. */
  env?: Environment;
  /** Random source for `@random` schedules. */
  random?: RandomSource;
  /** Identifiers already used in the job set being built. */
  taken?: ReadonlySet<string>;
  /** Identifier generator for unnamed or colliding jobs. */
  generateId?: () => string;
}

/**
 * Compile one job definition. Skips (with a diagnostic) when the schedule or
 * the primary action is missing; trigger entries without a usable action are
 * dropped individually.
 */
export function compileJob(
  definition: JobDefinition,
  options: CompileOptions = {},
): CompileResult {
  const env = options.env ?? process.env;

  if (definition.schedule == null || !definition.schedule.trim()) {
    return { ok: false, diagnostic: { reason: 'schedule missing', definition } };
  }
  const cron = resolveSchedule(definition.schedule, options.random);

  const primary = resolveAction(definition, env);
  if (!primary.ok) {
    return { ok: false, diagnostic: { reason: primary.reason, definition } };
  }

  const id = resolveIdentifier(
    definition.name,
    options.taken ?? new Set(),
    options.generateId,
  );

  const triggers: Action[] = [];
  const skippedTriggers: CompileDiagnostic[] = [];
  for (const entry of definition.trigger ?? []) {
    if (entry.command == null) {
      skippedTriggers.push({ reason: 'trigger command missing', definition: entry });
      continue;
    }
    const resolved = resolveAction(entry, env);
    if (resolved.ok) {
      triggers.push(resolved.action);
    } else {
      skippedTriggers.push({ reason: resolved.reason, definition: entry });
    }
  }

  return {
    ok: true,
    unit: {
      id,
      name: definition.name ?? id,
      schedule: definition.schedule,
      cron,
      comment: definition.comment ?? null,
      onstart: definition.onstart,
      primary: primary.action,
      triggers,
    },
    skippedTriggers,
  };
}
