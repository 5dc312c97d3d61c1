/**
 * Runs an executable unit in process: start marker, primary action, each
 * trigger in order, end marker.
 */

import type { Logger } from 'pino';

import { describeAction } from '../compiler/actions.js';
import type { ExecutableUnit } from '../compiler/compiler.js';
import { endMarker, startMarker } from '../compiler/script.js';
import type { ActionResult, Executor } from './executor.js';

/** Combined outcome of a unit: primary plus triggers. */
export interface UnitResult extends ActionResult {
  /** Exit code of each trigger, in declaration order. */
  triggerExitCodes: number[];
}

/** Append one action's output to the running unit output. */
function join(base: string, next: string): string {
  if (!next) return base;
  if (!base) return next;
  return base.endsWith('\n') ? `${base}${next}` : `${base}\n${next}`;
}

/**
 * Run a unit. The primary stops at its first failing line; triggers run
 * without that rule. Triggers always run; a failing trigger never stops the chain.
 * The unit exit code is the primary's when non-zero, else the first non-zero
 * trigger exit code, else 0.
 */
export async function runUnit(
  unit: ExecutableUnit,
  executor: Executor,
  logger: Logger,
): Promise<UnitResult> {
  const open = `${startMarker(unit.id)}\n`;
  let stdout = open;
  let stderr = '';
  let stdoutSize = Buffer.byteLength(open);
  let stderrSize = 0;

  const primary = await executor.run(unit.primary, { failFast: true });
  stdout = join(stdout, primary.stdout);
  stderr = join(stderr, primary.stderr);
  stdoutSize += primary.stdoutSize;
  stderrSize += primary.stderrSize;

  if (primary.exitCode !== 0) {
    logger.warn(
      { job: unit.id, exitCode: primary.exitCode },
      'Primary action failed',
    );
  }

  let exitCode = primary.exitCode;
  const triggerExitCodes: number[] = [];

  for (const [index, trigger] of unit.triggers.entries()) {
    logger.debug(
      { job: unit.id, trigger: index, action: describeAction(trigger) },
      'Running trigger',
    );
    const result = await executor.run(trigger);
    stdout = join(stdout, result.stdout);
    stderr = join(stderr, result.stderr);
    stdoutSize += result.stdoutSize;
    stderrSize += result.stderrSize;
    triggerExitCodes.push(result.exitCode);

    if (result.exitCode !== 0) {
      logger.warn(
        { job: unit.id, trigger: index, exitCode: result.exitCode },
        'Trigger failed',
      );
      if (exitCode === 0) exitCode = result.exitCode;
    }
  }

  const close = `${endMarker(unit.id)}\n`;
  stdout = join(stdout, close);
  stdoutSize += Buffer.byteLength(close);

  return { exitCode, stdout, stderr, stdoutSize, stderrSize, triggerExitCodes };
}
