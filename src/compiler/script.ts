/**
 * Renders an executable unit as a standalone bash script, the on-disk form of a
 * scheduled job.
 */

import { quote } from 'shell-quote';

import type { Action } from './actions.js';
import { containerArgs } from './actions.js';
import type { ExecutableUnit } from './compiler.js';

/** Script settings. */
export interface ScriptOptions {
  /** Container CLI binary. */
  docker?: string;
}

/** Start marker printed before the primary action. */
export function startMarker(id: string): string {
  return `start cron job __${id}__`;
}

/** End marker printed after the last trigger. */
export function endMarker(id: string): string {
  return `end cron job __${id}__`;
}

/** One shell line for an action. */
function renderAction(action: Action, docker: string): string {
  if (action.kind === 'command') return action.command;
  return quote([docker, ...containerArgs(action)]);
}

/**
 * Render the unit. The primary action runs under `set -e` and its status
 * becomes the script's exit status; triggers always run and only surface a
 * failure when the primary succeeded.
 */
export function renderScript(
  unit: ExecutableUnit,
  options: ScriptOptions = {},
): string {
  const docker = options.docker ?? 'docker';
  const lines = [
    '#!/usr/bin/env bash',
    '',
    `echo ${quote([startMarker(unit.id)])}`,
    // A subshell on the left of `||` would ignore `set -e`.
    '(',
    'set -e',
    renderAction(unit.primary, docker),
    ')',
    'status=$?',
  ];

  for (const trigger of unit.triggers) {
    lines.push(
      `( ${renderAction(trigger, docker)} ) || { rc=$?; [ "$status" -eq 0 ] && status=$rc; }`,
    );
  }

  lines.push(`echo ${quote([endMarker(unit.id)])}`, 'exit "$status"', '');
  return lines.join('\n');
}
