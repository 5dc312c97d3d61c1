/**
 * Action descriptors. A job's primary action and each trigger resolve to one of
 * three tagged shapes, handed to the executor as data.
 */

import { parse } from 'shell-quote';

import type { JobDefinition } from '../schemas/job.js';

/** Environment used for `$VAR` substitution. */
export type Environment = Readonly<Record<string, string | undefined>>;

/** Shell command run directly on the host. */
export interface CommandAction {
  kind: 'command';
  /** Command line, interpreted by the configured shell. */
  command: string;
}

/** Fresh container started from an image. */
export interface RunAction {
  kind: 'run';
  /** Passthrough dockerargs, split into words. */
  dockerArgs: string[];
  /** Flags rendered from environment, expose, name, networks, ports and volumes. */
  flags: string[];
  /** Image reference after environment substitution. */
  image: string;
  /** Command words appended after the image; empty runs the image default. */
  command: string[];
}

/** Command executed inside a running container. */
export interface ExecAction {
  kind: 'exec';
  /** Passthrough dockerargs, split into words. */
  dockerArgs: string[];
  /** Container reference after environment substitution. */
  container: string;
  /** Command words. */
  command: string[];
}

export type Action = CommandAction | RunAction | ExecAction;

/** Fields that can produce an action (a job definition or a trigger entry). */
export type ActionSource = Partial<
  Pick<
    JobDefinition,
    | 'name'
    | 'command'
    | 'image'
    | 'container'
    | 'dockerargs'
    | 'environment'
    | 'expose'
    | 'networks'
    | 'ports'
    | 'volumes'
  >
>;

/** Outcome of resolving an action source. */
export type ActionResolution =
  | { ok: true; action: Action }
  | { ok: false; reason: string };

const VARIABLE_PATTERN =
  /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/** Replace `$VAR` and `${VAR}` references; unset variables become empty. */
export function substituteEnv(value: string, env: Environment): string {
  return value.replace(
    VARIABLE_PATTERN,
    (_match, braced: string | undefined, bare: string | undefined) =>
      env[braced ?? bare ?? ''] ?? '',
  );
}

/** Split a string into words with shell quoting rules, expanding variables. */
export function splitWords(
  input: string | null | undefined,
  env: Environment,
): string[] {
  if (!input) return [];

  return parse(input, (key: string) => env[key] ?? '').flatMap((entry) => {
    if (typeof entry === 'string') return [entry];
    if ('comment' in entry) return [];
    if (entry.op === 'glob') return [entry.pattern];
    return [entry.op];
  });
}

/** Render one flag per entry, e.g. `--volume a:/a --volume b:/b`. */
function repeatFlag(
  flag: string,
  values: string[] | null | undefined,
  env: Environment,
): string[] {
  return (values ?? []).flatMap((value) => [flag, substituteEnv(value, env)]);
}

/**
 * Resolve an action source. `image` wins over `container`; with neither, the
 * command runs directly.
 */
export function resolveAction(
  source: ActionSource,
  env: Environment,
): ActionResolution {
  const dockerArgs = splitWords(source.dockerargs, env);

  if (source.image != null) {
    const image = substituteEnv(source.image, env).trim();
    if (!image) {
      return { ok: false, reason: 'command missing (image resolved to empty)' };
    }

    const flags = [
      ...repeatFlag('--env', source.environment, env),
      ...repeatFlag('--expose', source.expose, env),
      ...(source.name ? ['--name', source.name] : []),
      ...repeatFlag('--network', source.networks, env),
      ...repeatFlag('--publish', source.ports, env),
      ...repeatFlag('--volume', source.volumes, env),
    ];

    return {
      ok: true,
      action: {
        kind: 'run',
        dockerArgs,
        flags,
        image,
        command: splitWords(source.command, env),
      },
    };
  }

  if (source.container != null) {
    const container = substituteEnv(source.container, env).trim();
    if (!container) {
      return {
        ok: false,
        reason: 'command missing (container resolved to empty)',
      };
    }
    if (source.command == null || !source.command.trim()) {
      return { ok: false, reason: 'command missing for container' };
    }

    return {
      ok: true,
      action: {
        kind: 'exec',
        dockerArgs,
        container,
        command: splitWords(source.command, env),
      },
    };
  }

  if (source.command == null || !source.command.trim()) {
    return { ok: false, reason: 'command missing' };
  }

  return { ok: true, action: { kind: 'command', command: source.command } };
}

/** Arguments for the container CLI (everything after the binary name). */
export function containerArgs(action: RunAction | ExecAction): string[] {
  if (action.kind === 'run') {
    return [
      'run',
      ...action.dockerArgs,
      ...action.flags,
      action.image,
      ...action.command,
    ];
  }
  return ['exec', ...action.dockerArgs, action.container, ...action.command];
}

/** Human-readable command line for logs and the query API. */
export function describeAction(action: Action): string {
  if (action.kind === 'command') return action.command;
  return ['docker', ...containerArgs(action)].join(' ');
}
