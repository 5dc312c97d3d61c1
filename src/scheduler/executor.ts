/**
 * Action executor. Spawns a shell command or a container CLI invocation as a
 * child process and captures bounded previews of its output.
 */

import { spawn } from 'node:child_process';

import type { Action } from '../compiler/actions.js';
import { containerArgs } from '../compiler/actions.js';

/** Outcome of one action. */
export interface ActionResult {
  /** Process exit code; 127 when the process could not be spawned. */
  exitCode: number;
  /** Leading bytes of stdout, with a truncation marker when cut. */
  stdout: string;
  /** Leading bytes of stderr, with a truncation marker when cut. */
  stderr: string;
  /** Total stdout bytes produced. */
  stdoutSize: number;
  /** Total stderr bytes produced. */
  stderrSize: number;
}

/** Per-invocation settings. */
export interface RunOptions {
  /** Stop a multi-line shell command at its first failing line. */
  failFast?: boolean;
}

/** Runs actions. Swapped for a fake in tests. */
export interface Executor {
  run(action: Action, options?: RunOptions): Promise<ActionResult>;
}

/** Process executor options. */
export interface ProcessExecutorOptions {
  /** Shell used for plain command actions. */
  shell?: string;
  /** Container CLI used for run/exec actions. */
  docker?: string;
  /** Preview size in bytes for each output stream. */
  previewBytes?: number;
  /** Extra environment for child processes. */
  env?: NodeJS.ProcessEnv;
}

/** Exit code reported when the process cannot be started. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Length of `bytes` without a trailing incomplete UTF-8 sequence. */
function completeLength(bytes: Buffer): number {
  let start = bytes.length - 1;
  while (
    start >= 0 &&
    bytes.length - start <= 3 &&
    (bytes.readUInt8(start) & 0xc0) === 0x80
  ) {
    start--;
  }
  if (start < 0) return bytes.length;

  const lead = bytes.readUInt8(start);
  const width = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return bytes.length - start < width ? start : bytes.length;
}

/** Keeps the first `limit` bytes of a stream and counts the rest. */
export class OutputBuffer {
  private chunks: Buffer[] = [];
  private kept = 0;
  private total = 0;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    this.total += chunk.length;
    const room = this.limit - this.kept;
    if (room <= 0) return;
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(slice);
    this.kept += slice.length;
  }

  get size(): number {
    return this.total;
  }

  toString(): string {
    const bytes = Buffer.concat(this.chunks);
    if (this.total <= this.kept) return bytes.toString('utf8');
    // The cut can land inside a multi-byte character.
    const text = bytes.subarray(0, completeLength(bytes)).toString('utf8');
    return `${text}\n... (truncated, ${String(this.total)} bytes total)`;
  }
}

/** Command line for an action. */
export function commandLine(
  action: Action,
  shell: string,
  docker: string,
  failFast = false,
): { command: string; args: string[] } {
  if (action.kind !== 'command') {
    return { command: docker, args: containerArgs(action) };
  }
  return {
    command: shell,
    args: failFast ? ['-e', '-c', action.command] : ['-c', action.command],
  };
}

/** Create an executor that spawns real child processes. */
export function createProcessExecutor(
  options: ProcessExecutorOptions = {},
): Executor {
  const shell = options.shell ?? 'bash';
  const docker = options.docker ?? 'docker';
  const previewBytes = options.previewBytes ?? 10240;

  return {
    run(action: Action, runOptions: RunOptions = {}): Promise<ActionResult> {
      return new Promise((resolve) => {
        const stdout = new OutputBuffer(previewBytes);
        const stderr = new OutputBuffer(previewBytes);
        const { command, args } = commandLine(
          action,
          shell,
          docker,
          runOptions.failFast,
        );

        const child = spawn(command, args, {
          env: { ...process.env, ...options.env },
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        let settled = false;
        const finish = (exitCode: number): void => {
          if (settled) return;
          settled = true;
          resolve({
            exitCode,
            stdout: stdout.toString(),
            stderr: stderr.toString(),
            stdoutSize: stdout.size,
            stderrSize: stderr.size,
          });
        };

        child.stdout.on('data', (chunk: Buffer) => {
          stdout.append(chunk);
        });
        child.stderr.on('data', (chunk: Buffer) => {
          stderr.append(chunk);
        });

        child.on('close', (code, signal) => {
          // Killed by a signal: report it the way a shell would.
          finish(code ?? (signal ? 128 : 1));
        });

        child.on('error', (err) => {
          stderr.append(Buffer.from(err.message));
          finish(SPAWN_FAILURE_EXIT_CODE);
        });
      });
    },
  };
}
