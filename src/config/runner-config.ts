/**
 * Runner config loading: JSON file validated against runnerConfigSchema, with
 * environment overrides.
 *
 * @module
 */

import { accessSync, constants, mkdirSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { RunnerConfig } from '../schemas/config.js';
import { runnerConfigSchema } from '../schemas/config.js';
import { StartupError } from './errors.js';

/** Format zod issues as `path: message` pairs. */
function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load runner config. Without a path every field takes its default. `HOME_DIR`
 * in `env` overrides `homeDir`.
 */
export function loadRunnerConfig(
  path?: string,
  env: NodeJS.ProcessEnv = process.env,
): RunnerConfig {
  let raw: unknown = {};
  if (path) {
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new StartupError(
        `Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  const parsed = runnerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StartupError(
      `Invalid config: ${formatIssues(parsed.error.issues)}`,
    );
  }

  const config = parsed.data;
  if (env.HOME_DIR) config.homeDir = env.HOME_DIR;
  return config;
}

/** Database location: explicit dbPath, else cronbox.sqlite under homeDir. */
export function resolveDbPath(config: RunnerConfig): string {
  return config.dbPath ?? join(config.homeDir, 'cronbox.sqlite');
}

/** Create the home directory if needed and fail unless it is writable. */
export function ensureHomeDir(homeDir: string): string {
  const dir = resolve(homeDir);
  try {
    mkdirSync(dir, { recursive: true });
    accessSync(dir, constants.W_OK);
  } catch (err) {
    throw new StartupError(`Home directory ${dir} is not writable`, {
      cause: err,
    });
  }
  return dir;
}
