/**
 * Job set file discovery and parsing (JSON, YAML).
 *
 * @module
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname, join } from 'node:path';

import { load as loadYaml } from 'js-yaml';

import type { JobSet } from '../schemas/job.js';
import { jobSetSchema } from '../schemas/job.js';
import { StartupError } from './errors.js';

/** Candidate job set files in homeDir, in lookup order. */
export const JOB_SET_FILES = ['config.json', 'config.yml', 'config.yaml'];

/** Loaded job set and where it came from. */
export interface LoadedJobSet {
  path: string;
  jobSet: JobSet;
}

/** Locate the job set file: the explicit path, else the first candidate present. */
export function findJobSetFile(homeDir: string, explicit?: string): string {
  if (explicit) {
    if (!existsSync(explicit)) {
      throw new StartupError(`Job set file not found: ${explicit}`);
    }
    return explicit;
  }

  const found = JOB_SET_FILES.map((file) => join(homeDir, file)).find((path) =>
    existsSync(path),
  );
  if (!found) {
    throw new StartupError(
      `No job set file in ${homeDir} (looked for ${JOB_SET_FILES.join(', ')})`,
    );
  }
  return found;
}

/** Parse job set text. JSON for .json files, YAML otherwise. */
export function parseJobSet(text: string, path: string): JobSet {
  let raw: unknown;
  try {
    raw = extname(path).toLowerCase() === '.json' ? JSON.parse(text) : loadYaml(text);
  } catch (err) {
    throw new StartupError(
      `Cannot parse job set ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  // An empty YAML document is an empty job set.
  if (raw === undefined || raw === null) return {};

  const parsed = jobSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StartupError(`Job set ${path} must be a mapping of job definitions`);
  }
  return parsed.data;
}

/** Find, read and parse the job set. */
export function loadJobSet(homeDir: string, explicit?: string): LoadedJobSet {
  const path = findJobSetFile(homeDir, explicit);
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new StartupError(`Cannot read job set ${path}`, { cause: err });
  }
  return { path, jobSet: parseJobSet(text, path) };
}
