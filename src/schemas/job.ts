/**
 * Job definition schema and types.
 *
 * @module
 */

import { z } from 'zod';

/** Reserved job set key whose record is merged into every job. */
export const SHARED_SETTINGS_KEY = '~~shared-settings';

/** Trigger entry. Only the action fields are meaningful. */
export const triggerSchema = z.object({
  /** Command to run. Entries without one are skipped. */
  command: z.string().nullish(),
  /** Image for a fresh container run. */
  image: z.string().nullish(),
  /** Running container for an exec. */
  container: z.string().nullish(),
  /** Flags passed through to the container CLI. */
  dockerargs: z.string().nullish(),
});

/** Declarative job definition, after shared settings are merged. */
export const jobDefinitionSchema = z.object({
  /** Job name. Defaults to the job set key. */
  name: z.string().nullish(),
  /** Free-form annotation, written as a comment line in the schedule file. */
  comment: z.string().nullish(),
  /** Schedule expression or shortcut. */
  schedule: z.string().nullish(),
  /** Command to run. */
  command: z.string().nullish(),
  /** Image for a fresh container run. Takes precedence over container. */
  image: z.string().nullish(),
  /** Running container for an exec. */
  container: z.string().nullish(),
  /** Flags passed through to the container CLI. */
  dockerargs: z.string().nullish(),
  /** Environment entries, one --env flag each. */
  environment: z.array(z.string()).nullish(),
  /** Exposed ports, one --expose flag each. */
  expose: z.array(z.string()).nullish(),
  /** Networks, one --network flag each. */
  networks: z.array(z.string()).nullish(),
  /** Published ports, one --publish flag each. */
  ports: z.array(z.string()).nullish(),
  /** Volumes, one --volume flag each. */
  volumes: z.array(z.string()).nullish(),
  /** Actions run after the primary action, in order. */
  trigger: z.array(triggerSchema).nullish(),
  /** Whether to run once right after the schedule is built. */
  onstart: z.boolean().default(false),
});

/** Canonical job set: arbitrary key to raw definition. */
export const jobSetSchema = z.record(z.string(), z.unknown());

export type TriggerDefinition = z.infer<typeof triggerSchema>;
export type JobDefinition = z.infer<typeof jobDefinitionSchema>;
export type JobSet = z.infer<typeof jobSetSchema>;
