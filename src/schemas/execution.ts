/**
 * Execution record schema and types.
 *
 * @module
 */

import { z } from 'zod';

export const triggeredBySchema = z.enum(['cron', 'manual', 'onstart']);

export const jobStatusSchema = z.enum([
  'scheduled',
  'running',
  'completed',
  'failed',
]);

export const executionRecordSchema = z.object({
  id: z.number(),
  jobName: z.string(),
  startTime: z.string(),
  endTime: z.string().optional(),
  durationSeconds: z.number().optional(),
  exitCode: z.number().optional(),
  stdoutPreview: z.string().optional(),
  stderrPreview: z.string().optional(),
  stdoutSize: z.number().optional(),
  stderrSize: z.number().optional(),
  triggeredBy: triggeredBySchema,
});

export type ExecutionRecord = z.infer<typeof executionRecordSchema>;
export type TriggeredBy = z.infer<typeof triggeredBySchema>;
export type JobStatus = z.infer<typeof jobStatusSchema>;
