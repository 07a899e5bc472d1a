import { z } from 'zod';

/**
 * Pipeline stages in execution order. `done` and `failed` are terminal.
 */
export const jobStageSchema = z.enum([
  'received',
  'generating',
  'provisioning',
  'publishing',
  'polling',
  'reporting',
  'done',
  'failed',
]);

export const jobStatusSchema = z.object({
  jobId: z.string(),
  taskId: z.string(),
  stage: jobStageSchema,
  createdAt: z.string(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  repoUrl: z.string().optional(),
  commitSha: z.string().optional(),
  pagesUrl: z.string().optional(),
  artifactSource: z.enum(['producer', 'fallback']).optional(),
  publicationConfirmed: z.boolean().optional(),
  pagesReady: z.boolean().optional(),
  callbackDelivered: z.boolean().optional(),
  error: z.string().optional(),
});

export type JobStage = z.infer<typeof jobStageSchema>;
export type JobStatus = z.infer<typeof jobStatusSchema>;

export const TERMINAL_STAGES: ReadonlySet<JobStage> = new Set(['done', 'failed']);
