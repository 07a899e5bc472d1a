import { z } from 'zod';

/**
 * GitHub repository names: ASCII letters, digits, `.`, `-`, `_`, at most 100
 * characters, and not `.` or `..`.
 */
export const REPOSITORY_NAME_PATTERN = /^[A-Za-z0-9._-]{1,100}$/;

export const repositoryNameSchema = z
  .string()
  .regex(REPOSITORY_NAME_PATTERN, 'must be a valid repository name')
  .refine((name) => name !== '.' && name !== '..', 'must be a valid repository name');

/**
 * Fields a task submission must carry. Used to report every missing field at
 * once before the stricter schema runs.
 */
export const REQUIRED_TASK_FIELDS = ['email', 'task', 'round', 'nonce', 'secret', 'brief'] as const;

/**
 * POST /api-endpoint body
 */
export const taskSubmissionSchema = z.object({
  email: z.string().email(),
  task: repositoryNameSchema,
  round: z.number().int().nonnegative(),
  nonce: z.string().min(1),
  secret: z.string().min(1),
  brief: z.string().min(1),
  evaluation: z
    .object({
      url: z.string().url(),
    })
    .optional(),
});

export const taskAcceptedSchema = z.object({
  status: z.literal('accepted'),
  message: z.string(),
  task: z.string(),
  jobId: z.string(),
  timestamp: z.string(),
});

/**
 * Result record POSTed to the caller's evaluation URL once a job is deployed
 */
export const resultRecordSchema = z.object({
  email: z.string(),
  taskId: z.string(),
  round: z.number(),
  nonce: z.string(),
  repoUrl: z.string(),
  commitSha: z.string(),
  pagesUrl: z.string(),
});

export type TaskSubmission = z.infer<typeof taskSubmissionSchema>;
export type TaskAccepted = z.infer<typeof taskAcceptedSchema>;
export type ResultRecord = z.infer<typeof resultRecordSchema>;
