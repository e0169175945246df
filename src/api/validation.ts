import { z } from 'zod';
import { Response } from 'express';
import { AppError, ValidationError } from '../domain/common/Errors';
import { STAGES, TASK_STATUSES } from '../types';

// --- Reusable patterns ---

// Task and agent ids: alphanumeric plus . _ - : (prevents command injection in the tmux console)
const safeId = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._:-]*$/, 'ID must be alphanumeric with . _ - : only').max(200);

const shortString = z.string().min(1).max(500);
const longString = z.string().min(1).max(10000);
const commitSha = z.string().regex(/^[0-9a-f]{7,40}$/i, 'commit hash must be 7-40 hex characters');

// --- Enums ---

const [firstStatus, ...otherStatuses] = TASK_STATUSES;
const taskStatusSchema = z.enum([firstStatus, ...otherStatuses]);
const [firstStage, ...otherStages] = STAGES;
const stageSchema = z.enum([firstStage, ...otherStages]);
const agentStatusSchema = z.enum(['active', 'busy', 'idle', 'error', 'unknown']);

// --- Param schemas ---

export const idParamSchema = z.object({
  id: safeId,
});

export const stageParamSchema = z.object({
  stage: stageSchema,
});

export const stageAndIdParamSchema = z.object({
  stage: stageSchema,
  id: safeId,
});

// --- Task schemas ---

export const createTaskSchema = z.object({
  id: safeId,
  title: shortString.optional(),
  priority: z.string().min(1).max(50).optional(),
  dependencies: z.array(safeId).optional(),
}).strict();

export const importTasksSchema = z.object({
  tasks: z.array(z.object({
    id: safeId,
    title: shortString.optional(),
    priority: z.string().min(1).max(50).optional(),
    status: taskStatusSchema.optional(),
  }).strict()).min(1),
}).strict();

export const taskQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  owner: safeId.optional(),
}).strict();

export const transitionTaskSchema = z.object({
  status: taskStatusSchema,
  owner: safeId.optional(),
  commitSha: commitSha.optional(),
  supersededBy: safeId.optional(),
}).strict();

export const deprecateTaskSchema = z.object({
  supersededBy: safeId,
}).strict();

export const verifyTaskSchema = z.object({
  commitSha: commitSha.optional(),
}).strict();

// --- Queue schemas ---

export const enqueueSchema = z.object({
  taskId: safeId,
}).strict();

export const bulkEnqueueSchema = z.object({
  taskIds: z.array(safeId).min(1),
}).strict();

export const claimSchema = z.object({
  agentId: safeId,
  timeoutMs: z.number().int().min(0).max(120000).optional(),
}).strict();

export const completeSchema = z.object({
  commitSha: commitSha.optional(),
}).strict();

export const failSchema = z.object({
  reason: longString,
}).strict();

export const recoverSchema = z.object({
  maxAgeMs: z.number().int().min(0).optional(),
}).strict();

export const pauseSchema = z.object({
  reason: shortString.optional(),
}).strict();

export const deploymentFailureSchema = z.object({
  taskId: safeId,
  error: longString,
}).strict();

export const replayQuerySchema = z.object({
  stage: stageSchema.optional(),
}).strict();

export const transitionsQuerySchema = z.object({
  taskId: safeId.optional(),
}).strict();

// --- Agent schemas ---

export const heartbeatSchema = z.object({
  status: agentStatusSchema.optional(),
  currentTask: safeId.nullable().optional(),
}).strict();

// --- Notification schemas ---

export const publishNotificationSchema = z.object({
  id: safeId.optional(),
  type: z.string().min(1).max(100),
  payload: z.unknown(),
  timestamp: z.string().optional(),
}).strict();

// --- Gate schemas ---

export const evaluateCommitSchema = z.object({
  message: longString,
  files: z.array(z.string().min(1).max(1000)).default([]),
  commitSha: commitSha.optional(),
}).strict();

// --- Helpers ---

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      result.error.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
      }))
    );
  }
  return result.data;
}

/**
 * Validate a request body against a Zod schema.
 * @throws {ValidationError} listing every issue
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  return parseWith(schema, body ?? {}, 'request body');
}

export function parseParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.infer<T> {
  return parseWith(schema, params, 'URL parameters');
}

export function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  return parseWith(schema, query, 'query parameters');
}

/**
 * Map an error to its HTTP response.
 */
export function handleError(err: unknown, res: Response) {
  if (err instanceof AppError) {
    return res.status(err.statusCode).json(err.toJSON());
  }
  return res.status(500).json({
    error: true,
    message: err instanceof Error ? err.message : String(err),
    code: 'INTERNAL_ERROR'
  });
}
