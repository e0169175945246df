import { z } from 'zod';

// --- Payload schemas, one per notification type ---

const systemPayload = z.object({
  message: z.string().min(1),
  severity: z.enum(['info', 'warning', 'critical']).optional(),
});

const newTaskPayload = z.object({
  taskId: z.string().min(1),
  title: z.string().optional(),
  priority: z.string().optional(),
});

const agentDownPayload = z.object({
  agentId: z.string().min(1),
  lastActivity: z.string().nullable(),
  currentTask: z.string().nullable().optional(),
});

const bulkEnqueuePayload = z.object({
  taskIds: z.array(z.string()),
  stage: z.string().min(1),
});

const deploymentFailedPayload = z.object({
  taskId: z.string().min(1),
  error: z.string(),
});

const scalingNeededPayload = z.object({
  stage: z.string().min(1),
  depth: z.number().int().nonnegative(),
  threshold: z.number().int().nonnegative(),
});

const progressReportPayload = z.object({
  queues: z.record(z.string(), z.number()),
  activeTasks: z.number().int().nonnegative(),
  deadLetter: z.number().int().nonnegative().optional(),
});

const qaHandledPayload = z.object({
  agentId: z.string().min(1),
  question: z.string(),
  answer: z.string(),
  taskId: z.string().optional(),
});

const envelope = {
  id: z.string().min(1),
  timestamp: z.string(),
};

export const notificationSchema = z.discriminatedUnion('type', [
  z.object({ ...envelope, type: z.literal('system'), payload: systemPayload }),
  z.object({ ...envelope, type: z.literal('new_task'), payload: newTaskPayload }),
  z.object({ ...envelope, type: z.literal('agent_down'), payload: agentDownPayload }),
  z.object({ ...envelope, type: z.literal('bulk_enqueue'), payload: bulkEnqueuePayload }),
  z.object({ ...envelope, type: z.literal('deployment_failed'), payload: deploymentFailedPayload }),
  z.object({ ...envelope, type: z.literal('scaling_needed'), payload: scalingNeededPayload }),
  z.object({ ...envelope, type: z.literal('progress_report'), payload: progressReportPayload }),
  z.object({ ...envelope, type: z.literal('qa_handled'), payload: qaHandledPayload }),
]);

/**
 * A notification of a recognised type with a well-formed payload.
 */
export type Notification = z.infer<typeof notificationSchema>;

export type NotificationType = Notification['type'];

export type NotificationPayload<T extends NotificationType> = Extract<Notification, { type: T }>['payload'];

export const NOTIFICATION_TYPES: readonly NotificationType[] = notificationSchema.options.map(
  option => option.shape.type.value
);

/**
 * Anything read off the pending list: only the envelope is trusted.
 */
export const rawNotificationSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  payload: z.unknown(),
  timestamp: z.string().optional(),
});

export type RawNotification = z.infer<typeof rawNotificationSchema>;

export function isNotificationType(type: string): type is NotificationType {
  return NOTIFICATION_TYPES.some(known => known === type);
}
