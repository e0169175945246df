import { NotificationFormatError } from '../common/Errors';
import { ILogger } from '../common/ILogger';
import { Notification, RawNotification, isNotificationType, notificationSchema } from './Notification';

function assertNever(value: never): never {
  throw new Error(`Unhandled notification: ${JSON.stringify(value)}`);
}

/**
 * One console line for a notification of a known type.
 */
export function formatKnown(notification: Notification): string {
  switch (notification.type) {
    case 'system': {
      const { message, severity } = notification.payload;
      return `SYSTEM${severity ? ` [${severity.toUpperCase()}]` : ''}: ${message}`;
    }
    case 'new_task': {
      const { taskId, title, priority } = notification.payload;
      return `NEW TASK: ${taskId}${title ? ` - ${title}` : ''}${priority ? ` (priority ${priority})` : ''}`;
    }
    case 'agent_down': {
      const { agentId, lastActivity, currentTask } = notification.payload;
      return `AGENT DOWN: ${agentId} - last activity ${lastActivity ?? 'never'}${currentTask ? `, was working on ${currentTask}` : ''}`;
    }
    case 'bulk_enqueue': {
      const { taskIds, stage } = notification.payload;
      return `BULK ENQUEUE: ${taskIds.length} task(s) queued to ${stage}: ${taskIds.join(', ')}`;
    }
    case 'deployment_failed': {
      const { taskId, error } = notification.payload;
      return `DEPLOYMENT FAILED: ${taskId} - ${error}. Integration queue paused`;
    }
    case 'scaling_needed': {
      const { stage, depth, threshold } = notification.payload;
      return `SCALING NEEDED: ${stage} queue depth ${depth} (threshold ${threshold})`;
    }
    case 'progress_report': {
      const { queues, activeTasks, deadLetter } = notification.payload;
      const depths = Object.entries(queues).map(([stage, depth]) => `${stage}=${depth}`).join(', ');
      return `PROGRESS: ${depths} | active ${activeTasks}${deadLetter !== undefined ? ` | dead-letter ${deadLetter}` : ''}`;
    }
    case 'qa_handled': {
      const { agentId, question, answer, taskId } = notification.payload;
      return `Q&A: ${agentId}${taskId ? ` (${taskId})` : ''} asked: ${question} | answer: ${answer}`;
    }
    default:
      return assertNever(notification);
  }
}

/**
 * Fallback line for unknown types and malformed payloads.
 */
export function formatGeneric(raw: RawNotification): string {
  let payload: string;
  try {
    payload = JSON.stringify(raw.payload) ?? String(raw.payload);
  } catch {
    payload = String(raw.payload);
  }
  return `NOTIFICATION [${raw.type}]: ${payload}`;
}

/**
 * Format any pending notification. Never throws: a payload that does not match its
 * declared type is logged and rendered with the generic formatter.
 */
export function formatNotification(raw: RawNotification, logger?: ILogger): string {
  if (!isNotificationType(raw.type)) {
    return formatGeneric(raw);
  }

  const parsed = notificationSchema.safeParse({ ...raw, timestamp: raw.timestamp ?? '' });
  if (!parsed.success) {
    const error = new NotificationFormatError(raw.type, parsed.error.issues);
    logger?.warn(error.message, { notificationId: raw.id, issues: parsed.error.issues.map(i => i.message) });
    return formatGeneric(raw);
  }

  return formatKnown(parsed.data);
}
