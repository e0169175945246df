import { AgentRecord, Stage, TaskRecord, TaskStatus } from '../../types';
import { Notification } from '../notifications/Notification';

/**
 * Payload type for every domain event, keyed by event name.
 */
export interface TypedEventMap {
  // Task events
  'task:created': TaskRecord;
  'task:updated': { task: TaskRecord; from: TaskStatus };
  'task:deprecated': { task: TaskRecord; supersededBy: string };

  // Queue events
  'queue:enqueued': { taskId: string; stage: Stage };
  'queue:claimed': { taskId: string; stage: Stage; agentId: string };
  'queue:advanced': { taskId: string; from: Stage; to: Stage | 'complete' };
  'queue:failed': { taskId: string; stage: Stage; reason: string; retries: number };
  'queue:dead_lettered': { taskId: string; stage: Stage; reason: string };
  'queue:recovered': { taskId: string; stage: Stage; ageMs: number };
  'queue:paused': { stage: Stage; reason?: string };
  'queue:resumed': { stage: Stage };

  // Agent events
  'agent:heartbeat': AgentRecord;
  'agent:down': { agentId: string; lastActivity: string | null };

  // Notification events
  'notification:delivered': Notification | { id: string; type: string };
}

export type EventName = keyof TypedEventMap;

/**
 * Get the payload type for a specific event name.
 */
export type EventPayload<K extends EventName> = TypedEventMap[K];

export const EVENT_NAMES: readonly EventName[] = [
  'task:created',
  'task:updated',
  'task:deprecated',
  'queue:enqueued',
  'queue:claimed',
  'queue:advanced',
  'queue:failed',
  'queue:dead_lettered',
  'queue:recovered',
  'queue:paused',
  'queue:resumed',
  'agent:heartbeat',
  'agent:down',
  'notification:delivered',
];
