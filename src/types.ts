// Tasks

/**
 * Lifecycle of a task (PRP). `complete` and `deprecated` are terminal.
 */
export type TaskStatus =
  | 'new'
  | 'assigned'
  | 'in_progress'
  | 'validation'
  | 'integration'
  | 'complete'
  | 'deprecated';

export const TASK_STATUSES: readonly TaskStatus[] = [
  'new',
  'assigned',
  'in_progress',
  'validation',
  'integration',
  'complete',
  'deprecated',
] as const;

export interface TaskRecord {
  /** Display id. For migrated tasks this is the legacy id. */
  id: string;
  /** Immutable id assigned once at creation or migration. */
  stableId: string;
  legacyId: string | null;
  title: string;
  status: TaskStatus;
  priority: string;
  /** Agent id, or null while unassigned. */
  owner: string | null;
  dependencies: string[];
  retries: number;
  lastError: string | null;
  commitSha: string | null;
  deprecated: boolean;
  supersededBy: string | null;
  createdAt: string;
  updatedAt: string;
  assignedAt: string | null;
  devStartedAt: string | null;
  validationStartedAt: string | null;
  integrationStartedAt: string | null;
  completedAt: string | null;
  migratedAt: string | null;
  deadLetteredAt: string | null;
}

export interface CreateTaskPayload {
  id: string;
  title?: string;
  priority?: string;
  dependencies?: string[];
}

export interface TaskFilter {
  status?: TaskStatus;
  owner?: string;
}

// Pipeline

/**
 * Ordered processing queues.
 */
export type Stage = 'new' | 'dev' | 'validation' | 'integration';

export const STAGES: readonly Stage[] = ['new', 'dev', 'validation', 'integration'] as const;

/**
 * Last in-flight status before `complete`; truncates the stage list.
 */
export type PipelineDepth = 'development' | 'validation' | 'integration';

export type QueueLocation =
  | { list: 'pending'; stage: Stage }
  | { list: 'inflight'; stage: Stage }
  | { list: 'dead_letter' };

export type EnqueueResult =
  | { kind: 'enqueued'; taskId: string; stage: Stage }
  | { kind: 'noop'; taskId: string; location: QueueLocation | null };

export type ClaimResult =
  | { kind: 'claimed'; taskId: string; stage: Stage }
  | { kind: 'timeout'; stage: Stage };

export type CompleteResult =
  | { kind: 'advanced'; taskId: string; from: Stage; to: Stage }
  | { kind: 'completed'; taskId: string; from: Stage }
  | { kind: 'noop'; taskId: string; location: QueueLocation | null };

export type FailResult =
  | { kind: 'retried'; taskId: string; stage: Stage; retries: number }
  | { kind: 'dead_lettered'; taskId: string; stage: Stage; retries: number }
  | { kind: 'noop'; taskId: string; location: QueueLocation | null };

export interface RecoveredEntry {
  taskId: string;
  stage: Stage;
  ageMs: number;
}

export interface TransitionLogEntry {
  taskId: string;
  from: string;
  to: string;
  at: string;
  reason?: string;
}

export interface StageStats {
  stage: Stage;
  pending: number;
  inflight: number;
  paused: boolean;
}

export interface QueueStats {
  stages: StageStats[];
  deadLetter: number;
}

// Agents

export type AgentStatus = 'active' | 'busy' | 'idle' | 'error' | 'unknown';

export interface AgentRecord {
  id: string;
  status: AgentStatus;
  currentTask: string | null;
  /** ISO timestamp of the last heartbeat, null if none was ever recorded. */
  lastActivity: string | null;
  registeredAt: string;
}

export interface HeartbeatPayload {
  status?: AgentStatus;
  currentTask?: string | null;
}

/**
 * Health derived from heartbeat age.
 */
export type AgentHealth = 'active' | 'idle' | 'stale' | 'unknown';

// Commit gate

export interface CommitProposal {
  message: string;
  files: string[];
  commitSha?: string;
}
