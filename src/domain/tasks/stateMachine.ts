import { PipelineDepth, TaskRecord, TaskStatus } from '../../types';

const IN_FLIGHT_ORDER: readonly TaskStatus[] = ['new', 'assigned', 'in_progress', 'validation', 'integration'];

const LAST_IN_FLIGHT: Record<PipelineDepth, TaskStatus> = {
  development: 'in_progress',
  validation: 'validation',
  integration: 'integration',
};

export type StatusTimestampField = keyof Pick<
  TaskRecord,
  'assignedAt' | 'devStartedAt' | 'validationStartedAt' | 'integrationStartedAt' | 'completedAt'
>;

/**
 * Timestamp field stamped when a task enters a status.
 */
export const STATUS_TIMESTAMP: Partial<Record<TaskStatus, StatusTimestampField>> = {
  assigned: 'assignedAt',
  in_progress: 'devStartedAt',
  validation: 'validationStartedAt',
  integration: 'integrationStartedAt',
  complete: 'completedAt',
};

export function isTerminal(status: TaskStatus): boolean {
  return status === 'complete' || status === 'deprecated';
}

/**
 * Status a task must hold for `complete` to be reachable under the given depth.
 */
export function completionSource(depth: PipelineDepth): TaskStatus {
  return LAST_IN_FLIGHT[depth];
}

/**
 * Outgoing edges of `from`. The chain is cut at the depth's last in-flight status,
 * which alone leads to `complete`; every non-terminal status may be deprecated.
 */
export function allowedTransitions(from: TaskStatus, depth: PipelineDepth): TaskStatus[] {
  if (isTerminal(from)) return [];

  const last = completionSource(depth);
  const index = IN_FLIGHT_ORDER.indexOf(from);
  const lastIndex = IN_FLIGHT_ORDER.indexOf(last);
  if (index > lastIndex) {
    // Beyond the configured pipeline: only retirement is possible.
    return ['deprecated'];
  }

  const forward = from === last ? 'complete' : IN_FLIGHT_ORDER[index + 1];
  return [forward, 'deprecated'];
}

export function canTransition(from: TaskStatus, to: TaskStatus, depth: PipelineDepth): boolean {
  return allowedTransitions(from, depth).includes(to);
}

/**
 * Status that precedes `to` on the forward chain, for error hints.
 */
export function requiredPredecessor(to: TaskStatus, depth: PipelineDepth): TaskStatus | null {
  if (to === 'complete') return completionSource(depth);
  const index = IN_FLIGHT_ORDER.indexOf(to);
  return index > 0 ? IN_FLIGHT_ORDER[index - 1] : null;
}
