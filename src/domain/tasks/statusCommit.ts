import { TaskRecord } from '../../types';

/**
 * Marker carried by commits that the task state manager generates for the artifact.
 */
export const SYSTEM_STATUS_SENTINEL = '[system-status-update]';

export function statusCommitMessage(task: Pick<TaskRecord, 'id' | 'status'>): string {
  return `chore(status): ${task.id} -> ${task.status} ${SYSTEM_STATUS_SENTINEL}`;
}

export function isSystemStatusCommit(message: string): boolean {
  return message.includes(SYSTEM_STATUS_SENTINEL);
}

export function artifactSyncCommitMessage(): string {
  return `chore(status): sync task artifact ${SYSTEM_STATUS_SENTINEL}`;
}
