import { TaskStatus } from '../../types';

/**
 * One task as it appears in the persisted artifact.
 */
export interface TaskArtifactEntry {
  status: TaskStatus;
  priority: string;
  stable_id: string;
  legacy_id: string | null;
  migrated_at: string | null;
  deprecated?: boolean;
  superseded_by?: string;
}

export type TaskArtifact = Record<string, TaskArtifactEntry>;

/**
 * The version-controlled task artifact. The task state manager is its only writer.
 */
export interface ITaskArtifactRepository {
  /** Repository-relative path, used by the commit gate to spot hand edits. */
  readonly relativePath: string;

  read(): Promise<TaskArtifact>;

  write(artifact: TaskArtifact): Promise<void>;
}
