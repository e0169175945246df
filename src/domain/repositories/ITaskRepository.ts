import { TaskRecord, TaskFilter } from '../../types';

/**
 * Fields of a task record that may change after creation.
 */
export type TaskPatch = Partial<Omit<TaskRecord, 'id' | 'stableId' | 'createdAt'>>;

/**
 * Repository interface for Task Record persistence.
 */
export interface ITaskRepository {
  /**
   * Persist a new task record.
   * @throws {ValidationError} if a record with the same id exists
   */
  create(task: TaskRecord): Promise<TaskRecord>;

  /**
   * Find a task by its display id.
   * @returns The task if found, null otherwise
   */
  findById(id: string): Promise<TaskRecord | null>;

  /**
   * Find tasks with optional filters, ordered by stable id.
   */
  findAll(filter?: TaskFilter): Promise<TaskRecord[]>;

  /**
   * Apply a partial update. `null` clears a field.
   * @throws {NotFoundError} if task not found
   */
  update(id: string, patch: TaskPatch): Promise<TaskRecord>;

  /**
   * Increment the retry counter and return the new value.
   * @throws {NotFoundError} if task not found
   */
  incrementRetries(id: string): Promise<number>;

  count(): Promise<number>;
}
