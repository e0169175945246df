import { TaskRecord, TaskFilter, TaskStatus, TASK_STATUSES } from '../../types';
import { ITaskRepository, TaskPatch } from '../../domain/repositories/ITaskRepository';
import { ICoordinationStore } from '../../domain/store/ICoordinationStore';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';

const TASK_INDEX_KEY = 'tasks:index';

const taskKey = (id: string) => `task:${id}`;

/**
 * Hash field for each record field. Nullable fields are stored by omission.
 */
const FIELD_NAMES: Record<keyof TaskRecord, string> = {
  id: 'id',
  stableId: 'stable_id',
  legacyId: 'legacy_id',
  title: 'title',
  status: 'status',
  priority: 'priority',
  owner: 'owner',
  dependencies: 'dependencies',
  retries: 'retries',
  lastError: 'last_error',
  commitSha: 'commit_sha',
  deprecated: 'deprecated',
  supersededBy: 'superseded_by',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  assignedAt: 'assigned_at',
  devStartedAt: 'dev_started_at',
  validationStartedAt: 'validation_started_at',
  integrationStartedAt: 'integration_started_at',
  completedAt: 'completed_at',
  migratedAt: 'migrated_at',
  deadLetteredAt: 'dead_lettered_at',
};

function encodeValue(value: TaskRecord[keyof TaskRecord]): string | null {
  if (value === null) return null;
  if (Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

function isPatchKey<T extends object>(patch: T, key: string): key is Extract<keyof T, string> {
  return key in patch;
}

function parseStatus(raw: string | undefined, id: string): TaskStatus {
  const status = TASK_STATUSES.find(s => s === raw);
  if (!status) {
    throw new ValidationError(`Task ${id} has unknown status '${raw ?? ''}'`);
  }
  return status;
}

function parseDependencies(raw: string | undefined): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((d): d is string => typeof d === 'string') : [];
}

/**
 * Task records stored as one hash per task in the coordination store.
 */
export class StoreTaskRepository implements ITaskRepository {
  constructor(
    private store: ICoordinationStore,
    private logger: ILogger
  ) {}

  private toHash(patch: TaskPatch | TaskRecord): { set: Record<string, string>; clear: string[] } {
    const set: Record<string, string> = {};
    const clear: string[] = [];
    for (const [key, field] of Object.entries(FIELD_NAMES)) {
      if (!isPatchKey(patch, key)) continue;
      const value = patch[key];
      if (value === undefined) continue;
      const encoded = encodeValue(value);
      if (encoded === null) {
        clear.push(field);
      } else {
        set[field] = encoded;
      }
    }
    return { set, clear };
  }

  private fromHash(hash: Record<string, string>): TaskRecord {
    const id = hash.id;
    const opt = (field: string): string | null => hash[field] ?? null;
    return {
      id,
      stableId: hash.stable_id ?? '',
      legacyId: opt('legacy_id'),
      title: hash.title ?? '',
      status: parseStatus(hash.status, id),
      priority: hash.priority ?? 'medium',
      owner: opt('owner'),
      dependencies: parseDependencies(hash.dependencies),
      retries: parseInt(hash.retries ?? '0', 10),
      lastError: opt('last_error'),
      commitSha: opt('commit_sha'),
      deprecated: hash.deprecated === 'true',
      supersededBy: opt('superseded_by'),
      createdAt: hash.created_at ?? '',
      updatedAt: hash.updated_at ?? '',
      assignedAt: opt('assigned_at'),
      devStartedAt: opt('dev_started_at'),
      validationStartedAt: opt('validation_started_at'),
      integrationStartedAt: opt('integration_started_at'),
      completedAt: opt('completed_at'),
      migratedAt: opt('migrated_at'),
      deadLetteredAt: opt('dead_lettered_at'),
    };
  }

  async create(task: TaskRecord): Promise<TaskRecord> {
    const added = await this.store.sadd(TASK_INDEX_KEY, task.id);
    if (added === 0 && (await this.store.hget(taskKey(task.id), 'id')) !== null) {
      throw new ValidationError(`Task ${task.id} already exists`);
    }

    const { set } = this.toHash(task);
    await this.store.hset(taskKey(task.id), set);
    this.logger.debug(`Task record created: ${task.id}`, { stableId: task.stableId });
    return task;
  }

  async findById(id: string): Promise<TaskRecord | null> {
    const hash = await this.store.hgetall(taskKey(id));
    if (!hash.id) return null;
    return this.fromHash(hash);
  }

  async findAll(filter?: TaskFilter): Promise<TaskRecord[]> {
    const ids = await this.store.smembers(TASK_INDEX_KEY);
    const tasks: TaskRecord[] = [];

    for (const id of ids) {
      const task = await this.findById(id);
      if (!task) {
        this.logger.warn(`Indexed task has no record: ${id}`);
        continue;
      }
      if (filter?.status && task.status !== filter.status) continue;
      if (filter?.owner && task.owner !== filter.owner) continue;
      tasks.push(task);
    }

    return tasks.sort((a, b) => a.stableId.localeCompare(b.stableId));
  }

  async update(id: string, patch: TaskPatch): Promise<TaskRecord> {
    if ((await this.store.hget(taskKey(id), 'id')) === null) {
      throw new NotFoundError('Task', id);
    }

    const { set, clear } = this.toHash(patch);
    await this.store.hset(taskKey(id), set);
    if (clear.length > 0) {
      await this.store.hdel(taskKey(id), ...clear);
    }

    const updated = await this.findById(id);
    if (!updated) {
      throw new NotFoundError('Task', id);
    }
    return updated;
  }

  async incrementRetries(id: string): Promise<number> {
    if ((await this.store.hget(taskKey(id), 'id')) === null) {
      throw new NotFoundError('Task', id);
    }
    return this.store.hincrby(taskKey(id), FIELD_NAMES.retries, 1);
  }

  async count(): Promise<number> {
    return (await this.store.smembers(TASK_INDEX_KEY)).length;
  }
}
