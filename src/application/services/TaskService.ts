import { CreateTaskPayload, PipelineDepth, TaskFilter, TaskRecord, TaskStatus } from '../../types';
import { ITaskRepository, TaskPatch } from '../../domain/repositories/ITaskRepository';
import { ITaskArtifactRepository, TaskArtifact } from '../../domain/repositories/ITaskArtifactRepository';
import { ICiProvider } from '../../domain/services/ICiProvider';
import { IEventBus } from '../../domain/events/IEventBus';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import {
  CiUnavailableError,
  GateCheckFailure,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  ValidationGateFailure,
} from '../../domain/common/Errors';
import {
  STATUS_TIMESTAMP,
  canTransition,
  completionSource,
  isTerminal,
  requiredPredecessor,
} from '../../domain/tasks/stateMachine';
import { StableIdService } from './StableIdService';

export interface TaskServiceOptions {
  depth: PipelineDepth;
  requiredChecks: string[];
  mainlineBranch: string;
  freshnessHours: number;
}

export interface TransitionContext {
  owner?: string;
  commitSha?: string | null;
  supersededBy?: string;
}

export interface LegacyTaskInput {
  id: string;
  title?: string;
  priority?: string;
  status?: TaskStatus;
}

const TASK_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Task state manager: owns task records, their state machine and the persisted artifact.
 */
export class TaskService {
  constructor(
    private taskRepo: ITaskRepository,
    private artifactRepo: ITaskArtifactRepository,
    private stableIds: StableIdService,
    private ciProvider: ICiProvider,
    private eventBus: IEventBus,
    private clock: IClock,
    private logger: ILogger,
    private options: TaskServiceOptions
  ) {}

  get depth(): PipelineDepth {
    return this.options.depth;
  }

  private newRecord(id: string, stableId: string, now: string): TaskRecord {
    return {
      id,
      stableId,
      legacyId: null,
      title: '',
      status: 'new',
      priority: 'medium',
      owner: null,
      dependencies: [],
      retries: 0,
      lastError: null,
      commitSha: null,
      deprecated: false,
      supersededBy: null,
      createdAt: now,
      updatedAt: now,
      assignedAt: null,
      devStartedAt: null,
      validationStartedAt: null,
      integrationStartedAt: null,
      completedAt: null,
      migratedAt: null,
      deadLetteredAt: null,
    };
  }

  /**
   * Create a new task with the next stable id.
   */
  async createTask(input: CreateTaskPayload): Promise<TaskRecord> {
    const id = input.id.trim();
    if (!TASK_ID_PATTERN.test(id)) {
      throw new ValidationError(`Invalid task id '${input.id}'`);
    }
    if (await this.taskRepo.findById(id)) {
      throw new ValidationError(`Task ${id} already exists`);
    }

    const stableId = await this.stableIds.assign(id);
    const now = this.clock.now().toISOString();
    const task = await this.taskRepo.create({
      ...this.newRecord(id, stableId, now),
      title: input.title?.trim() ?? '',
      priority: input.priority ?? 'medium',
      dependencies: input.dependencies ?? [],
    });

    this.logger.info(`Task created: ${id}`, { stableId });
    await this.eventBus.emit('task:created', task);
    await this.syncArtifact();

    return task;
  }

  /**
   * Create records for legacy tasks, mapping each legacy id to a stable id once.
   * Ids that already have a record are left alone.
   */
  async importLegacy(entries: LegacyTaskInput[]): Promise<TaskRecord[]> {
    const mappings = await this.stableIds.migrate(entries.map(e => e.id));
    const now = this.clock.now().toISOString();
    const imported: TaskRecord[] = [];

    for (const [index, entry] of entries.entries()) {
      if (await this.taskRepo.findById(entry.id)) continue;

      const task = await this.taskRepo.create({
        ...this.newRecord(entry.id, mappings[index].stableId, now),
        legacyId: entry.id,
        title: entry.title ?? '',
        priority: entry.priority ?? 'medium',
        status: entry.status ?? 'new',
        deprecated: entry.status === 'deprecated',
        migratedAt: now,
      });
      imported.push(task);
      await this.eventBus.emit('task:created', task);
    }

    if (imported.length > 0) {
      await this.syncArtifact();
    }
    return imported;
  }

  /**
   * Get a task by display id or stable id.
   */
  async getTask(id: string): Promise<TaskRecord> {
    const task = await this.findTask(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return task;
  }

  async findTask(id: string): Promise<TaskRecord | null> {
    const direct = await this.taskRepo.findById(id);
    if (direct) return direct;

    const mapping = await this.stableIds.resolve(id);
    return mapping ? this.taskRepo.findById(mapping.displayId) : null;
  }

  async listTasks(filter?: TaskFilter): Promise<TaskRecord[]> {
    return this.taskRepo.findAll(filter);
  }

  /**
   * Move a task along one edge of the state machine.
   * Re-entering the current status is a no-op, except that `assigned` takes a new owner.
   */
  async transition(id: string, to: TaskStatus, ctx: TransitionContext = {}): Promise<TaskRecord> {
    const task = await this.getTask(id);
    const from = task.status;

    if (from === to) {
      if (to === 'assigned' && ctx.owner && ctx.owner !== task.owner) {
        const reassigned = await this.applyUpdate(task, { owner: ctx.owner });
        this.logger.info(`Task ${task.id} reassigned to ${ctx.owner}`);
        return reassigned;
      }
      return task;
    }

    if (!canTransition(from, to, this.options.depth)) {
      const required = requiredPredecessor(to, this.options.depth);
      throw new InvalidTransitionError(task.id, from, to, required && !isTerminal(from) ? `requires '${required}'` : undefined);
    }

    const now = this.clock.now().toISOString();
    const patch: TaskPatch = { status: to, updatedAt: now };

    switch (to) {
      case 'assigned':
        if (!ctx.owner) {
          throw new ValidationError(`Assigning ${task.id} requires an owner`);
        }
        if (task.owner) {
          throw new InvalidTransitionError(task.id, from, to, `already owned by ${task.owner}`);
        }
        patch.owner = ctx.owner;
        break;
      case 'complete': {
        const failures = await this.verifyCompletion(task.id, ctx.commitSha);
        if (failures.length > 0) {
          throw new ValidationGateFailure(task.id, failures);
        }
        patch.commitSha = ctx.commitSha ?? null;
        break;
      }
      case 'deprecated':
        if (!ctx.supersededBy) {
          throw new ValidationError(`Deprecating ${task.id} requires superseded_by`);
        }
        patch.deprecated = true;
        patch.supersededBy = ctx.supersededBy;
        break;
      default:
        break;
    }

    const stamp = STATUS_TIMESTAMP[to];
    if (stamp) {
      patch[stamp] = now;
    }

    const updated = await this.applyUpdate(task, patch);

    this.logger.info(`Task ${task.id}: ${from} -> ${to}`);
    await this.eventBus.emit('task:updated', { task: updated, from });
    if (to === 'deprecated' && ctx.supersededBy) {
      await this.eventBus.emit('task:deprecated', { task: updated, supersededBy: ctx.supersededBy });
    }
    await this.syncArtifact();

    return updated;
  }

  assign(id: string, owner: string): Promise<TaskRecord> {
    return this.transition(id, 'assigned', { owner });
  }

  start(id: string): Promise<TaskRecord> {
    return this.transition(id, 'in_progress');
  }

  submitForValidation(id: string): Promise<TaskRecord> {
    return this.transition(id, 'validation');
  }

  submitForIntegration(id: string): Promise<TaskRecord> {
    return this.transition(id, 'integration');
  }

  complete(id: string, commitSha: string | null | undefined): Promise<TaskRecord> {
    return this.transition(id, 'complete', { commitSha });
  }

  deprecate(id: string, supersededBy: string): Promise<TaskRecord> {
    return this.transition(id, 'deprecated', { supersededBy });
  }

  /**
   * Run the completion gate checks without changing anything.
   * Returns every failed check; an empty list means the commit may complete the task.
   */
  async verifyCompletion(id: string, commitSha: string | null | undefined): Promise<GateCheckFailure[]> {
    const task = await this.getTask(id);
    if (!commitSha) {
      return [{ check: 'missing_commit', message: `no commit hash supplied for ${task.id}` }];
    }

    const failures: GateCheckFailure[] = [];
    const unverifiable = (err: unknown): void => {
      if (!(err instanceof CiUnavailableError)) throw err;
      if (!failures.some(f => f.check === 'ci_unverifiable')) {
        failures.push({ check: 'ci_unverifiable', message: `cannot verify ${commitSha}: ${err.message}` });
      }
    };

    try {
      const results = await this.ciProvider.checkResults(commitSha, this.options.requiredChecks);
      for (const result of results) {
        if (result.conclusion !== 'success') {
          failures.push({ check: 'ci_check_failed', message: `required check '${result.name}' is ${result.conclusion}` });
        }
      }
    } catch (err) {
      unverifiable(err);
    }

    try {
      if (!(await this.ciProvider.isOnMainline(commitSha, this.options.mainlineBranch))) {
        failures.push({ check: 'not_on_mainline', message: `${commitSha} is not on ${this.options.mainlineBranch}` });
      }
    } catch (err) {
      unverifiable(err);
    }

    try {
      const committedAt = await this.ciProvider.commitTimestamp(commitSha);
      if (!committedAt) {
        failures.push({ check: 'commit_time_unknown', message: `commit time of ${commitSha} is unknown` });
      } else {
        const ageHours = (this.clock.now().getTime() - committedAt.getTime()) / 3_600_000;
        if (ageHours > this.options.freshnessHours) {
          failures.push({
            check: 'stale_commit',
            message: `${commitSha} is ${Math.floor(ageHours)}h old (limit ${this.options.freshnessHours}h)`,
          });
        }
      }
    } catch (err) {
      unverifiable(err);
    }

    return failures;
  }

  /**
   * Status the task must hold before a completion commit is accepted.
   */
  completionSource(): TaskStatus {
    return completionSource(this.options.depth);
  }

  // Bookkeeping used by the queue engine; none of these change the status.

  async recordRetry(id: string, reason: string): Promise<number> {
    const retries = await this.taskRepo.incrementRetries(id);
    await this.taskRepo.update(id, { lastError: reason, updatedAt: this.clock.now().toISOString() });
    return retries;
  }

  async markDeadLettered(id: string, reason: string): Promise<TaskRecord> {
    const now = this.clock.now().toISOString();
    return this.taskRepo.update(id, { lastError: reason, deadLetteredAt: now, updatedAt: now });
  }

  async resetRetries(id: string): Promise<TaskRecord> {
    return this.taskRepo.update(id, { retries: 0, deadLetteredAt: null, updatedAt: this.clock.now().toISOString() });
  }

  /**
   * Rewrite the persisted artifact from the task records.
   */
  async syncArtifact(): Promise<TaskArtifact> {
    const tasks = await this.taskRepo.findAll();
    const artifact: TaskArtifact = {};
    for (const task of tasks) {
      artifact[task.id] = {
        status: task.status,
        priority: task.priority,
        stable_id: task.stableId,
        legacy_id: task.legacyId,
        migrated_at: task.migratedAt,
        ...(task.deprecated ? { deprecated: true } : {}),
        ...(task.supersededBy ? { superseded_by: task.supersededBy } : {}),
      };
    }

    try {
      await this.artifactRepo.write(artifact);
    } catch (err) {
      // Records stay authoritative; the next mutation or `syncArtifact` rewrites the file.
      this.logger.error('Failed to write task artifact', err instanceof Error ? err : new Error(String(err)));
    }
    return artifact;
  }

  private async applyUpdate(task: TaskRecord, patch: TaskPatch): Promise<TaskRecord> {
    return this.taskRepo.update(task.id, { updatedAt: this.clock.now().toISOString(), ...patch });
  }
}
