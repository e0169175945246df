import {
  ClaimResult,
  CompleteResult,
  EnqueueResult,
  FailResult,
  PipelineDepth,
  QueueLocation,
  QueueStats,
  RecoveredEntry,
  Stage,
  TransitionLogEntry,
} from '../../types';
import { ICoordinationStore, ListEnd } from '../../domain/store/ICoordinationStore';
import { INotificationPublisher } from '../../domain/notifications/INotificationPublisher';
import { IEventBus } from '../../domain/events/IEventBus';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import {
  InvalidTransitionError,
  NotFoundError,
  StaleInflightError,
  ValidationError,
} from '../../domain/common/Errors';
import {
  CLAIM_STATUS,
  DEAD_LETTER_KEY,
  LEDGER_KEY,
  MEMBERS_KEY,
  TRANSITIONS_KEY,
  nextStage,
  stageKeys,
  stagesFor,
} from '../../domain/pipeline/stages';
import { isTerminal } from '../../domain/tasks/stateMachine';
import { TaskService } from './TaskService';
import { RetryPolicy, DEFAULT_RETRY_POLICY, withRetry } from '../common/withRetry';

export interface QueueServiceOptions {
  depth: PipelineDepth;
  maxRetries: number;
  /** Ledger entries younger than this are assumed to belong to a live mover. */
  ledgerGraceMs: number;
  retryPolicy?: RetryPolicy;
}

export interface ClaimOptions {
  agentId: string;
  timeoutMs: number;
}

type MoveSource = { list: 'inflight'; stage: Stage } | { list: 'dead_letter' };

type MoveTarget =
  | { list: 'pending'; stage: Stage; end: ListEnd }
  | { list: 'dead_letter' }
  | { list: 'none' };

/**
 * Intent recorded before a two-step move, cleared once the move is done.
 */
interface LedgerEntry {
  taskId: string;
  source: MoveSource;
  target: MoveTarget;
  at: string;
  /** False until the move's precondition step has succeeded. Only ready entries may be finished. */
  ready: boolean;
}

function sourceKey(source: MoveSource): string {
  return source.list === 'inflight' ? stageKeys.inflight(source.stage) : DEAD_LETTER_KEY;
}

function ledgerField(taskId: string, source: MoveSource): string {
  return `${taskId}|${sourceKey(source)}`;
}

function describeTarget(target: MoveTarget): string {
  switch (target.list) {
    case 'pending':
      return target.stage;
    case 'dead_letter':
      return 'dead_letter';
    case 'none':
      return 'complete';
  }
}

function parseLedgerEntry(raw: string): LedgerEntry | null {
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value !== 'object' || value === null) return null;
    if (!('taskId' in value) || typeof value.taskId !== 'string') return null;
    if (!('source' in value) || !('target' in value) || !('at' in value)) return null;
    const { source, target, at } = value;
    if (!isMoveSource(source) || !isMoveTarget(target) || typeof at !== 'string') return null;
    const ready = !('ready' in value) || value.ready !== false;
    return { taskId: value.taskId, source, target, at, ready };
  } catch {
    return null;
  }
}

function isMoveSource(value: unknown): value is MoveSource {
  if (typeof value !== 'object' || value === null || !('list' in value)) return false;
  if (value.list === 'dead_letter') return true;
  return value.list === 'inflight' && 'stage' in value && typeof value.stage === 'string';
}

function isMoveTarget(value: unknown): value is MoveTarget {
  if (typeof value !== 'object' || value === null || !('list' in value)) return false;
  if (value.list === 'dead_letter' || value.list === 'none') return true;
  return value.list === 'pending' && 'stage' in value && 'end' in value && (value.end === 'LEFT' || value.end === 'RIGHT');
}

/**
 * Queue pipeline engine.
 *
 * Every stage has a pending list and an inflight shadow list. A claim is a single atomic
 * BLMOVE from pending to inflight; every other move is two store calls (remove, then push)
 * bracketed by an entry in the idempotency ledger so an interrupted move can be finished
 * by `reconcile()`. Pushes check `locate()` first, so finishing a move twice never
 * duplicates an id.
 */
export class QueueService {
  private stages: readonly Stage[];

  constructor(
    private store: ICoordinationStore,
    private taskService: TaskService,
    private notifications: INotificationPublisher,
    private eventBus: IEventBus,
    private clock: IClock,
    private logger: ILogger,
    private options: QueueServiceOptions
  ) {
    this.stages = stagesFor(options.depth);

    this.eventBus.on('task:deprecated', async ({ task }) => {
      await this.purge(task.id);
    });
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, this.logger, this.options.retryPolicy ?? DEFAULT_RETRY_POLICY);
  }

  private assertStage(stage: string): Stage {
    const match = this.stages.find(s => s === stage);
    if (!match) {
      throw new ValidationError(`Unknown stage '${stage}' (pipeline: ${this.stages.join(', ')})`);
    }
    return match;
  }

  get pipelineStages(): readonly Stage[] {
    return this.stages;
  }


  /**
   * Push a task to the tail of a stage queue, unless it is already somewhere in the pipeline.
   */
  async enqueue(taskId: string, stage: string): Promise<EnqueueResult> {
    const target = this.assertStage(stage);
    const result = await this.retry('enqueue', () => this.doEnqueue(taskId, target));
    if (result.kind === 'enqueued' && target === this.stages[0]) {
      const task = await this.taskService.getTask(result.taskId);
      await this.retry('announce new task', () =>
        this.notifications.publish('new_task', {
          taskId: task.id,
          ...(task.title ? { title: task.title } : {}),
          priority: task.priority,
        })
      );
    }
    return result;
  }

  /**
   * Enqueue several tasks and announce the batch with a single notification.
   */
  async bulkEnqueue(taskIds: string[], stage: string): Promise<EnqueueResult[]> {
    const target = this.assertStage(stage);
    const results: EnqueueResult[] = [];
    for (const taskId of taskIds) {
      results.push(await this.retry('enqueue', () => this.doEnqueue(taskId, target)));
    }

    const enqueued = results.filter(r => r.kind === 'enqueued').map(r => r.taskId);
    if (enqueued.length > 0) {
      await this.notifications.publish('bulk_enqueue', { taskIds: enqueued, stage: target });
    }
    return results;
  }

  private async doEnqueue(taskId: string, stage: Stage): Promise<EnqueueResult> {
    const task = await this.taskService.getTask(taskId);
    if (isTerminal(task.status)) {
      throw new InvalidTransitionError(task.id, task.status, `queue:${stage}`, 'task is terminal');
    }

    const added = await this.store.sadd(MEMBERS_KEY, task.id);
    if (added === 0) {
      // A move in flight has taken the id out of one list and not yet pushed it to the next.
      // Its ledger entry outlives the push, so check the ledger before looking in the lists.
      if (await this.hasPendingMove(task.id)) {
        this.logger.debug(`Enqueue skipped, ${task.id} is being moved`);
        return { kind: 'noop', taskId: task.id, location: await this.locate(task.id) };
      }
      const location = await this.locate(task.id);
      if (location) {
        this.logger.debug(`Enqueue skipped, ${task.id} already queued`, { location });
        return { kind: 'noop', taskId: task.id, location };
      }
      this.logger.warn(`Task ${task.id} was a member but found in no queue; re-enqueueing`);
    }

    await this.store.rpush(stageKeys.pending(stage), task.id);
    await this.appendTransition(task.id, 'none', stage, 'enqueued');
    await this.eventBus.emit('queue:enqueued', { taskId: task.id, stage });
    return { kind: 'enqueued', taskId: task.id, stage };
  }


  /**
   * Atomically move the head of a stage queue into its inflight list, waiting up to
   * `timeoutMs`. Ids whose record is terminal or missing are dropped and the wait continues.
   */
  async claim(stage: string, { agentId, timeoutMs }: ClaimOptions): Promise<ClaimResult> {
    const target = this.assertStage(stage);
    if (!agentId) {
      throw new ValidationError('claim requires an agent id');
    }
    if (await this.isPaused(target)) {
      return { kind: 'timeout', stage: target };
    }

    const deadline = this.clock.now().getTime() + timeoutMs;

    for (;;) {
      const remaining = Math.max(0, deadline - this.clock.now().getTime());
      const taskId = await this.store.blmove(
        stageKeys.pending(target),
        stageKeys.inflight(target),
        'LEFT',
        'RIGHT',
        remaining
      );
      if (taskId === null) {
        return { kind: 'timeout', stage: target };
      }

      await this.store.hset(stageKeys.claims(target), { [taskId]: this.clock.now().toISOString() });

      const task = await this.taskService.findTask(taskId);
      if (!task || isTerminal(task.status)) {
        this.logger.warn(`Discarding ${task ? task.status : 'unknown'} task ${taskId} from ${target}`);
        await this.store.lrem(stageKeys.inflight(target), 0, taskId);
        await this.store.hdel(stageKeys.claims(target), taskId);
        await this.store.srem(MEMBERS_KEY, taskId);
        continue;
      }

      try {
        await this.taskService.transition(task.id, CLAIM_STATUS[target], { owner: agentId });
      } catch (err) {
        if (!(err instanceof InvalidTransitionError)) throw err;
        // The claim stands; the record keeps its status until someone fixes the queue placement.
        this.logger.warn(`Claimed ${task.id} from ${target} but status did not follow`, { error: err.message });
      }

      this.logger.debug(`Claimed ${task.id} from ${target}`, { agentId });
      await this.eventBus.emit('queue:claimed', { taskId: task.id, stage: target, agentId });
      return { kind: 'claimed', taskId: task.id, stage: target };
    }
  }


  /**
   * Remove a task from the stage's inflight list and push it to the head of the next stage.
   * On the last stage the task goes through the completion gate and leaves the pipeline.
   */
  complete(taskId: string, stage: string, opts: { commitSha?: string | null } = {}): Promise<CompleteResult> {
    const from = this.assertStage(stage);
    return this.retry('complete', () => this.doComplete(taskId, from, opts.commitSha));
  }

  private async doComplete(taskId: string, from: Stage, commitSha: string | null | undefined): Promise<CompleteResult> {
    const task = await this.taskService.getTask(taskId);
    const source: MoveSource = { list: 'inflight', stage: from };
    const next = nextStage(from, this.options.depth);

    if (next) {
      const moved = await this.moveWithLedger(task.id, source, { list: 'pending', stage: next, end: 'LEFT' });
      if (!moved) {
        return { kind: 'noop', taskId: task.id, location: await this.locate(task.id) };
      }
      await this.appendTransition(task.id, from, next);
      await this.eventBus.emit('queue:advanced', { taskId: task.id, from, to: next });
      return { kind: 'advanced', taskId: task.id, from, to: next };
    }

    const moved = await this.moveWithLedger(task.id, source, { list: 'none' }, async () => {
      await this.taskService.complete(task.id, commitSha);
    });
    if (!moved) {
      return { kind: 'noop', taskId: task.id, location: await this.locate(task.id) };
    }
    await this.appendTransition(task.id, from, 'complete');
    await this.eventBus.emit('queue:advanced', { taskId: task.id, from, to: 'complete' });
    return { kind: 'completed', taskId: task.id, from };
  }


  /**
   * Requeue a failed task at the tail of its stage, or dead-letter it once its retries are spent.
   */
  fail(taskId: string, stage: string, reason: string): Promise<FailResult> {
    const from = this.assertStage(stage);
    return this.retry('fail', () => this.doFail(taskId, from, reason));
  }

  private async doFail(taskId: string, stage: Stage, reason: string): Promise<FailResult> {
    const task = await this.taskService.getTask(taskId);
    const source: MoveSource = { list: 'inflight', stage };

    if (task.retries >= this.options.maxRetries) {
      const moved = await this.moveWithLedger(task.id, source, { list: 'dead_letter' }, async () => {
        await this.taskService.markDeadLettered(task.id, reason);
      });
      if (!moved) {
        return { kind: 'noop', taskId: task.id, location: await this.locate(task.id) };
      }

      this.logger.warn(`Task ${task.id} dead-lettered from ${stage}`, { retries: task.retries, reason });
      await this.appendTransition(task.id, stage, 'dead_letter', reason);
      await this.eventBus.emit('queue:dead_lettered', { taskId: task.id, stage, reason });
      await this.notifications.publish('system', {
        message: `Task ${task.id} dead-lettered after ${task.retries} retries in ${stage}: ${reason}`,
        severity: 'critical',
      });
      return { kind: 'dead_lettered', taskId: task.id, stage, retries: task.retries };
    }

    let retries = task.retries;
    const moved = await this.moveWithLedger(task.id, source, { list: 'pending', stage, end: 'RIGHT' }, async () => {
      retries = await this.taskService.recordRetry(task.id, reason);
    });
    if (!moved) {
      return { kind: 'noop', taskId: task.id, location: await this.locate(task.id) };
    }

    this.logger.info(`Task ${task.id} failed in ${stage}, retry ${retries}/${this.options.maxRetries}`, { reason });
    await this.appendTransition(task.id, stage, stage, `retry: ${reason}`);
    await this.eventBus.emit('queue:failed', { taskId: task.id, stage, reason, retries });
    return { kind: 'retried', taskId: task.id, stage, retries };
  }


  /**
   * Requeue at the head every inflight entry claimed more than `maxAgeMs` ago.
   * Entries with no recorded claim time are stamped now and left for a later sweep.
   */
  async recoverStuck(stage: string, maxAgeMs: number): Promise<RecoveredEntry[]> {
    const target = this.assertStage(stage);
    const inflight = [...new Set(await this.store.lrange(stageKeys.inflight(target), 0, -1))];
    const claims = await this.store.hgetall(stageKeys.claims(target));
    const now = this.clock.now();
    const recovered: RecoveredEntry[] = [];

    for (const taskId of inflight) {
      const claimedAt = Date.parse(claims[taskId] ?? '');
      if (Number.isNaN(claimedAt)) {
        await this.store.hset(stageKeys.claims(target), { [taskId]: now.toISOString() });
        continue;
      }

      const ageMs = now.getTime() - claimedAt;
      if (ageMs <= maxAgeMs) continue;

      const task = await this.taskService.findTask(taskId);
      const source: MoveSource = { list: 'inflight', stage: target };
      if (!task || isTerminal(task.status)) {
        await this.moveWithLedger(taskId, source, { list: 'none' });
        continue;
      }

      const moved = await this.moveWithLedger(taskId, source, { list: 'pending', stage: target, end: 'LEFT' });
      if (!moved) continue;

      const stale = new StaleInflightError(taskId, target, ageMs);
      this.logger.warn(`Recovered stuck task: ${stale.message}`, { taskId, stage: target, ageMs, code: stale.code });
      await this.appendTransition(taskId, target, target, 'recovered');
      await this.eventBus.emit('queue:recovered', { taskId, stage: target, ageMs });
      recovered.push({ taskId, stage: target, ageMs });
    }

    return recovered;
  }

  /**
   * Finish every move whose ledger entry is older than the grace period.
   * Returns the number of moves finished.
   */
  async reconcile(): Promise<number> {
    const ledger = await this.store.hgetall(LEDGER_KEY);
    const now = this.clock.now().getTime();
    let finished = 0;

    for (const [field, raw] of Object.entries(ledger)) {
      const entry = parseLedgerEntry(raw);
      if (!entry) {
        this.logger.warn(`Dropping unreadable ledger entry ${field}`);
        await this.store.hdel(LEDGER_KEY, field);
        continue;
      }
      if (now - Date.parse(entry.at) < this.options.ledgerGraceMs) continue;

      if (!entry.ready) {
        // The precondition never succeeded; the id was never removed from its source.
        this.logger.warn(`Abandoning unconfirmed move of ${entry.taskId} to ${describeTarget(entry.target)}`);
        await this.store.hdel(LEDGER_KEY, field);
        continue;
      }

      this.logger.warn(`Finishing interrupted move of ${entry.taskId} to ${describeTarget(entry.target)}`);
      await this.finishMove(entry);
      finished++;
    }

    return finished;
  }

  /**
   * Put a dead-lettered task back at the tail of a stage with its retries reset.
   */
  async replayDeadLetter(taskId: string, stage: string): Promise<EnqueueResult> {
    const target = this.assertStage(stage);
    const task = await this.taskService.getTask(taskId);

    const moved = await this.moveWithLedger(task.id, { list: 'dead_letter' }, { list: 'pending', stage: target, end: 'RIGHT' }, async () => {
      await this.taskService.resetRetries(task.id);
    });
    if (!moved) {
      throw new NotFoundError('Dead-lettered task', task.id);
    }

    this.logger.info(`Replayed ${task.id} from dead letter into ${target}`);
    await this.appendTransition(task.id, 'dead_letter', target, 'replayed');
    await this.eventBus.emit('queue:enqueued', { taskId: task.id, stage: target });
    return { kind: 'enqueued', taskId: task.id, stage: target };
  }

  async deadLetter(): Promise<string[]> {
    return this.store.lrange(DEAD_LETTER_KEY, 0, -1);
  }

  /**
   * Remove a task from every list and from membership.
   */
  async purge(taskId: string): Promise<void> {
    for (const stage of this.stages) {
      await this.store.lrem(stageKeys.pending(stage), 0, taskId);
      await this.store.lrem(stageKeys.inflight(stage), 0, taskId);
      await this.store.hdel(stageKeys.claims(stage), taskId);
    }
    await this.store.lrem(DEAD_LETTER_KEY, 0, taskId);
    await this.store.srem(MEMBERS_KEY, taskId);
    this.logger.info(`Task ${taskId} removed from the pipeline`);
  }


  async pauseStage(stage: string, reason?: string): Promise<void> {
    const target = this.assertStage(stage);
    await this.store.set(stageKeys.paused(target), reason || 'paused');
    this.logger.warn(`Stage ${target} paused`, { reason });
    await this.eventBus.emit('queue:paused', { stage: target, reason });
  }

  async resumeStage(stage: string): Promise<void> {
    const target = this.assertStage(stage);
    await this.store.del(stageKeys.paused(target));
    this.logger.info(`Stage ${target} resumed`);
    await this.eventBus.emit('queue:resumed', { stage: target });
  }

  async isPaused(stage: Stage): Promise<boolean> {
    return (await this.store.get(stageKeys.paused(stage))) !== null;
  }

  /**
   * Pause the final stage and alert the operator.
   */
  async reportDeploymentFailure(taskId: string, error: string): Promise<void> {
    const task = await this.taskService.getTask(taskId);
    const last = this.stages[this.stages.length - 1];
    await this.pauseStage(last, `deployment of ${task.id} failed`);
    await this.notifications.publish('deployment_failed', { taskId: task.id, error });
  }


  async stats(): Promise<QueueStats> {
    const stages = [];
    for (const stage of this.stages) {
      stages.push({
        stage,
        pending: await this.store.llen(stageKeys.pending(stage)),
        inflight: await this.store.llen(stageKeys.inflight(stage)),
        paused: await this.isPaused(stage),
      });
    }
    return { stages, deadLetter: await this.store.llen(DEAD_LETTER_KEY) };
  }

  async list(stage: string): Promise<{ pending: string[]; inflight: string[] }> {
    const target = this.assertStage(stage);
    return {
      pending: await this.store.lrange(stageKeys.pending(target), 0, -1),
      inflight: await this.store.lrange(stageKeys.inflight(target), 0, -1),
    };
  }

  /**
   * Where a task currently sits, or null if it is in no list.
   */
  async locate(taskId: string): Promise<QueueLocation | null> {
    for (const stage of this.stages) {
      if ((await this.store.lrange(stageKeys.pending(stage), 0, -1)).includes(taskId)) {
        return { list: 'pending', stage };
      }
      if ((await this.store.lrange(stageKeys.inflight(stage), 0, -1)).includes(taskId)) {
        return { list: 'inflight', stage };
      }
    }
    if ((await this.store.lrange(DEAD_LETTER_KEY, 0, -1)).includes(taskId)) {
      return { list: 'dead_letter' };
    }
    return null;
  }

  async transitions(taskId?: string): Promise<TransitionLogEntry[]> {
    const entries: TransitionLogEntry[] = [];
    for (const raw of await this.store.lrange(TRANSITIONS_KEY, 0, -1)) {
      const entry = this.parseTransition(raw);
      if (entry && (!taskId || entry.taskId === taskId)) {
        entries.push(entry);
      }
    }
    return entries;
  }


  private parseTransition(raw: string): TransitionLogEntry | null {
    try {
      const value: unknown = JSON.parse(raw);
      if (typeof value !== 'object' || value === null) return null;
      if (!('taskId' in value) || !('from' in value) || !('to' in value) || !('at' in value)) return null;
      const { taskId, from, to, at } = value;
      if (typeof taskId !== 'string' || typeof from !== 'string' || typeof to !== 'string' || typeof at !== 'string') {
        return null;
      }
      const reason = 'reason' in value && typeof value.reason === 'string' ? value.reason : undefined;
      return { taskId, from, to, at, ...(reason ? { reason } : {}) };
    } catch {
      this.logger.warn('Unreadable transition log entry', { raw });
      return null;
    }
  }

  private async appendTransition(taskId: string, from: string, to: string, reason?: string): Promise<void> {
    const entry: TransitionLogEntry = { taskId, from, to, at: this.clock.now().toISOString(), ...(reason ? { reason } : {}) };
    await this.store.rpush(TRANSITIONS_KEY, JSON.stringify(entry));
  }

  /**
   * Take the ledger slot for (task, source), run `before`, then move the id.
   * Returns false when the task is not in the source list or another mover holds the slot.
   * If `before` throws, the slot is released and the task stays where it was. The entry is
   * written unconfirmed and only marked ready once `before` has succeeded, so an entry whose
   * release failed is abandoned by `reconcile()` rather than finished.
   */
  private async moveWithLedger(
    taskId: string,
    source: MoveSource,
    target: MoveTarget,
    before?: () => Promise<void>
  ): Promise<boolean> {
    const entry: LedgerEntry = { taskId, source, target, at: this.clock.now().toISOString(), ready: !before };
    const field = ledgerField(taskId, source);

    if (!(await this.store.hsetnx(LEDGER_KEY, field, JSON.stringify(entry)))) {
      this.logger.debug(`Move of ${taskId} from ${sourceKey(source)} already in progress`);
      return false;
    }

    const present = (await this.store.lrange(sourceKey(source), 0, -1)).includes(taskId);
    if (!present) {
      await this.store.hdel(LEDGER_KEY, field);
      return false;
    }

    if (before) {
      try {
        await before();
      } catch (err) {
        await this.releaseLedger(field);
        throw err;
      }
      entry.ready = true;
      await this.store.hset(LEDGER_KEY, { [field]: JSON.stringify(entry) });
    }

    await this.finishMove(entry);
    return true;
  }

  /**
   * Drop a ledger slot after a failed precondition. A release that keeps failing is logged and
   * left for `reconcile()`, which abandons unconfirmed entries.
   */
  private async releaseLedger(field: string): Promise<void> {
    try {
      await this.retry('ledger release', async () => {
        await this.store.hdel(LEDGER_KEY, field);
      });
    } catch (releaseErr) {
      this.logger.error(
        `Failed to release ledger entry ${field}`,
        releaseErr instanceof Error ? releaseErr : new Error(String(releaseErr))
      );
    }
  }

  private async hasPendingMove(taskId: string): Promise<boolean> {
    const fields = Object.keys(await this.store.hgetall(LEDGER_KEY));
    return fields.some(field => field.startsWith(`${taskId}|`));
  }

  /**
   * Idempotent second half of a move: remove from the source, push to the target if the
   * id is in no list, clear the ledger entry.
   */
  private async finishMove(entry: LedgerEntry): Promise<void> {
    const { taskId, source, target } = entry;

    await this.store.lrem(sourceKey(source), 0, taskId);
    if (source.list === 'inflight') {
      await this.store.hdel(stageKeys.claims(source.stage), taskId);
    }

    if (target.list === 'none') {
      await this.store.srem(MEMBERS_KEY, taskId);
    } else if (!(await this.locate(taskId))) {
      if (target.list === 'dead_letter') {
        await this.store.rpush(DEAD_LETTER_KEY, taskId);
      } else if (target.end === 'LEFT') {
        await this.store.lpush(stageKeys.pending(target.stage), taskId);
      } else {
        await this.store.rpush(stageKeys.pending(target.stage), taskId);
      }
    }

    await this.store.hdel(LEDGER_KEY, ledgerField(taskId, source));
  }
}
