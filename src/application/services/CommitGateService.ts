import { CommitProposal, TaskStatus } from '../../types';
import { ILogger } from '../../domain/common/ILogger';
import {
  AppError,
  HookFailure,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  ValidationGateFailure,
} from '../../domain/common/Errors';
import { isSystemStatusCommit } from '../../domain/tasks/statusCommit';
import { TaskService } from './TaskService';

export interface CommitGateOptions {
  failOpen: boolean;
  /** Statuses in which a task accepts commits. */
  activeStatuses: TaskStatus[];
  /** Repository-relative path of the persisted task artifact. */
  artifactPath: string;
}

export interface GateDecision {
  allowed: boolean;
  reason: string;
  taskId?: string;
  /** Set when the commit was rejected, or let through despite a gate error. */
  error?: AppError;
  /** True when the commit was allowed only because the gate failed open. */
  failOpen?: boolean;
}

const TASK_ID = '[A-Z][A-Z0-9]*-\\d+';

/**
 * Identifier patterns, most explicit first.
 */
const TASK_ID_PATTERNS: readonly RegExp[] = [
  new RegExp(`^\\w+\\((${TASK_ID})\\)!?:`),
  new RegExp(`\\[(${TASK_ID})\\]`),
  new RegExp(`\\b(${TASK_ID})\\b`),
];

const COMPLETION_PATTERN = /\b(complete|completed|done|finish|finished|closes)\b/i;

export function extractTaskId(message: string): string | null {
  const subject = message.trim();
  for (const pattern of TASK_ID_PATTERNS) {
    const match = pattern.exec(subject);
    if (match) return match[1];
  }
  return null;
}

export function isCompletionMessage(message: string): boolean {
  return COMPLETION_PATTERN.test(message);
}

function normalizePath(path: string): string {
  return path.trim().replace(/\\/g, '/').replace(/^\.\//, '');
}

function isRejection(err: unknown): err is AppError {
  return (
    err instanceof InvalidTransitionError ||
    err instanceof NotFoundError ||
    err instanceof ValidationGateFailure ||
    err instanceof ValidationError
  );
}

/**
 * Decision for an error inside the gate itself, as opposed to a rejected commit.
 * Fails open unless the gate is configured otherwise.
 */
export function gateFailureDecision(err: unknown, failOpen: boolean, logger: ILogger, details?: unknown): GateDecision {
  const failure = new HookFailure(`Commit gate error: ${err instanceof Error ? err.message : String(err)}`, details);
  if (failOpen) {
    logger.error('COMMIT GATE FAILED OPEN: commit allowed without checks', err instanceof Error ? err : failure);
    return { allowed: true, reason: failure.message, error: failure, failOpen: true };
  }
  logger.error('Commit gate failed closed', err instanceof Error ? err : failure);
  return { allowed: false, reason: failure.message, error: failure, failOpen: false };
}

/**
 * Decides whether a proposed commit may land, based on the task it names.
 */
export class CommitGateService {
  constructor(
    private taskService: TaskService,
    private logger: ILogger,
    private options: CommitGateOptions
  ) {}

  async evaluate(proposal: CommitProposal): Promise<GateDecision> {
    try {
      return await this.decide(proposal);
    } catch (err) {
      if (isRejection(err)) {
        this.logger.info('Commit rejected', { code: err.code, reason: err.message });
        return { allowed: false, reason: err.message, error: err, ...this.taskIdOf(err) };
      }

      return gateFailureDecision(err, this.options.failOpen, this.logger, { message: proposal.message });
    }
  }

  private taskIdOf(err: AppError): { taskId?: string } {
    if (err instanceof InvalidTransitionError || err instanceof ValidationGateFailure) {
      return { taskId: err.taskId };
    }
    return {};
  }

  private async decide({ message, files, commitSha }: CommitProposal): Promise<GateDecision> {
    const artifact = normalizePath(this.options.artifactPath);
    const systemCommit = isSystemStatusCommit(message);

    if (files.some(file => normalizePath(file) === artifact)) {
      if (!systemCommit) {
        return {
          allowed: false,
          reason: `${artifact} is written only by the task state manager; edit tasks through the coordinator instead`,
        };
      }
    }
    if (systemCommit) {
      return { allowed: true, reason: 'system status update' };
    }

    const taskId = extractTaskId(message);
    if (!taskId) {
      return { allowed: true, reason: 'no task referenced' };
    }

    const task = await this.taskService.findTask(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }

    if (!this.options.activeStatuses.includes(task.status)) {
      throw new InvalidTransitionError(
        task.id,
        task.status,
        'commit',
        `requires ${this.options.activeStatuses.map(s => `'${s}'`).join(' or ')}`
      );
    }

    if (isCompletionMessage(message)) {
      const failures = await this.taskService.verifyCompletion(task.id, commitSha);
      if (failures.length > 0) {
        throw new ValidationGateFailure(task.id, failures);
      }
      return { allowed: true, reason: `completion of ${task.id} verified`, taskId: task.id };
    }

    return { allowed: true, reason: `${task.id} is ${task.status}`, taskId: task.id };
  }
}
