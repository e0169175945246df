/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * A state-machine or pipeline move that is not an edge from the current state (409).
 */
export class InvalidTransitionError extends AppError {
  constructor(
    public readonly taskId: string,
    public readonly current: string,
    public readonly requested: string,
    hint?: string
  ) {
    super(
      409,
      'INVALID_TRANSITION',
      `Task ${taskId} cannot move to '${requested}': current state is '${current}'${hint ? ` (${hint})` : ''}`,
      { taskId, current, requested }
    );
  }
}

/**
 * Identifiers of the completion gate checks.
 */
export type GateCheck =
  | 'missing_commit'
  | 'ci_check_failed'
  | 'ci_unverifiable'
  | 'not_on_mainline'
  | 'stale_commit'
  | 'commit_time_unknown';

export interface GateCheckFailure {
  check: GateCheck;
  message: string;
}

/**
 * The `complete` transition was blocked by one or more gate checks (422).
 */
export class ValidationGateFailure extends AppError {
  constructor(
    public readonly taskId: string,
    public readonly failures: GateCheckFailure[]
  ) {
    super(
      422,
      'VALIDATION_GATE_FAILURE',
      `Completion gate failed for ${taskId}: ${failures.map(f => f.message).join('; ')}`,
      { taskId, failures }
    );
  }
}

/**
 * Coordination store temporarily unreachable (503). Safe to retry.
 */
export class TransientStoreError extends AppError {
  constructor(operation: string, cause?: Error) {
    super(503, 'TRANSIENT_STORE_ERROR', `Coordination store unavailable during ${operation}${cause ? `: ${cause.message}` : ''}`);
  }
}

/**
 * An inflight claim outlived its maximum age. Logged by the recovery sweep, never thrown to callers.
 */
export class StaleInflightError extends AppError {
  constructor(
    public readonly taskId: string,
    public readonly stage: string,
    public readonly ageMs: number
  ) {
    super(409, 'STALE_INFLIGHT', `Task ${taskId} held inflight in '${stage}' for ${Math.round(ageMs / 1000)}s`, { taskId, stage, ageMs });
  }
}

/**
 * A notification payload did not match its declared type.
 */
export class NotificationFormatError extends AppError {
  constructor(type: string, details?: unknown) {
    super(422, 'NOTIFICATION_FORMAT_ERROR', `Malformed '${type}' notification`, details);
  }
}

/**
 * The commit gate itself failed while evaluating a commit (500).
 */
export class HookFailure extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'HOOK_FAILURE', message, details);
  }
}

/**
 * The CI collaborator cannot be reached or is not configured (503).
 */
export class CiUnavailableError extends AppError {
  constructor(message: string) {
    super(503, 'CI_UNAVAILABLE', message);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}
