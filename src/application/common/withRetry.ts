import { setTimeout as sleep } from 'timers/promises';
import { TransientStoreError } from '../../domain/common/Errors';
import { ILogger } from '../../domain/common/ILogger';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 5,
  baseDelayMs: 50,
  factor: 2,
  maxDelayMs: 2000,
};

/**
 * Delay before retry number `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(policy.factor, attempt - 1), policy.maxDelayMs);
}

/**
 * Run an idempotent store operation, retrying only on `TransientStoreError`.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  logger: ILogger,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: (ms: number) => Promise<unknown> = ms => sleep(ms)
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientStoreError) || attempt >= policy.attempts) {
        throw err;
      }
      const delay = backoffDelay(policy, attempt);
      logger.warn(`Retrying ${operation} after transient store error`, { attempt, delayMs: delay, error: err.message });
      await wait(delay);
    }
  }
}
