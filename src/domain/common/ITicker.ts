/**
 * A unit of periodic work.
 */
export type TickTask = () => Promise<void>;

/**
 * Scheduler for long-lived polling loops.
 *
 * `schedule` runs `task` every `intervalMs` until `signal` aborts and resolves once the
 * loop has stopped. Implementations never run two ticks of the same task concurrently.
 */
export interface ITicker {
  schedule(name: string, intervalMs: number, task: TickTask, signal: AbortSignal): Promise<void>;
}
