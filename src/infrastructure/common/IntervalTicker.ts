import { setTimeout as sleep } from 'timers/promises';
import { ITicker, TickTask } from '../../domain/common/ITicker';
import { ILogger } from '../../domain/common/ILogger';

/**
 * Wall-clock ticker. Runs the task, then sleeps for the interval, until the signal aborts.
 * A failing tick is logged and the loop carries on.
 */
export class IntervalTicker implements ITicker {
  constructor(private logger: ILogger) {}

  async schedule(name: string, intervalMs: number, task: TickTask, signal: AbortSignal): Promise<void> {
    this.logger.debug(`Ticker started: ${name}`, { intervalMs });

    while (!signal.aborted) {
      try {
        await task();
      } catch (err) {
        this.logger.error(`Tick failed: ${name}`, err instanceof Error ? err : new Error(String(err)));
      }

      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }

    this.logger.debug(`Ticker stopped: ${name}`);
  }
}
