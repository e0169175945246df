import { RecoveredEntry } from '../../types';
import { ITicker } from '../../domain/common/ITicker';
import { ILogger } from '../../domain/common/ILogger';
import { QueueService } from './QueueService';

export interface RecoverySweeperOptions {
  intervalMs: number;
  inflightMaxAgeMs: number;
}

export interface SweepResult {
  reconciled: number;
  recovered: RecoveredEntry[];
}

/**
 * Periodic sweep that finishes interrupted moves and requeues stuck inflight entries.
 * Runs as its own process, independent of any worker.
 */
export class RecoverySweeper {
  constructor(
    private queueService: QueueService,
    private ticker: ITicker,
    private logger: ILogger,
    private options: RecoverySweeperOptions
  ) {}

  async sweep(): Promise<SweepResult> {
    const reconciled = await this.queueService.reconcile();
    const recovered: RecoveredEntry[] = [];
    for (const stage of this.queueService.pipelineStages) {
      recovered.push(...(await this.queueService.recoverStuck(stage, this.options.inflightMaxAgeMs)));
    }

    if (reconciled > 0 || recovered.length > 0) {
      this.logger.info('Recovery sweep finished', { reconciled, recovered: recovered.length });
    }
    return { reconciled, recovered };
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('Recovery sweeper started', { ...this.options });
    await this.ticker.schedule('recovery:sweep', this.options.intervalMs, async () => {
      await this.sweep();
    }, signal);
    this.logger.info('Recovery sweeper stopped');
  }
}
