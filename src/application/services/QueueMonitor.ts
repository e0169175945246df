import { ICoordinationStore } from '../../domain/store/ICoordinationStore';
import { INotificationPublisher } from '../../domain/notifications/INotificationPublisher';
import { ITicker } from '../../domain/common/ITicker';
import { ILogger } from '../../domain/common/ILogger';
import { isTerminal } from '../../domain/tasks/stateMachine';
import { QueueService } from './QueueService';
import { TaskService } from './TaskService';
import { LivenessMonitor } from './LivenessMonitor';

/** stage -> depth at which `scaling_needed` was last raised */
export const SCALING_ALERTED_KEY = 'monitor:scaling_alerted';

export interface QueueMonitorOptions {
  scalingThreshold: number;
  livenessIntervalMs: number;
  progressReportIntervalMs: number;
}

/**
 * Orchestrator-side watcher: agent liveness, queue depth alerts and progress reports.
 */
export class QueueMonitor {
  constructor(
    private queueService: QueueService,
    private taskService: TaskService,
    private liveness: LivenessMonitor,
    private store: ICoordinationStore,
    private notifications: INotificationPublisher,
    private ticker: ITicker,
    private logger: ILogger,
    private options: QueueMonitorOptions
  ) {}

  /**
   * Raise `scaling_needed` when a stage's pending depth crosses the threshold.
   * A stage is reported again only after its depth has dropped back below it.
   */
  async checkDepths(): Promise<string[]> {
    const { stages } = await this.queueService.stats();
    const alerted: string[] = [];

    for (const { stage, pending } of stages) {
      const wasAlerted = (await this.store.hget(SCALING_ALERTED_KEY, stage)) !== null;

      if (pending < this.options.scalingThreshold) {
        if (wasAlerted) {
          await this.store.hdel(SCALING_ALERTED_KEY, stage);
        }
        continue;
      }
      if (wasAlerted) continue;

      await this.store.hset(SCALING_ALERTED_KEY, { [stage]: String(pending) });
      this.logger.warn(`Queue ${stage} over scaling threshold`, { pending, threshold: this.options.scalingThreshold });
      await this.notifications.publish('scaling_needed', {
        stage,
        depth: pending,
        threshold: this.options.scalingThreshold,
      });
      alerted.push(stage);
    }

    return alerted;
  }

  async reportProgress(): Promise<void> {
    const stats = await this.queueService.stats();
    const tasks = await this.taskService.listTasks();

    const queues: Record<string, number> = {};
    for (const { stage, pending } of stats.stages) {
      queues[stage] = pending;
    }
    const activeTasks = tasks.filter(t => t.status !== 'new' && !isTerminal(t.status)).length;

    await this.notifications.publish('progress_report', { queues, activeTasks, deadLetter: stats.deadLetter });
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('Queue monitor started', { ...this.options });

    await Promise.all([
      this.ticker.schedule('monitor:liveness', this.options.livenessIntervalMs, async () => {
        await this.liveness.check();
        await this.checkDepths();
      }, signal),
      this.ticker.schedule('monitor:progress', this.options.progressReportIntervalMs, () => this.reportProgress(), signal),
    ]);

    this.logger.info('Queue monitor stopped');
  }
}
