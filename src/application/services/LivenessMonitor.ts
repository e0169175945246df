import { AgentHealth, AgentRecord } from '../../types';
import { IAgentRepository } from '../../domain/repositories/IAgentRepository';
import { ICoordinationStore } from '../../domain/store/ICoordinationStore';
import { INotificationPublisher } from '../../domain/notifications/INotificationPublisher';
import { IEventBus } from '../../domain/events/IEventBus';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';

/** `${agentId}|${lastActivity}` of each reported stale episode -> when it was reported */
export const DOWN_NOTIFIED_KEY = 'liveness:down_notified';

/** Sentinel stored for agents reported down without ever sending a heartbeat. */
const NEVER = 'never';

const episodeField = (agentId: string, marker: string): string => `${agentId}|${marker}`;

export interface LivenessThresholds {
  activeMs: number;
  idleMs: number;
}

export interface AgentHealthReport {
  agentId: string;
  health: AgentHealth;
  lastActivity: string | null;
}

export function classifyHealth(lastActivity: string | null, now: Date, thresholds: LivenessThresholds): AgentHealth {
  if (!lastActivity) return 'unknown';
  const at = Date.parse(lastActivity);
  if (Number.isNaN(at)) return 'unknown';

  const age = now.getTime() - at;
  if (age < thresholds.activeMs) return 'active';
  if (age < thresholds.idleMs) return 'idle';
  return 'stale';
}

/**
 * Derives agent health from heartbeat age and reports each stale episode once.
 * Reads agent records only; its own bookkeeping lives under DOWN_NOTIFIED_KEY.
 */
export class LivenessMonitor {
  constructor(
    private agentRepo: IAgentRepository,
    private store: ICoordinationStore,
    private notifications: INotificationPublisher,
    private eventBus: IEventBus,
    private clock: IClock,
    private logger: ILogger,
    private thresholds: LivenessThresholds
  ) {}

  async health(agentId: string): Promise<AgentHealth> {
    const agent = await this.agentRepo.findById(agentId);
    if (!agent) {
      throw new NotFoundError('Agent', agentId);
    }
    return classifyHealth(agent.lastActivity, this.clock.now(), this.thresholds);
  }

  /**
   * Classify every registered agent and raise `agent_down` for agents that went stale
   * since the last report.
   */
  async check(): Promise<AgentHealthReport[]> {
    const now = this.clock.now();
    const reports: AgentHealthReport[] = [];

    for (const agent of await this.agentRepo.findAll()) {
      const health = classifyHealth(agent.lastActivity, now, this.thresholds);
      reports.push({ agentId: agent.id, health, lastActivity: agent.lastActivity });

      if (health === 'stale') {
        await this.reportDown(agent);
      } else if (health !== 'unknown') {
        await this.clearEpisodes(agent.id);
      }
    }

    return reports;
  }

  private async reportDown(agent: AgentRecord): Promise<void> {
    const field = episodeField(agent.id, agent.lastActivity ?? NEVER);
    // Only the monitor that claims the episode field reports it
    if (!(await this.store.hsetnx(DOWN_NOTIFIED_KEY, field, this.clock.now().toISOString()))) return;
    await this.clearEpisodes(agent.id, field);

    this.logger.warn(`Agent ${agent.id} is stale`, { lastActivity: agent.lastActivity, currentTask: agent.currentTask });
    await this.notifications.publish('agent_down', {
      agentId: agent.id,
      lastActivity: agent.lastActivity,
      currentTask: agent.currentTask,
    });
    await this.eventBus.emit('agent:down', { agentId: agent.id, lastActivity: agent.lastActivity });
  }

  private async clearEpisodes(agentId: string, keep?: string): Promise<void> {
    const fields = Object.keys(await this.store.hgetall(DOWN_NOTIFIED_KEY))
      .filter(field => field.startsWith(`${agentId}|`) && field !== keep);
    if (fields.length > 0) {
      await this.store.hdel(DOWN_NOTIFIED_KEY, ...fields);
    }
  }
}
