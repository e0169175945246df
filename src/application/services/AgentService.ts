import { AgentRecord, HeartbeatPayload } from '../../types';
import { IAgentRepository, AgentPatch } from '../../domain/repositories/IAgentRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';

const AGENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;

/**
 * Application service for agent records. Agents report in through heartbeats;
 * health is derived from them by the liveness monitor.
 */
export class AgentService {
  constructor(
    private agentRepo: IAgentRepository,
    private eventBus: IEventBus,
    private clock: IClock,
    private logger: ILogger
  ) {}

  /**
   * Register an agent. Registering an existing agent returns its record unchanged.
   */
  async register(id: string): Promise<AgentRecord> {
    if (!AGENT_ID_PATTERN.test(id)) {
      throw new ValidationError(`Invalid agent id '${id}'`);
    }

    const agent = await this.agentRepo.upsert({
      id,
      status: 'unknown',
      currentTask: null,
      lastActivity: null,
      registeredAt: this.clock.now().toISOString(),
    });
    this.logger.debug(`Agent registered: ${id}`);
    return agent;
  }

  /**
   * Record activity. Unknown agents are registered on their first heartbeat.
   */
  async heartbeat(id: string, payload: HeartbeatPayload = {}): Promise<AgentRecord> {
    await this.register(id);

    const patch: AgentPatch = {
      lastActivity: this.clock.now().toISOString(),
      status: payload.status ?? 'active',
    };
    if (payload.currentTask !== undefined) {
      patch.currentTask = payload.currentTask;
    }

    const agent = await this.agentRepo.update(id, patch);
    await this.eventBus.emit('agent:heartbeat', agent);
    return agent;
  }

  async get(id: string): Promise<AgentRecord> {
    const agent = await this.agentRepo.findById(id);
    if (!agent) {
      throw new NotFoundError('Agent', id);
    }
    return agent;
  }

  async list(): Promise<AgentRecord[]> {
    return this.agentRepo.findAll();
  }
}
