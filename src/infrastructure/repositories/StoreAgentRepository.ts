import { AgentRecord, AgentStatus } from '../../types';
import { IAgentRepository, AgentPatch } from '../../domain/repositories/IAgentRepository';
import { ICoordinationStore } from '../../domain/store/ICoordinationStore';
import { NotFoundError } from '../../domain/common/Errors';

const AGENT_INDEX_KEY = 'agents:index';
const AGENT_STATUSES: readonly AgentStatus[] = ['active', 'busy', 'idle', 'error', 'unknown'];

const agentKey = (id: string) => `agent:${id}`;

/**
 * Agent records stored as one hash per agent in the coordination store.
 */
export class StoreAgentRepository implements IAgentRepository {
  constructor(private store: ICoordinationStore) {}

  private fromHash(hash: Record<string, string>): AgentRecord {
    return {
      id: hash.id,
      status: AGENT_STATUSES.find(s => s === hash.status) ?? 'unknown',
      currentTask: hash.current_task || null,
      lastActivity: hash.last_activity || null,
      registeredAt: hash.registered_at ?? '',
    };
  }

  async upsert(agent: AgentRecord): Promise<AgentRecord> {
    const created = await this.store.hsetnx(agentKey(agent.id), 'id', agent.id);
    if (created) {
      await this.store.sadd(AGENT_INDEX_KEY, agent.id);
      await this.update(agent.id, {
        status: agent.status,
        currentTask: agent.currentTask,
        lastActivity: agent.lastActivity,
      });
      await this.store.hset(agentKey(agent.id), { registered_at: agent.registeredAt });
    }

    const stored = await this.findById(agent.id);
    if (!stored) {
      throw new NotFoundError('Agent', agent.id);
    }
    return stored;
  }

  async findById(id: string): Promise<AgentRecord | null> {
    const hash = await this.store.hgetall(agentKey(id));
    if (!hash.id) return null;
    return this.fromHash(hash);
  }

  async findAll(): Promise<AgentRecord[]> {
    const ids = (await this.store.smembers(AGENT_INDEX_KEY)).sort();
    const agents: AgentRecord[] = [];
    for (const id of ids) {
      const agent = await this.findById(id);
      if (agent) agents.push(agent);
    }
    return agents;
  }

  async update(id: string, patch: AgentPatch): Promise<AgentRecord> {
    if ((await this.store.hget(agentKey(id), 'id')) === null) {
      throw new NotFoundError('Agent', id);
    }

    const set: Record<string, string> = {};
    const clear: string[] = [];
    const assign = (field: string, value: string | null | undefined) => {
      if (value === undefined) return;
      if (value === null) clear.push(field);
      else set[field] = value;
    };
    assign('status', patch.status);
    assign('current_task', patch.currentTask);
    assign('last_activity', patch.lastActivity);

    await this.store.hset(agentKey(id), set);
    if (clear.length > 0) {
      await this.store.hdel(agentKey(id), ...clear);
    }

    const updated = await this.findById(id);
    if (!updated) {
      throw new NotFoundError('Agent', id);
    }
    return updated;
  }
}
