import { AgentRecord } from '../../types';

export type AgentPatch = Partial<Omit<AgentRecord, 'id' | 'registeredAt'>>;

/**
 * Repository interface for Agent Record persistence.
 */
export interface IAgentRepository {
  /**
   * Create the record if absent. Returns the stored record either way.
   */
  upsert(agent: AgentRecord): Promise<AgentRecord>;

  findById(id: string): Promise<AgentRecord | null>;

  findAll(): Promise<AgentRecord[]>;

  /**
   * @throws {NotFoundError} if agent not found
   */
  update(id: string, patch: AgentPatch): Promise<AgentRecord>;
}
