import type { AgentRecord } from '../domain/agent/agent-ref.js';

export interface AgentDirectory {
  /** Agents whose id or public id is in `ids`. */
  getAgents(ids: readonly string[]): Promise<AgentRecord[]>;
  /** Case-insensitive name lookup, for refs that recorded a name where an id belongs. */
  findAgentsByName(names: readonly string[]): Promise<AgentRecord[]>;
}
