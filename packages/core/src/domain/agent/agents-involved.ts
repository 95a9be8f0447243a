import type { RunRecord } from '../run/run-record.js';
import { isEmptyAgentRef, type AgentRecord, type AgentRef } from './agent-ref.js';

/** Directory rows fetched for one read, looked up by id, public id or lowercase name. */
export class AgentIndex {
  private readonly byId = new Map<string, AgentRecord>();
  private readonly byName = new Map<string, AgentRecord>();

  constructor(records: readonly AgentRecord[] = []) {
    for (const record of records) {
      this.byId.set(record.id.toLowerCase(), record);
      if (record.publicId) this.byId.set(record.publicId.toLowerCase(), record);
      const name = record.name.trim().toLowerCase();
      if (name && !this.byName.has(name)) this.byName.set(name, record);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  findById(id: string | null): AgentRecord | null {
    return id ? (this.byId.get(id.toLowerCase()) ?? null) : null;
  }

  findByName(name: string | null): AgentRecord | null {
    return name ? (this.byName.get(name.trim().toLowerCase()) ?? null) : null;
  }

  /**
   * Current identity of a referenced agent. Legacy refs carry the agent's
   * name in the id field, so an id that is not found is tried as a name.
   * Refs the directory does not know keep their historical fields.
   */
  resolve(ref: AgentRef): AgentRef {
    const record =
      this.findById(ref.agentId) ??
      this.findById(ref.agentPublicId) ??
      this.findByName(ref.agentId) ??
      this.findByName(ref.agentName);
    if (!record) return ref;
    return { agentId: record.id, agentPublicId: record.publicId, agentName: record.name };
  }
}

export function dedupeAgentRefs(refs: readonly AgentRef[]): AgentRef[] {
  const seenIds = new Set<string>();
  const seenNames = new Set<string>();
  const unique: AgentRef[] = [];
  for (const ref of refs) {
    if (isEmptyAgentRef(ref)) continue;
    const id = ref.agentId?.toLowerCase() ?? null;
    const name = ref.agentName?.trim().toLowerCase() ?? null;
    if (id ? seenIds.has(id) : name !== null && seenNames.has(name)) continue;
    if (!id && !name) continue;
    if (id) seenIds.add(id);
    if (name) seenNames.add(name);
    unique.push(ref);
  }
  return unique;
}

function ownAgent(run: RunRecord): AgentRef {
  return { agentId: run.agentId, agentPublicId: null, agentName: run.agentName };
}

function eventAgents(run: RunRecord): AgentRef[] {
  return run.events
    .filter((event) => event.agentId || event.agentName)
    .map((event) => ({ agentId: event.agentId, agentPublicId: null, agentName: event.agentName }));
}

/** Every agent id and name a run tree mentions, for the batched directory lookups. */
export function referencedAgents(runs: readonly RunRecord[]): AgentRef[] {
  const refs: AgentRef[] = [];
  for (const run of runs) {
    refs.push(ownAgent(run), ...run.memberResponses, ...eventAgents(run));
  }
  return refs.filter((ref) => !isEmptyAgentRef(ref));
}

export interface RollupInput {
  run: RunRecord;
  /** Team id after detection; a team run counts as a delegation. */
  teamId: string | null;
  childRunsByParent: ReadonlyMap<string, readonly RunRecord[]>;
  agents: AgentIndex;
}

/**
 * Agents that took part in a run: the primary agent when the run delegated,
 * every member response and event agent, and the same for each descendant
 * run together with the descendant's own agent.
 */
export function rollupAgentsInvolved({ run, teamId, childRunsByParent, agents }: RollupInput): AgentRef[] {
  const children = childRunsByParent.get(run.runId) ?? [];
  const isDelegation = teamId !== null || run.memberResponses.length > 0 || children.length > 0;

  const refs: AgentRef[] = [];
  if (isDelegation) refs.push(ownAgent(run));
  refs.push(...run.memberResponses, ...eventAgents(run));

  const visited = new Set<string>([run.runId]);
  const queue = [...children];
  while (queue.length > 0) {
    const child = queue.shift();
    if (!child || visited.has(child.runId)) continue;
    visited.add(child.runId);
    refs.push(ownAgent(child), ...child.memberResponses, ...eventAgents(child));
    queue.push(...(childRunsByParent.get(child.runId) ?? []));
  }

  return dedupeAgentRefs(refs.map((ref) => agents.resolve(ref)));
}
