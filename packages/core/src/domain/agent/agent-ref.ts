/** An agent as referenced by a run, an event, a member response or a message. */
export interface AgentRef {
  agentId: string | null;
  agentPublicId: string | null;
  agentName: string | null;
}

export interface AgentRecord {
  id: string;
  publicId: string | null;
  name: string;
}

export function isEmptyAgentRef(ref: AgentRef): boolean {
  return !ref.agentId && !ref.agentPublicId && !ref.agentName;
}
