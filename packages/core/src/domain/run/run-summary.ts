import type { AgentRef } from '../agent/agent-ref.js';
import type { RunEvent, RunStatus } from './run-record.js';

export interface RunSummary {
  runId: string;
  parentRunId: string | null;
  agentId: string | null;
  agentName: string | null;
  teamId: string | null;
  teamName: string | null;
  status: RunStatus;
  createdAt: string | null;
  /** Messages this run contributes to the transcript after deduplication. */
  messageCount: number;
  events: RunEvent[];
  memberResponses: AgentRef[];
  childRunIds: string[];
  agentsInvolved: AgentRef[];
}
