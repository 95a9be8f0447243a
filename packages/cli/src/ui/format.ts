import type { AgentRef, Attachment, CanonicalMessage, RunStatus } from '@threadmerge/core';

/** `2023-11-14T22:13:20.000Z` as `2023-11-14 22:13:20` (UTC). */
export function formatTimestamp(timestamp: string | null): string {
  if (!timestamp) return '--';
  return timestamp.replace('T', ' ').slice(0, 19);
}

export function speakerLabel(message: Pick<CanonicalMessage, 'role' | 'agentName' | 'teamName'>): string {
  const role = message.role.charAt(0).toUpperCase() + message.role.slice(1);
  const agent = message.role === 'assistant' ? (message.agentName ?? message.teamName) : null;
  return agent ? `${role} (${agent})` : role;
}

export function agentLabel(agent: AgentRef): string {
  return agent.agentName ?? agent.agentId ?? agent.agentPublicId ?? 'unknown agent';
}

export function formatAgents(agents: readonly AgentRef[]): string {
  return agents.map(agentLabel).join(', ');
}

export function formatAttachments(attachments: readonly Attachment[]): string {
  return attachments.map((a) => a.filename ?? a.url ?? a.attachmentId).join(', ');
}

/** An assistant message still being written, with nothing to show yet. */
export function isPendingReply(message: Pick<CanonicalMessage, 'role' | 'status' | 'content'>): boolean {
  return message.role === 'assistant' && message.status === 'streaming' && message.content === '';
}

export function runStatusIcon(status: RunStatus): string {
  if (status === 'completed') return '✓';
  if (status === 'failed') return '✗';
  return '▶';
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 1))}…`;
}
