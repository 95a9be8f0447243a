import type { AgentRef } from '../agent/agent-ref.js';
import type { Attachment } from './attachment.js';
import type { Feedback } from './feedback.js';
import type { MessageRole } from './local-message.js';

export type MessageStatus = 'complete' | 'streaming';

/** A message of the reconciled transcript. Exists only for the duration of one read. */
export interface CanonicalMessage {
  messageId: string;
  role: MessageRole;
  content: string;
  timestamp: string | null;
  runId: string | null;
  agentId: string | null;
  agentPublicId: string | null;
  agentName: string | null;
  teamId: string | null;
  teamName: string | null;
  attachments: Attachment[];
  agentsInvolved: AgentRef[];
  /** Assistant messages only; always null for other roles. */
  feedback: Feedback | null;
  streamId: string | null;
  localMessageId: string | null;
  customFields: Record<string, unknown>;
  status: MessageStatus;
}
