import type { LocalMessage, MessageRole } from '../domain/message/local-message.js';

export interface NewLocalMessage {
  id?: string;
  sessionId: string;
  userId: string;
  role: MessageRole;
  content: string;
  createdAt?: string;
  agentId?: string | null;
  metadata?: Record<string, unknown>;
}

export interface LedgerStore {
  /** Messages of one user in one session, oldest first. */
  listMessages(sessionId: string, userId: string): Promise<LocalMessage[]>;
  appendMessage(message: NewLocalMessage): Promise<LocalMessage>;
  /** Returns false when no message has the id. */
  attachStreamId(messageId: string, streamId: string): Promise<boolean>;
}
