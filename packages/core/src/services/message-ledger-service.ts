import type { Attachment } from '../domain/message/attachment.js';
import type { LocalMessage, MessageRole } from '../domain/message/local-message.js';
import type { LedgerStore } from '../ports/ledger-store.js';
import { ThreadmergeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('message-ledger');

export interface RecordMessageInput {
  sessionId: string;
  userId: string;
  content: string;
  role?: MessageRole;
  agentId?: string | null;
  attachments?: Attachment[];
  customFields?: Record<string, unknown>;
}

/** Send-time writes: the only changes the engine makes to the ledger. */
export class MessageLedgerService {
  constructor(private readonly ledger: LedgerStore) {}

  async recordMessage(input: RecordMessageInput): Promise<LocalMessage> {
    const attachments = input.attachments ?? [];
    if (!input.content.trim() && attachments.length === 0) {
      throw new ThreadmergeError('a message needs content or at least one attachment', 'EMPTY_MESSAGE');
    }

    const metadata: Record<string, unknown> = {};
    if (attachments.length > 0) {
      metadata.attachments = attachments.map((attachment) => ({
        attachment_id: attachment.attachmentId,
        filename: attachment.filename,
        blob_url: attachment.url,
        content_type: attachment.contentType ?? null,
        file_size: attachment.size ?? null,
      }));
    }
    if (input.customFields && Object.keys(input.customFields).length > 0) {
      metadata.custom_fields = input.customFields;
    }

    const message = await this.ledger.appendMessage({
      sessionId: input.sessionId,
      userId: input.userId,
      role: input.role ?? 'user',
      content: input.content,
      agentId: input.agentId ?? null,
      metadata,
    });
    log.info(`recordMessage: ${message.role} message ${message.id} in session ${message.sessionId}`);
    return message;
  }

  /** Link the message the user just sent to the response stream answering it. */
  async attachStream(messageId: string, streamId: string): Promise<void> {
    const attached = await this.ledger.attachStreamId(messageId, streamId);
    if (!attached) {
      throw new ThreadmergeError(`no ledger message ${messageId}`, 'MESSAGE_NOT_FOUND');
    }
    log.debug(`attachStream: ${messageId} -> ${streamId}`);
  }
}
