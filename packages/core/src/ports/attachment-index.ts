import type { Attachment } from '../domain/message/attachment.js';
import type { MessageRole } from '../domain/message/local-message.js';

export interface AttachmentIndex {
  /** Attachments per message id, keyed by the lowercased id. */
  listAttachments(messageIds: readonly string[]): Promise<Map<string, Attachment[]>>;
  /**
   * Attachments filed under a content signature, for messages whose id
   * changed since the attachment was stored.
   */
  findByContentSignature(role: MessageRole, contentPrefix: string): Promise<Attachment[]>;
}
