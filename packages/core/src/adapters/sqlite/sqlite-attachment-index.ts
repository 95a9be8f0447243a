import { randomUUID } from 'node:crypto';
import type { Attachment } from '../../domain/message/attachment.js';
import type { MessageRole } from '../../domain/message/local-message.js';
import type { AttachmentIndex } from '../../ports/attachment-index.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { placeholders, type SqliteDatabase } from './database.js';

interface AttachmentRow {
  id: string;
  message_id: string | null;
  filename: string | null;
  url: string | null;
  content_type: string | null;
  size: number | null;
}

function toAttachment(row: AttachmentRow): Attachment {
  return {
    attachmentId: row.id,
    filename: row.filename,
    url: row.url,
    contentType: row.content_type,
    size: row.size,
  };
}

export interface StoredAttachment extends Attachment {
  messageId: string | null;
  /** `role:prefix` of the message the file was sent with; see contentSignature. */
  contentSignature?: string | null;
}

export class SqliteAttachmentIndex implements AttachmentIndex {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: Clock = systemClock,
  ) {}

  async addAttachment(attachment: StoredAttachment): Promise<void> {
    this.db
      .prepare<[string, string | null, string | null, string | null, string | null, number | null, string | null, string]>(
        `INSERT OR REPLACE INTO attachments (id, message_id, filename, url, content_type, size, content_signature, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        attachment.attachmentId || randomUUID(),
        attachment.messageId,
        attachment.filename,
        attachment.url,
        attachment.contentType ?? null,
        attachment.size ?? null,
        attachment.contentSignature ?? null,
        new Date(this.clock.now()).toISOString(),
      );
  }

  async listAttachments(messageIds: readonly string[]): Promise<Map<string, Attachment[]>> {
    const byMessage = new Map<string, Attachment[]>();
    const ids = [...new Set(messageIds.map((id) => id.toLowerCase()))];
    if (ids.length === 0) return byMessage;

    const rows = this.db
      .prepare<string[], AttachmentRow>(
        `SELECT id, message_id, filename, url, content_type, size
         FROM attachments
         WHERE lower(message_id) IN (${placeholders(ids.length)})
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(...ids);

    for (const row of rows) {
      if (!row.message_id) continue;
      const key = row.message_id.toLowerCase();
      const list = byMessage.get(key) ?? [];
      list.push(toAttachment(row));
      byMessage.set(key, list);
    }
    return byMessage;
  }

  async findByContentSignature(role: MessageRole, contentPrefix: string): Promise<Attachment[]> {
    if (!contentPrefix) return [];
    return this.db
      .prepare<[string], AttachmentRow>(
        `SELECT id, message_id, filename, url, content_type, size
         FROM attachments
         WHERE content_signature = ?
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(`${role}:${contentPrefix}`)
      .map(toAttachment);
  }
}
