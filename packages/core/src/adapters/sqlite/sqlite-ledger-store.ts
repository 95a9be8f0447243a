import { randomUUID } from 'node:crypto';
import { isMessageRole, type LocalMessage } from '../../domain/message/local-message.js';
import type { LedgerStore, NewLocalMessage } from '../../ports/ledger-store.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { isRecord } from '../../shared/guards.js';
import { createLogger } from '../../shared/logger.js';
import type { SqliteDatabase } from './database.js';

const log = createLogger('sqlite-ledger');

interface MessageRow {
  id: string;
  session_id: string;
  user_id: string;
  role: string;
  content: string;
  created_at: string;
  agent_id: string | null;
  metadata_json: string;
}

function parseMetadata(json: string, messageId: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : {};
  } catch {
    log.warn(`message ${messageId} has unreadable metadata, treating it as empty`);
    return {};
  }
}

function toLocalMessage(row: MessageRow): LocalMessage | null {
  if (!isMessageRole(row.role)) {
    log.warn(`message ${row.id} has unknown role ${row.role}, skipping`);
    return null;
  }
  return {
    id: row.id,
    sessionId: row.session_id,
    userId: row.user_id,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
    agentId: row.agent_id,
    metadata: parseMetadata(row.metadata_json, row.id),
  };
}

export class SqliteLedgerStore implements LedgerStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: Clock = systemClock,
  ) {}

  async listMessages(sessionId: string, userId: string): Promise<LocalMessage[]> {
    const rows = this.db
      .prepare<[string, string], MessageRow>(
        `SELECT id, session_id, user_id, role, content, created_at, agent_id, metadata_json
         FROM messages
         WHERE session_id = ? AND user_id = ?
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(sessionId, userId);

    const messages: LocalMessage[] = [];
    for (const row of rows) {
      const message = toLocalMessage(row);
      if (message) messages.push(message);
    }
    return messages;
  }

  async appendMessage(input: NewLocalMessage): Promise<LocalMessage> {
    const message: LocalMessage = {
      id: input.id ?? randomUUID(),
      sessionId: input.sessionId,
      userId: input.userId,
      role: input.role,
      content: input.content,
      createdAt: input.createdAt ?? new Date(this.clock.now()).toISOString(),
      agentId: input.agentId ?? null,
      metadata: input.metadata ?? {},
    };

    this.db
      .prepare<[string, string, string, string, string, string, string | null, string]>(
        `INSERT INTO messages (id, session_id, user_id, role, content, created_at, agent_id, metadata_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        message.id,
        message.sessionId,
        message.userId,
        message.role,
        message.content,
        message.createdAt,
        message.agentId,
        JSON.stringify(message.metadata),
      );

    log.debug(`appendMessage: ${message.role} message ${message.id} in ${message.sessionId}`);
    return message;
  }

  async attachStreamId(messageId: string, streamId: string): Promise<boolean> {
    const attach = this.db.transaction((id: string, stream: string): boolean => {
      const row = this.db
        .prepare<[string], { metadata_json: string }>('SELECT metadata_json FROM messages WHERE id = ?')
        .get(id);
      if (!row) return false;
      const metadata = { ...parseMetadata(row.metadata_json, id), stream_id: stream };
      this.db
        .prepare<[string, string]>('UPDATE messages SET metadata_json = ? WHERE id = ?')
        .run(JSON.stringify(metadata), id);
      return true;
    });

    const attached = attach(messageId, streamId);
    if (!attached) log.warn(`attachStreamId: no message ${messageId}`);
    return attached;
  }
}
