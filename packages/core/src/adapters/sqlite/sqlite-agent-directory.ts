import type { AgentRecord } from '../../domain/agent/agent-ref.js';
import type { AgentDirectory } from '../../ports/agent-directory.js';
import { placeholders, type SqliteDatabase } from './database.js';

interface AgentRow {
  id: string;
  public_id: string | null;
  name: string;
}

function toRecord(row: AgentRow): AgentRecord {
  return { id: row.id, publicId: row.public_id, name: row.name };
}

export class SqliteAgentDirectory implements AgentDirectory {
  constructor(private readonly db: SqliteDatabase) {}

  async upsertAgent(agent: AgentRecord): Promise<void> {
    this.db
      .prepare<[string, string | null, string]>(
        `INSERT INTO agents (id, public_id, name) VALUES (?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET public_id = excluded.public_id, name = excluded.name`,
      )
      .run(agent.id, agent.publicId, agent.name);
  }

  async getAgents(ids: readonly string[]): Promise<AgentRecord[]> {
    const wanted = [...new Set(ids.map((id) => id.toLowerCase()))];
    if (wanted.length === 0) return [];
    const list = placeholders(wanted.length);
    return this.db
      .prepare<string[], AgentRow>(
        `SELECT id, public_id, name FROM agents
         WHERE lower(id) IN (${list}) OR lower(public_id) IN (${list})`,
      )
      .all(...wanted, ...wanted)
      .map(toRecord);
  }

  async findAgentsByName(names: readonly string[]): Promise<AgentRecord[]> {
    const wanted = [...new Set(names.map((name) => name.trim().toLowerCase()).filter(Boolean))];
    if (wanted.length === 0) return [];
    return this.db
      .prepare<string[], AgentRow>(`SELECT id, public_id, name FROM agents WHERE lower(name) IN (${placeholders(wanted.length)})`)
      .all(...wanted)
      .map(toRecord);
  }
}
