import type { RunRecord } from '../domain/run/run-record.js';

export interface RunLogProvider {
  /** All runs recorded for the session; an unknown session has none. */
  fetchRuns(sessionId: string): Promise<RunRecord[]>;
}
