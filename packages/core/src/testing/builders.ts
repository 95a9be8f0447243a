import type { LocalMessage } from '../domain/message/local-message.js';
import type { RunRecord } from '../domain/run/run-record.js';
import { toIsoTimestamp } from '../domain/run/timestamps.js';
import { createEntry, type TranscriptEntry } from '../domain/transcript/transcript-entry.js';

/** 2023-11-14T22:13:20.000Z */
export const BASE_MS = 1_700_000_000_000;

export function at(offsetSeconds: number): number {
  return BASE_MS + offsetSeconds * 1000;
}

export function iso(offsetSeconds: number): string {
  return new Date(at(offsetSeconds)).toISOString();
}

export function makeRun(overrides: Partial<RunRecord> & { runId: string }): RunRecord {
  const createdAtMs = overrides.createdAtMs === undefined ? BASE_MS : overrides.createdAtMs;
  return {
    parentRunId: null,
    teamId: null,
    teamName: null,
    agentId: null,
    agentName: null,
    status: 'completed',
    inputContent: null,
    content: null,
    events: [],
    memberResponses: [],
    ...overrides,
    createdAtMs,
    createdAt: toIsoTimestamp(createdAtMs),
  };
}

export function makeLocal(overrides: Partial<LocalMessage> & { id: string }): LocalMessage {
  return {
    sessionId: 'session-1',
    userId: 'user-1',
    role: 'user',
    content: '',
    createdAt: iso(0),
    agentId: null,
    metadata: {},
    ...overrides,
  };
}

let nextSequence = 1000;

export function makeEntry(
  overrides: Partial<TranscriptEntry> & Pick<TranscriptEntry, 'messageId' | 'role' | 'content'>,
): TranscriptEntry {
  return createEntry({
    timestampMs: BASE_MS,
    sequence: nextSequence++,
    origin: 'run-log',
    ...overrides,
  });
}
