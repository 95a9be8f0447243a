import type { CanonicalMessage } from '../message/canonical-message.js';
import { toIsoTimestamp } from '../run/timestamps.js';

export type EntryOrigin = 'run-log' | 'ledger' | 'placeholder';

/** A CanonicalMessage while it moves through the pipeline, with its sort keys. */
export interface TranscriptEntry extends CanonicalMessage {
  timestampMs: number | null;
  /** Synthesis order; breaks timestamp ties so a run's user message precedes its reply. */
  sequence: number;
  origin: EntryOrigin;
}

type RequiredEntryFields = Pick<TranscriptEntry, 'messageId' | 'role' | 'content' | 'timestampMs' | 'sequence' | 'origin'>;

export function createEntry(fields: RequiredEntryFields & Partial<TranscriptEntry>): TranscriptEntry {
  return {
    timestamp: toIsoTimestamp(fields.timestampMs),
    runId: null,
    agentId: null,
    agentPublicId: null,
    agentName: null,
    teamId: null,
    teamName: null,
    attachments: [],
    agentsInvolved: [],
    feedback: null,
    streamId: null,
    localMessageId: null,
    customFields: {},
    status: 'complete',
    ...fields,
  };
}

// Missing timestamps sort first.
export function compareEntries(a: TranscriptEntry, b: TranscriptEntry): number {
  if (a.timestampMs !== b.timestampMs) {
    if (a.timestampMs === null) return -1;
    if (b.timestampMs === null) return 1;
    return a.timestampMs - b.timestampMs;
  }
  return a.sequence - b.sequence;
}

export function sortEntries(entries: readonly TranscriptEntry[]): TranscriptEntry[] {
  return [...entries].sort(compareEntries);
}

export function toCanonicalMessage(entry: TranscriptEntry): CanonicalMessage {
  const { timestampMs: _timestampMs, sequence: _sequence, origin: _origin, ...message } = entry;
  return message;
}
