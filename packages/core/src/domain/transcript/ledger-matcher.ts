import { mergeAttachments, type Attachment } from '../message/attachment.js';
import {
  readAttachments,
  readCanonicalMessageId,
  readCustomFields,
  readStreamId,
  type LocalMessage,
} from '../message/local-message.js';
import { toEpochMs } from '../run/timestamps.js';
import type { StreamMarker } from '../stream/stream-marker.js';
import { formatContent, normalizeContent } from './content.js';
import {
  DEFAULT_MATCH_THRESHOLDS,
  isContentMatch,
  scoreMatch,
  type MatchKind,
  type MatchSubject,
  type MatchThresholds,
} from './matching.js';
import { createEntry, type TranscriptEntry } from './transcript-entry.js';

/** What happens to an unmatched ledger row older than the newest run. */
export type StaleLocalPolicy = 'retain' | 'drop';

export interface LedgerMatchOptions {
  thresholds?: MatchThresholds;
  staleLocalPolicy?: StaleLocalPolicy;
  includeSystem?: boolean;
  activeMarker?: StreamMarker | null;
  latestRunTimestampMs?: number | null;
  /** First synthesis sequence handed to appended ledger rows. */
  startSequence?: number;
}

export interface LedgerMatch {
  localId: string;
  messageId: string;
  kind: MatchKind;
}

export interface LedgerMatchResult {
  entries: TranscriptEntry[];
  matches: LedgerMatch[];
  appended: string[];
  dropped: string[];
}

interface PreparedLocal {
  local: LocalMessage;
  subject: MatchSubject;
  content: string;
  attachments: Attachment[];
}

function prepare(local: LocalMessage): PreparedLocal {
  const ids = new Set([local.id.toLowerCase()]);
  const canonicalId = readCanonicalMessageId(local.metadata);
  if (canonicalId) ids.add(canonicalId.toLowerCase());
  const content = formatContent(local.content);
  return {
    local,
    content,
    attachments: readAttachments(local.metadata),
    subject: {
      ids,
      role: local.role,
      normalizedContent: normalizeContent(local.content),
      timestampMs: toEpochMs(local.createdAt),
      streamId: readStreamId(local.metadata),
    },
  };
}

function inherit(entry: TranscriptEntry, prepared: PreparedLocal): TranscriptEntry {
  const { local, subject } = prepared;
  return {
    ...entry,
    messageId: local.id,
    localMessageId: local.id,
    agentId: entry.agentId ?? local.agentId,
    attachments: mergeAttachments(entry.attachments, prepared.attachments),
    customFields: { ...entry.customFields, ...readCustomFields(local.metadata) },
    streamId: entry.streamId ?? subject.streamId,
  };
}

function toStandaloneEntry(prepared: PreparedLocal, sequence: number): TranscriptEntry {
  const { local, subject } = prepared;
  return createEntry({
    messageId: local.id,
    role: local.role,
    content: prepared.content,
    timestampMs: subject.timestampMs,
    sequence,
    origin: 'ledger',
    agentId: local.agentId,
    attachments: prepared.attachments,
    customFields: readCustomFields(local.metadata),
    streamId: subject.streamId,
    localMessageId: local.id,
  });
}

/**
 * Align ledger rows with the messages synthesized from the run log. Each pass
 * (identity, content, stream) runs over every remaining row before the next
 * starts; a synthesized message absorbs at most one row. Rows left over are
 * appended as messages of their own, subject to `staleLocalPolicy`.
 */
export function matchLedger(
  synthesized: readonly TranscriptEntry[],
  locals: readonly LocalMessage[],
  options: LedgerMatchOptions = {},
): LedgerMatchResult {
  const thresholds = options.thresholds ?? DEFAULT_MATCH_THRESHOLDS;
  const includeSystem = options.includeSystem ?? false;
  const marker = options.activeMarker ?? null;
  const latestRunTimestampMs = options.latestRunTimestampMs ?? null;

  const pending: PreparedLocal[] = [];
  for (const local of locals) {
    if (!includeSystem && local.role === 'system') continue;
    const prepared = prepare(local);
    if (!prepared.content && prepared.attachments.length === 0) continue;
    pending.push(prepared);
  }

  const entries = [...synthesized];
  const claimed = new Set<number>();
  const consumed = new Set<PreparedLocal>();
  const matches: LedgerMatch[] = [];

  const claim = (index: number, prepared: PreparedLocal, kind: MatchKind) => {
    const entry = entries[index];
    if (!entry) return;
    claimed.add(index);
    consumed.add(prepared);
    matches.push({ localId: prepared.local.id, messageId: entry.messageId, kind });
    entries[index] = inherit(entry, prepared);
  };

  // Identity.
  for (const prepared of pending) {
    const index = entries.findIndex(
      (entry, i) => !claimed.has(i) && scoreMatch(prepared.subject, entry, thresholds).kind === 'identity',
    );
    if (index !== -1) claim(index, prepared, 'identity');
  }

  // Content and role, closest in time wins.
  for (const prepared of pending) {
    if (consumed.has(prepared)) continue;
    let best: { index: number; kind: MatchKind; deltaMs: number } | null = null;
    for (let index = 0; index < entries.length; index++) {
      const entry = entries[index];
      if (!entry || claimed.has(index)) continue;
      const score = scoreMatch(prepared.subject, entry, thresholds);
      if (!isContentMatch(score)) continue;
      if (!best || score.deltaMs < best.deltaMs) {
        best = { index, kind: score.kind, deltaMs: score.deltaMs };
      }
    }
    if (best) claim(best.index, prepared, best.kind);
  }

  // Stream: runs known to have produced a stream, from matched rows and the active marker.
  const streamByRun = new Map<string, string>();
  if (marker?.runId) streamByRun.set(marker.runId, marker.streamId);
  for (const match of matches) {
    const entry = entries.find((candidate) => candidate.messageId === match.localId);
    if (entry?.runId && entry.streamId && !streamByRun.has(entry.runId)) {
      streamByRun.set(entry.runId, entry.streamId);
    }
  }
  for (const prepared of pending) {
    if (consumed.has(prepared) || !prepared.subject.streamId) continue;
    const index = entries.findIndex(
      (entry, i) => !claimed.has(i) && scoreMatch(prepared.subject, entry, thresholds, streamByRun).kind === 'stream',
    );
    if (index !== -1) claim(index, prepared, 'stream');
  }

  const leftovers = pending.filter((prepared) => !consumed.has(prepared));
  const markedUserRow = findMarkedUserRow(leftovers, marker);
  const appended: string[] = [];
  const dropped: string[] = [];
  let sequence = options.startSequence ?? 0;

  for (const prepared of leftovers) {
    const timestampMs = prepared.subject.timestampMs;
    const isNewer = latestRunTimestampMs === null || timestampMs === null || timestampMs > latestRunTimestampMs;
    if (!isNewer && options.staleLocalPolicy === 'drop' && prepared !== markedUserRow) {
      dropped.push(prepared.local.id);
      continue;
    }
    entries.push(toStandaloneEntry(prepared, sequence++));
    appended.push(prepared.local.id);
  }

  return { entries, matches, appended, dropped };
}

/**
 * The leftover row an active marker refers to: the one carrying its stream id,
 * else the newest user row that has no stream yet.
 */
function findMarkedUserRow(leftovers: readonly PreparedLocal[], marker: StreamMarker | null): PreparedLocal | null {
  if (!marker) return null;
  const byStream = leftovers.find((prepared) => prepared.subject.streamId === marker.streamId);
  if (byStream) return byStream;
  for (let i = leftovers.length - 1; i >= 0; i--) {
    const prepared = leftovers[i];
    if (prepared && prepared.local.role === 'user' && !prepared.subject.streamId) return prepared;
  }
  return null;
}
