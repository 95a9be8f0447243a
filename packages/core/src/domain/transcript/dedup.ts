import { mergeAttachments } from '../message/attachment.js';
import { contentPrefix, normalizeContent } from './content.js';
import type { TranscriptEntry } from './transcript-entry.js';

/** Which assistant messages a fragment is compared against in the containment pass. */
export type ContainmentScope = 'session' | 'run';

export interface DedupOptions {
  signatureToleranceMs?: number;
  containmentScope?: ContainmentScope;
}

export interface DedupResult {
  entries: TranscriptEntry[];
  removed: {
    identity: number;
    signature: number;
    containment: number;
  };
}

export const DEFAULT_SIGNATURE_TOLERANCE_MS = 3_000;

/** The kept message takes over what only the dropped one knew. */
export function absorb(kept: TranscriptEntry, dropped: TranscriptEntry): TranscriptEntry {
  return {
    ...kept,
    localMessageId: kept.localMessageId ?? dropped.localMessageId,
    agentId: kept.agentId ?? dropped.agentId,
    streamId: kept.streamId ?? dropped.streamId,
    attachments: mergeAttachments(kept.attachments, dropped.attachments),
    customFields: { ...dropped.customFields, ...kept.customFields },
  };
}

function isLater(a: TranscriptEntry, b: TranscriptEntry): boolean {
  const aTime = a.timestampMs ?? Number.NEGATIVE_INFINITY;
  const bTime = b.timestampMs ?? Number.NEGATIVE_INFINITY;
  return aTime !== bTime ? aTime > bTime : a.sequence > b.sequence;
}

function gap(a: TranscriptEntry, b: TranscriptEntry): number {
  if (a.timestampMs === null && b.timestampMs === null) return 0;
  if (a.timestampMs === null || b.timestampMs === null) return Number.POSITIVE_INFINITY;
  return Math.abs(a.timestampMs - b.timestampMs);
}

// Two different ledger rows are two sends; collapsing them would lose one.
function holdsDistinctRows(a: TranscriptEntry, b: TranscriptEntry): boolean {
  return a.localMessageId !== null && b.localMessageId !== null && a.localMessageId !== b.localMessageId;
}

/** Tracks how many messages each run still has, so no run loses its last one. */
class RunCounter {
  private readonly counts = new Map<string, number>();

  constructor(entries: readonly TranscriptEntry[]) {
    for (const entry of entries) {
      if (entry.runId) this.counts.set(entry.runId, (this.counts.get(entry.runId) ?? 0) + 1);
    }
  }

  canRemove(entry: TranscriptEntry): boolean {
    return !entry.runId || (this.counts.get(entry.runId) ?? 0) > 1;
  }

  remove(entry: TranscriptEntry): void {
    if (entry.runId) this.counts.set(entry.runId, (this.counts.get(entry.runId) ?? 0) - 1);
  }
}

function identityPass(entries: readonly TranscriptEntry[]): TranscriptEntry[] {
  const counter = new RunCounter(entries);
  const keptByKey = new Map<string, number>();
  const result: Array<TranscriptEntry | null> = [];

  for (const entry of entries) {
    const key = entry.messageId.toLowerCase();
    const keptIndex = keptByKey.get(key);
    const kept = keptIndex === undefined ? null : result[keptIndex];
    if (keptIndex === undefined || !kept) {
      keptByKey.set(key, result.length);
      result.push(entry);
      continue;
    }
    const [winner, loser] = isLater(entry, kept) ? [entry, kept] : [kept, entry];
    if (!counter.canRemove(loser)) {
      result.push(entry);
      continue;
    }
    counter.remove(loser);
    result[keptIndex] = absorb(winner, loser);
  }

  return result.filter((entry): entry is TranscriptEntry => entry !== null);
}

function signaturePass(entries: readonly TranscriptEntry[], toleranceMs: number): TranscriptEntry[] {
  const counter = new RunCounter(entries);
  const groups = new Map<string, number[]>();
  entries.forEach((entry, index) => {
    const key = `${entry.role}|${entry.runId ?? ''}|${contentPrefix(entry.content)}`;
    const group = groups.get(key) ?? [];
    group.push(index);
    groups.set(key, group);
  });

  const result: Array<TranscriptEntry | null> = [...entries];
  for (const group of groups.values()) {
    if (group.length < 2) continue;
    const ordered = [...group].sort((a, b) => {
      const left = entries[a];
      const right = entries[b];
      if (!left || !right) return 0;
      return isLater(left, right) ? 1 : -1;
    });

    let keptIndex: number | null = null;
    for (const index of ordered) {
      const current = result[index];
      const previous = keptIndex === null ? null : result[keptIndex];
      if (keptIndex === null || !current || !previous) {
        keptIndex = index;
        continue;
      }
      const collapses =
        gap(previous, current) <= toleranceMs && !holdsDistinctRows(previous, current) && counter.canRemove(previous);
      if (collapses) {
        counter.remove(previous);
        result[index] = absorb(current, previous);
        result[keptIndex] = null;
      }
      keptIndex = index;
    }
  }

  return result.filter((entry): entry is TranscriptEntry => entry !== null);
}

function containmentPass(entries: readonly TranscriptEntry[], scope: ContainmentScope): TranscriptEntry[] {
  const counter = new RunCounter(entries);
  const result: Array<TranscriptEntry | null> = [...entries];
  const normalized = entries.map((entry) => normalizeContent(entry.content));

  // Shortest first, so a fragment of a fragment ends up in the longest text.
  const assistantIndexes = entries
    .map((entry, index) => ({ entry, index }))
    .filter(({ entry, index }) => entry.role === 'assistant' && (normalized[index] ?? '') !== '')
    .sort((a, b) => (normalized[a.index] ?? '').length - (normalized[b.index] ?? '').length)
    .map(({ index }) => index);

  for (const index of assistantIndexes) {
    const fragment = result[index];
    const text = normalized[index] ?? '';
    if (!fragment || !counter.canRemove(fragment)) continue;

    let containerIndex: number | null = null;
    for (let i = assistantIndexes.length - 1; i >= 0; i--) {
      const candidateIndex = assistantIndexes[i];
      if (candidateIndex === undefined || candidateIndex === index) continue;
      const candidate = result[candidateIndex];
      const candidateText = normalized[candidateIndex] ?? '';
      if (!candidate || candidateText.length <= text.length || !candidateText.includes(text)) continue;
      if (scope === 'run' && candidate.runId !== fragment.runId) continue;
      if (holdsDistinctRows(candidate, fragment)) continue;
      containerIndex = candidateIndex;
      break;
    }
    if (containerIndex === null) continue;

    const container = result[containerIndex];
    if (!container) continue;
    counter.remove(fragment);
    result[containerIndex] = absorb(container, fragment);
    result[index] = null;
  }

  return result.filter((entry): entry is TranscriptEntry => entry !== null);
}

/**
 * Collapse duplicates in three passes: same id, same content signature within
 * a run and a few seconds of each other, and assistant fragments contained in
 * a longer assistant message.
 */
export function dedupe(entries: readonly TranscriptEntry[], options: DedupOptions = {}): DedupResult {
  const toleranceMs = options.signatureToleranceMs ?? DEFAULT_SIGNATURE_TOLERANCE_MS;
  const scope = options.containmentScope ?? 'session';

  const afterIdentity = identityPass(entries);
  const afterSignature = signaturePass(afterIdentity, toleranceMs);
  const afterContainment = containmentPass(afterSignature, scope);

  return {
    entries: afterContainment,
    removed: {
      identity: entries.length - afterIdentity.length,
      signature: afterIdentity.length - afterSignature.length,
      containment: afterSignature.length - afterContainment.length,
    },
  };
}
