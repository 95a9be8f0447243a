import type { MessageRole } from '../message/local-message.js';
import { normalizeContent } from './content.js';
import type { TranscriptEntry } from './transcript-entry.js';

export interface MatchThresholds {
  /** Largest time gap at which equal normalized content still matches. */
  exactWindowMs: number;
  /** Largest time gap for a prefix match, where one text begins the other. */
  prefixWindowMs: number;
}

export const DEFAULT_MATCH_THRESHOLDS: MatchThresholds = {
  exactWindowMs: 60_000,
  prefixWindowMs: 10_000,
};

export type MatchKind = 'identity' | 'exact-content' | 'prefix-content' | 'stream' | 'none';

export interface MatchScore {
  kind: MatchKind;
  /** Absolute time gap between the two messages; `Infinity` when either has no timestamp. */
  deltaMs: number;
}

/** The ledger side of a comparison, prepared once per local message. */
export interface MatchSubject {
  /** Lowercased ids the ledger row is known by: its own and any stored canonical id. */
  ids: ReadonlySet<string>;
  role: MessageRole;
  normalizedContent: string;
  timestampMs: number | null;
  streamId: string | null;
}

function timeDelta(a: number | null, b: number | null): number {
  if (a === null || b === null) return Number.POSITIVE_INFINITY;
  return Math.abs(a - b);
}

/**
 * Score a ledger row against one synthesized message. Kinds are tried in
 * priority order: identity, content, then stream. `streamByRun` maps run ids
 * to the stream they are known to have produced.
 */
export function scoreMatch(
  subject: MatchSubject,
  candidate: TranscriptEntry,
  thresholds: MatchThresholds = DEFAULT_MATCH_THRESHOLDS,
  streamByRun: ReadonlyMap<string, string> = new Map(),
): MatchScore {
  const deltaMs = timeDelta(subject.timestampMs, candidate.timestampMs);

  if (subject.ids.has(candidate.messageId.toLowerCase())) {
    return { kind: 'identity', deltaMs };
  }
  if (subject.role !== candidate.role) {
    return { kind: 'none', deltaMs };
  }

  const candidateContent = normalizeContent(candidate.content);
  if (subject.normalizedContent && candidateContent) {
    if (subject.normalizedContent === candidateContent && deltaMs <= thresholds.exactWindowMs) {
      return { kind: 'exact-content', deltaMs };
    }
    const isPrefix =
      candidateContent.startsWith(subject.normalizedContent) || subject.normalizedContent.startsWith(candidateContent);
    if (isPrefix && deltaMs <= thresholds.prefixWindowMs) {
      return { kind: 'prefix-content', deltaMs };
    }
  }

  if (subject.streamId && candidate.runId && streamByRun.get(candidate.runId) === subject.streamId) {
    return { kind: 'stream', deltaMs };
  }

  return { kind: 'none', deltaMs };
}

export function isContentMatch(score: MatchScore): boolean {
  return score.kind === 'exact-content' || score.kind === 'prefix-content';
}
