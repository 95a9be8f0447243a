import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../domain/config/engine-config.js';
import type { CanonicalMessage } from '../domain/message/canonical-message.js';
import type { LocalMessage } from '../domain/message/local-message.js';
import type { RunRecord, RunStatus } from '../domain/run/run-record.js';
import type { RunSummary } from '../domain/run/run-summary.js';
import type { StreamMarker } from '../domain/stream/stream-marker.js';
import { dedupe } from '../domain/transcript/dedup.js';
import { matchLedger } from '../domain/transcript/ledger-matcher.js';
import { normalizeRunLog } from '../domain/transcript/normalizer.js';
import { paginate } from '../domain/transcript/paginator.js';
import { applyStreamingOverlay, isMarkerActive } from '../domain/transcript/streaming-overlay.js';
import { sortEntries, toCanonicalMessage, type TranscriptEntry } from '../domain/transcript/transcript-entry.js';
import type { AgentDirectory } from '../ports/agent-directory.js';
import type { AttachmentIndex } from '../ports/attachment-index.js';
import type { FeedbackStore } from '../ports/feedback-store.js';
import type { LedgerStore } from '../ports/ledger-store.js';
import type { RunLogProvider } from '../ports/run-log-provider.js';
import type { StreamMarkerStore } from '../ports/stream-marker-store.js';
import { systemClock, type Clock } from '../shared/clock.js';
import { createLogger } from '../shared/logger.js';
import { EnrichmentService } from './enrichment-service.js';

const log = createLogger('transcript');

export interface TranscriptDeps {
  runLog: RunLogProvider;
  ledger: LedgerStore;
  markers: StreamMarkerStore;
  agents: AgentDirectory;
  attachments: AttachmentIndex;
  feedback: FeedbackStore;
  clock?: Clock;
  config?: Partial<EngineConfig>;
}

export interface ReconcileRequest {
  sessionId: string;
  userId: string;
  limit?: number | null;
  beforeMessageId?: string | null;
  includeSystem?: boolean;
}

export interface TranscriptPage {
  messages: CanonicalMessage[];
  hasMore: boolean;
  runSummaries: RunSummary[];
  oldestMessageId: string | null;
  newestMessageId: string | null;
  totalRuns: number;
  /** The run log or the ledger could not be read; the page was built from what could. */
  degraded: boolean;
}

function reason(result: PromiseRejectedResult): string {
  return result.reason instanceof Error ? result.reason.message : String(result.reason);
}

function countByRun(entries: readonly TranscriptEntry[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const entry of entries) {
    if (entry.runId) counts.set(entry.runId, (counts.get(entry.runId) ?? 0) + 1);
  }
  return counts;
}

/**
 * Merges a session's run log and ledger into one ordered, paginated
 * transcript on every read. Nothing derived is stored between reads.
 */
export class TranscriptService {
  private readonly config: EngineConfig;
  private readonly clock: Clock;
  private readonly enrichment: EnrichmentService;

  constructor(private readonly deps: TranscriptDeps) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
    this.clock = deps.clock ?? systemClock;
    this.enrichment = new EnrichmentService(deps);
  }

  async reconcile(request: ReconcileRequest): Promise<TranscriptPage> {
    const { sessionId, userId } = request;
    log.debug(`reconcile: session ${sessionId}, user ${userId}`);

    const [runsResult, localsResult, markerResult] = await Promise.allSettled([
      this.deps.runLog.fetchRuns(sessionId),
      this.deps.ledger.listMessages(sessionId, userId),
      this.deps.markers.getActiveStream(sessionId),
    ]);

    let degraded = false;
    let runs: RunRecord[] = [];
    if (runsResult.status === 'fulfilled') {
      runs = runsResult.value;
    } else {
      degraded = true;
      log.warn(`reconcile: run log unavailable for ${sessionId}, using the ledger only: ${reason(runsResult)}`);
    }

    let locals: LocalMessage[] = [];
    if (localsResult.status === 'fulfilled') {
      locals = localsResult.value;
    } else {
      degraded = true;
      log.error(`reconcile: ledger unavailable for ${sessionId}: ${reason(localsResult)}`);
    }

    let marker: StreamMarker | null = null;
    if (markerResult.status === 'fulfilled') {
      marker = markerResult.value;
    } else {
      log.warn(`reconcile: marker store unavailable: ${reason(markerResult)}`);
    }

    const normalized = normalizeRunLog(sessionId, runs);
    const runStatuses = new Map<string, RunStatus>(runs.map((run) => [run.runId, run.status]));
    const activeMarker = isMarkerActive(marker, sessionId, runStatuses) ? marker : null;

    const matched = matchLedger(normalized.entries, locals, {
      thresholds: { exactWindowMs: this.config.exactWindowMs, prefixWindowMs: this.config.prefixWindowMs },
      staleLocalPolicy: this.config.staleLocalPolicy,
      includeSystem: request.includeSystem ?? false,
      activeMarker,
      latestRunTimestampMs: normalized.latestRunTimestampMs,
      startSequence: normalized.nextSequence,
    });
    if (matched.dropped.length > 0) {
      log.debug(`reconcile: dropped ${matched.dropped.length} stale ledger rows`);
    }

    const deduped = dedupe(matched.entries, {
      signatureToleranceMs: this.config.signatureToleranceMs,
      containmentScope: this.config.containmentScope,
    });

    const counts = countByRun(deduped.entries);
    const recounted = normalized.summaries.map((summary) => ({
      ...summary,
      messageCount: counts.get(summary.runId) ?? 0,
    }));

    const enriched = await this.enrichment.enrich({
      userId,
      entries: deduped.entries,
      runs,
      summaries: recounted,
      childRunsByParent: normalized.childRunsByParent,
    });

    const overlay = applyStreamingOverlay(sortEntries(enriched.entries), {
      sessionId,
      marker: activeMarker,
      runStatuses,
      clock: this.clock,
    });

    const page = paginate(
      overlay.entries,
      { limit: request.limit, beforeMessageId: request.beforeMessageId },
      { defaultPageSize: this.config.defaultPageSize, maxPageSize: this.config.maxPageSize },
    );
    const messages = page.items.map(toCanonicalMessage);

    log.info(
      `reconcile: ${sessionId} -> ${messages.length}/${overlay.entries.length} messages from ${runs.length} runs and ` +
        `${locals.length} ledger rows (matched ${matched.matches.length}, removed ` +
        `${deduped.removed.identity + deduped.removed.signature + deduped.removed.containment})` +
        (degraded ? ' [degraded]' : ''),
    );

    return {
      messages,
      hasMore: page.hasMore,
      runSummaries: enriched.summaries,
      oldestMessageId: messages[0]?.messageId ?? null,
      newestMessageId: messages[messages.length - 1]?.messageId ?? null,
      totalRuns: enriched.summaries.length,
      degraded,
    };
  }
}
