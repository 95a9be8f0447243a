import { AgentIndex, referencedAgents, rollupAgentsInvolved } from '../domain/agent/agents-involved.js';
import type { AgentRecord } from '../domain/agent/agent-ref.js';
import { mergeAttachments, type Attachment } from '../domain/message/attachment.js';
import type { Feedback, FeedbackRecord } from '../domain/message/feedback.js';
import type { RunRecord } from '../domain/run/run-record.js';
import type { RunSummary } from '../domain/run/run-summary.js';
import { contentPrefix } from '../domain/transcript/content.js';
import type { TranscriptEntry } from '../domain/transcript/transcript-entry.js';
import type { AgentDirectory } from '../ports/agent-directory.js';
import type { AttachmentIndex } from '../ports/attachment-index.js';
import type { FeedbackStore } from '../ports/feedback-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('enrichment');

export interface EnrichmentDeps {
  agents: AgentDirectory;
  attachments: AttachmentIndex;
  feedback: FeedbackStore;
}

export interface EnrichmentInput {
  userId: string;
  entries: readonly TranscriptEntry[];
  /** Every fetched run, child runs included. */
  runs: readonly RunRecord[];
  summaries: readonly RunSummary[];
  childRunsByParent: ReadonlyMap<string, readonly RunRecord[]>;
}

export interface EnrichmentResult {
  entries: TranscriptEntry[];
  summaries: RunSummary[];
}

function settled<T>(result: PromiseSettledResult<T>, what: string, fallback: T): T {
  if (result.status === 'fulfilled') return result.value;
  log.warn(`enrich: ${what} lookup failed:`, result.reason instanceof Error ? result.reason.message : String(result.reason));
  return fallback;
}

function idsOf(entry: TranscriptEntry): string[] {
  return entry.localMessageId && entry.localMessageId !== entry.messageId
    ? [entry.messageId, entry.localMessageId]
    : [entry.messageId];
}

/** Newest feedback per lowercased message id; the store returns newest first. */
function indexFeedback(records: readonly FeedbackRecord[]): Map<string, Feedback> {
  const byEntity = new Map<string, Feedback>();
  for (const record of records) {
    const key = record.entityId.toLowerCase();
    if (byEntity.has(key)) continue;
    byEntity.set(key, {
      feedbackId: record.feedbackId,
      reaction: record.reaction,
      comment: record.comment,
      createdAt: record.createdAt,
    });
  }
  return byEntity;
}

/**
 * Current agent names, attachments, feedback and agents-involved rollups.
 * Each lookup runs on its own; one that fails leaves its part empty.
 */
export class EnrichmentService {
  constructor(private readonly deps: EnrichmentDeps) {}

  async enrich(input: EnrichmentInput): Promise<EnrichmentResult> {
    const refs = [
      ...referencedAgents(input.runs),
      ...input.entries.map((entry) => ({ agentId: entry.agentId, agentPublicId: null, agentName: entry.agentName })),
    ];
    const agentIds = new Set<string>();
    const agentNames = new Set<string>();
    for (const ref of refs) {
      if (ref.agentId) {
        agentIds.add(ref.agentId);
        agentNames.add(ref.agentId);
      }
      if (ref.agentPublicId) agentIds.add(ref.agentPublicId);
      if (ref.agentName) agentNames.add(ref.agentName);
    }

    const messageIds = input.entries.flatMap(idsOf);
    const assistantIds = input.entries.filter((entry) => entry.role === 'assistant').flatMap(idsOf);

    const [byId, byName, attachmentResult, feedbackResult] = await Promise.allSettled([
      agentIds.size > 0 ? this.deps.agents.getAgents([...agentIds]) : Promise.resolve([]),
      agentNames.size > 0 ? this.deps.agents.findAgentsByName([...agentNames]) : Promise.resolve([]),
      messageIds.length > 0
        ? this.deps.attachments.listAttachments(messageIds)
        : Promise.resolve(new Map<string, Attachment[]>()),
      assistantIds.length > 0 ? this.deps.feedback.getFeedback(assistantIds, input.userId) : Promise.resolve([]),
    ]);

    const agentRecords: AgentRecord[] = [...settled(byId, 'agent', []), ...settled(byName, 'agent name', [])];
    const agents = new AgentIndex(agentRecords);
    const attachmentsByMessage = settled(attachmentResult, 'attachment', new Map<string, Attachment[]>());
    const feedbackByMessage = indexFeedback(settled(feedbackResult, 'feedback', []));

    const runsById = new Map(input.runs.map((run) => [run.runId, run]));
    const summaries = input.summaries.map((summary) => {
      const run = runsById.get(summary.runId);
      const current = agents.findById(summary.agentId);
      return {
        ...summary,
        agentName: current?.name ?? summary.agentName,
        agentsInvolved: run
          ? rollupAgentsInvolved({ run, teamId: summary.teamId, childRunsByParent: input.childRunsByParent, agents })
          : summary.agentsInvolved,
      };
    });
    const summariesByRun = new Map(summaries.map((summary) => [summary.runId, summary]));

    const entries = input.entries.map((entry): TranscriptEntry => {
      const summary = entry.runId ? summariesByRun.get(entry.runId) : undefined;
      const agent = agents.findById(entry.agentId);
      const indexed = idsOf(entry).flatMap((id) => attachmentsByMessage.get(id.toLowerCase()) ?? []);
      const feedback =
        entry.role === 'assistant'
          ? (idsOf(entry)
              .map((id) => feedbackByMessage.get(id.toLowerCase()))
              .find((found) => found !== undefined) ?? null)
          : null;

      return {
        ...entry,
        agentId: agent?.id ?? entry.agentId,
        agentPublicId: agent?.publicId ?? entry.agentPublicId,
        agentName: agent?.name ?? entry.agentName,
        teamId: entry.teamId ?? summary?.teamId ?? null,
        teamName: entry.teamName ?? summary?.teamName ?? null,
        attachments: mergeAttachments(entry.attachments, indexed),
        feedback,
        agentsInvolved: entry.role === 'assistant' && summary ? summary.agentsInvolved : entry.agentsInvolved,
      };
    });

    return { entries: await this.fillFromSignatures(entries), summaries };
  }

  // Attachments stored before message ids were reassigned are only findable by what the user wrote.
  private async fillFromSignatures(entries: TranscriptEntry[]): Promise<TranscriptEntry[]> {
    const pending = entries
      .map((entry, index) => ({ entry, index }))
      .filter(({ entry }) => entry.role === 'user' && !entry.localMessageId && entry.attachments.length === 0);
    if (pending.length === 0) return entries;

    const results = await Promise.allSettled(
      pending.map(({ entry }) => this.deps.attachments.findByContentSignature(entry.role, contentPrefix(entry.content))),
    );

    const filled = [...entries];
    results.forEach((result, i) => {
      const target = pending[i];
      if (!target) return;
      const found = settled(result, 'content signature', []);
      if (found.length > 0) filled[target.index] = { ...target.entry, attachments: mergeAttachments(found) };
    });
    return filled;
  }
}
