import type { RunEvent, RunRecord } from '../run/run-record.js';
import type { RunSummary } from '../run/run-summary.js';
import { formatContent } from './content.js';
import { deriveMessageId } from './identity.js';
import { createEntry, type TranscriptEntry } from './transcript-entry.js';

export interface NormalizedRunLog {
  entries: TranscriptEntry[];
  summaries: RunSummary[];
  /** Direct children of each top-level or child run, keyed by parent run id. */
  childRunsByParent: Map<string, RunRecord[]>;
  latestRunTimestampMs: number | null;
  nextSequence: number;
}

export interface TeamInfo {
  teamId: string | null;
  teamName: string | null;
}

const TEAM_NAME_HINTS = ['team', 'router'];

/**
 * Team fields of a run. Runs whose agent is a team or router carry no explicit
 * team id, so one is derived from the agent name; remaining gaps are filled
 * from the first event that has them.
 */
export function detectTeam(run: RunRecord): TeamInfo {
  let teamId = run.teamId;
  let teamName = run.teamName;

  if (!teamId && run.agentName) {
    const lowered = run.agentName.toLowerCase();
    if (TEAM_NAME_HINTS.some((hint) => lowered.includes(hint))) {
      teamName = teamName ?? run.agentName;
      teamId = lowered.trim().replace(/\s+/g, '-');
    }
  }

  for (const event of run.events) {
    if (teamId && teamName) break;
    teamId = teamId ?? event.teamId;
    teamName = teamName ?? event.teamName;
  }

  return { teamId, teamName };
}

/** Lifecycle events for a run the service recorded without any. */
export function synthesizeRunEvents(run: RunRecord): RunEvent[] {
  const base = {
    agentId: run.agentId,
    agentName: run.agentName,
    teamId: null,
    teamName: null,
    createdAt: run.createdAt,
  };
  const events: RunEvent[] = [{ event: 'RunStarted', ...base }];
  if (run.status === 'completed') {
    events.push({ event: 'RunCompleted', ...base });
  } else if (run.status === 'failed') {
    events.push({ event: 'RunFailed', ...base });
  }
  return events;
}

function compareRuns(a: RunRecord, b: RunRecord): number {
  if (a.createdAtMs === b.createdAtMs) return 0;
  if (a.createdAtMs === null) return -1;
  if (b.createdAtMs === null) return 1;
  return a.createdAtMs - b.createdAtMs;
}

export function groupChildRuns(runs: readonly RunRecord[]): Map<string, RunRecord[]> {
  const runIds = new Set(runs.map((run) => run.runId));
  const childRunsByParent = new Map<string, RunRecord[]>();
  for (const run of runs) {
    const parentId = run.parentRunId;
    if (!parentId || parentId === run.runId || !runIds.has(parentId)) continue;
    const siblings = childRunsByParent.get(parentId) ?? [];
    siblings.push(run);
    childRunsByParent.set(parentId, siblings);
  }
  return childRunsByParent;
}

/**
 * Turn a session's run log into transcript entries: at most one user and one
 * assistant message per top-level run, plus a summary for every top-level run.
 */
export function normalizeRunLog(sessionId: string, runs: readonly RunRecord[], startSequence = 0): NormalizedRunLog {
  const childRunsByParent = groupChildRuns(runs);
  const childRunIds = new Set<string>();
  for (const children of childRunsByParent.values()) {
    for (const child of children) childRunIds.add(child.runId);
  }

  const topLevel = runs.filter((run) => !childRunIds.has(run.runId)).sort(compareRuns);

  const entries: TranscriptEntry[] = [];
  const summaries: RunSummary[] = [];
  let sequence = startSequence;

  for (const run of topLevel) {
    const team = detectTeam(run);
    const shared = {
      runId: run.runId,
      agentId: run.agentId,
      agentName: run.agentName,
      teamId: team.teamId,
      teamName: team.teamName,
      timestampMs: run.createdAtMs,
      origin: 'run-log' as const,
    };
    let messageCount = 0;

    const userContent = formatContent(run.inputContent);
    if (userContent) {
      entries.push(
        createEntry({
          ...shared,
          messageId: deriveMessageId({
            sessionId,
            runId: run.runId,
            role: 'user',
            content: userContent,
            timestamp: run.createdAt,
          }),
          role: 'user',
          content: userContent,
          sequence: sequence++,
        }),
      );
      messageCount++;
    }

    const assistantContent = formatContent(run.content);
    if (assistantContent) {
      entries.push(
        createEntry({
          ...shared,
          messageId: deriveMessageId({
            sessionId,
            runId: run.runId,
            role: 'assistant',
            content: assistantContent,
            timestamp: run.createdAt,
          }),
          role: 'assistant',
          content: assistantContent,
          sequence: sequence++,
        }),
      );
      messageCount++;
    }

    const isTeamRun = team.teamId !== null;
    summaries.push({
      runId: run.runId,
      parentRunId: run.parentRunId,
      agentId: run.agentId,
      agentName: run.agentName,
      teamId: team.teamId,
      teamName: team.teamName,
      status: run.status,
      createdAt: run.createdAt,
      messageCount,
      events: run.events.length > 0 || isTeamRun ? run.events : synthesizeRunEvents(run),
      memberResponses: run.memberResponses,
      childRunIds: (childRunsByParent.get(run.runId) ?? []).map((child) => child.runId),
      agentsInvolved: [],
    });
  }

  let latestRunTimestampMs: number | null = null;
  for (const run of runs) {
    if (run.createdAtMs !== null && (latestRunTimestampMs === null || run.createdAtMs > latestRunTimestampMs)) {
      latestRunTimestampMs = run.createdAtMs;
    }
  }

  return { entries, summaries, childRunsByParent, latestRunTimestampMs, nextSequence: sequence };
}
