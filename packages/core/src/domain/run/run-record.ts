import { z } from 'zod';
import type { AgentRef } from '../agent/agent-ref.js';
import { RecordParseError } from '../../shared/errors.js';
import { toEpochMs, toIsoTimestamp } from './timestamps.js';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunEvent {
  event: string | null;
  agentId: string | null;
  agentName: string | null;
  teamId: string | null;
  teamName: string | null;
  createdAt: string | null;
}

/**
 * One run of the orchestration service, as read from its run log.
 * Fields that were missing or malformed on the wire are `null`.
 */
export interface RunRecord {
  runId: string;
  parentRunId: string | null;
  teamId: string | null;
  teamName: string | null;
  agentId: string | null;
  agentName: string | null;
  status: RunStatus;
  createdAt: string | null;
  createdAtMs: number | null;
  inputContent: string | null;
  content: string | null;
  events: RunEvent[];
  memberResponses: AgentRef[];
}

export interface ParsedRunLog {
  runs: RunRecord[];
  skipped: RecordParseError[];
}

// Wire schemas. Optional fields `.catch()` to absent so a bad field never rejects the record.
const idLike = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish()
  .catch(null);
const textLike = z.string().nullish().catch(null);
const timestampLike = z.union([z.string(), z.number()]).nullish().catch(null);

const RawEventSchema = z.object({
  event: textLike,
  agent_id: idLike,
  agent_name: textLike,
  team_id: idLike,
  team_name: textLike,
  created_at: timestampLike,
});

const RawMemberResponseSchema = z.object({
  agent_id: idLike,
  agent_public_id: idLike,
  agent_name: textLike,
});

const MessagePartSchema = z.object({
  role: z.string(),
  content: z.unknown(),
});

const RawInputSchema = z
  .union([
    z.string(),
    z.object({
      content: z.unknown().optional(),
      input_content: z.unknown().optional(),
    }),
  ])
  .nullish()
  .catch(null);

const RawRunSchema = z.object({
  run_id: z.union([z.string().trim().min(1), z.number()]).transform((value) => String(value)),
  parent_run_id: idLike,
  team_id: idLike,
  team_name: textLike,
  agent_id: idLike,
  agent_name: textLike,
  status: textLike,
  created_at: timestampLike,
  input: RawInputSchema,
  content: z.unknown().optional(),
  events: z.array(z.unknown()).nullish().catch(null),
  member_responses: z.array(z.unknown()).nullish().catch(null),
});

const RunLogEnvelopeSchema = z.object({
  runs: z.array(z.unknown()).optional(),
  data: z.array(z.unknown()).optional(),
});

function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function normalizeRunStatus(status: string | null | undefined): RunStatus {
  switch ((status ?? '').trim().toLowerCase()) {
    case 'completed':
    case 'complete':
    case 'success':
      return 'completed';
    case 'failed':
    case 'error':
    case 'cancelled':
    case 'canceled':
      return 'failed';
    default:
      return 'running';
  }
}

/** Flatten a content value that may be a string, a list of text parts, or structured output. */
export function contentToText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const texts: string[] = [];
    for (const part of value) {
      if (typeof part === 'string') {
        texts.push(part);
      } else if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
        texts.push(part.text);
      }
    }
    return texts.length > 0 ? texts.join('\n') : null;
  }
  return JSON.stringify(value);
}

function extractInputContent(input: z.infer<typeof RawInputSchema>): string | null {
  if (input === null || input === undefined) return null;
  if (typeof input === 'string') return input;

  const candidate = input.content ?? input.input_content;
  if (typeof candidate === 'string') return candidate;
  if (Array.isArray(candidate)) {
    for (const part of candidate) {
      const parsed = MessagePartSchema.safeParse(part);
      if (parsed.success && parsed.data.role === 'user') {
        return contentToText(parsed.data.content);
      }
    }
  }
  return null;
}

function parseEvents(raw: unknown[] | null | undefined): RunEvent[] {
  const events: RunEvent[] = [];
  for (const item of raw ?? []) {
    const parsed = RawEventSchema.safeParse(item);
    if (!parsed.success) continue;
    const e = parsed.data;
    events.push({
      event: blankToNull(e.event),
      agentId: blankToNull(e.agent_id),
      agentName: blankToNull(e.agent_name),
      teamId: blankToNull(e.team_id),
      teamName: blankToNull(e.team_name),
      createdAt: toIsoTimestamp(toEpochMs(e.created_at)),
    });
  }
  return events;
}

function parseMemberResponses(raw: unknown[] | null | undefined): AgentRef[] {
  const members: AgentRef[] = [];
  for (const item of raw ?? []) {
    const parsed = RawMemberResponseSchema.safeParse(item);
    if (!parsed.success) continue;
    members.push({
      agentId: blankToNull(parsed.data.agent_id),
      agentPublicId: blankToNull(parsed.data.agent_public_id),
      agentName: blankToNull(parsed.data.agent_name),
    });
  }
  return members;
}

function peekRunId(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('run_id' in raw)) return undefined;
  const value = raw.run_id;
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

export function parseRunRecord(raw: unknown, index: number): RunRecord | RecordParseError {
  const parsed = RawRunSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return new RecordParseError(
      `run #${index} is malformed${where}: ${issue?.message ?? 'invalid record'}`,
      index,
      peekRunId(raw),
    );
  }

  const run = parsed.data;
  const createdAtMs = toEpochMs(run.created_at);
  return {
    runId: run.run_id.trim(),
    parentRunId: blankToNull(run.parent_run_id),
    teamId: blankToNull(run.team_id),
    teamName: blankToNull(run.team_name),
    agentId: blankToNull(run.agent_id),
    agentName: blankToNull(run.agent_name),
    status: normalizeRunStatus(run.status),
    createdAt: toIsoTimestamp(createdAtMs),
    createdAtMs,
    inputContent: extractInputContent(run.input),
    content: contentToText(run.content),
    events: parseEvents(run.events),
    memberResponses: parseMemberResponses(run.member_responses),
  };
}

function extractRunList(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  const envelope = RunLogEnvelopeSchema.safeParse(payload);
  if (!envelope.success) return null;
  return envelope.data.runs ?? envelope.data.data ?? null;
}

/**
 * Parse a run-log payload (a bare list, or `{ runs }` / `{ data }`).
 * Malformed and duplicate records are reported in `skipped` instead of failing the whole log.
 */
export function parseRunLog(payload: unknown): ParsedRunLog {
  const list = extractRunList(payload);
  if (list === null) {
    return { runs: [], skipped: [new RecordParseError('run log payload is not a list of runs', -1)] };
  }

  const runs: RunRecord[] = [];
  const skipped: RecordParseError[] = [];
  const seen = new Set<string>();

  list.forEach((raw, index) => {
    let result: RunRecord | RecordParseError;
    try {
      result = parseRunRecord(raw, index);
    } catch (err) {
      result = new RecordParseError(
        `run #${index} could not be read: ${err instanceof Error ? err.message : String(err)}`,
        index,
        peekRunId(raw),
      );
    }
    if (result instanceof RecordParseError) {
      skipped.push(result);
      return;
    }
    if (seen.has(result.runId)) {
      skipped.push(new RecordParseError(`run #${index} repeats run_id ${result.runId}`, index, result.runId));
      return;
    }
    seen.add(result.runId);
    runs.push(result);
  });

  return { runs, skipped };
}
