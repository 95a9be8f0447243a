import { nonEmptyString } from '../../shared/guards.js';

export const STREAM_MARKER_KEY_PREFIX = 'stream_id:';

/** Markers expire on their own; the orchestration side writes them with about an hour to live. */
export const STREAM_MARKER_TTL_MS = 60 * 60 * 1000;

const ACTIVE_STATUSES = new Set(['streaming', 'in_progress', 'running']);

/** An in-flight response, as recorded in the marker keyspace by the orchestration side. */
export interface StreamMarker {
  streamId: string;
  sessionId: string | null;
  userId: string | null;
  teamId: string | null;
  runId: string | null;
  status: string;
}

export function streamMarkerKey(streamId: string): string {
  return `${STREAM_MARKER_KEY_PREFIX}${streamId}`;
}

export function isActiveStreamStatus(status: string): boolean {
  return ACTIVE_STATUSES.has(status.trim().toLowerCase());
}

function readField(value: string | undefined): string | null {
  const text = nonEmptyString(value);
  if (!text) return null;
  const lowered = text.toLowerCase();
  return lowered === 'none' || lowered === 'null' ? null : text;
}

/**
 * Decode a marker value of the form
 * `user:<u>, team:<t>, session:<s>, run_id:<r>, status:<status>`.
 * Unknown keys are ignored; a value without a status is not a marker.
 */
export function parseStreamMarkerValue(streamId: string, value: string): StreamMarker | null {
  const fields = new Map<string, string>();
  for (const part of value.split(',')) {
    const separator = part.indexOf(':');
    if (separator === -1) continue;
    fields.set(part.slice(0, separator).trim().toLowerCase(), part.slice(separator + 1).trim());
  }

  const status = readField(fields.get('status'));
  if (!status) return null;

  return {
    streamId,
    sessionId: readField(fields.get('session')),
    userId: readField(fields.get('user')),
    teamId: readField(fields.get('team')),
    runId: readField(fields.get('run_id')),
    status: status.toLowerCase(),
  };
}

export function formatStreamMarkerValue(marker: Omit<StreamMarker, 'streamId'>): string {
  return [
    `user:${marker.userId ?? 'None'}`,
    `team:${marker.teamId ?? 'None'}`,
    `session:${marker.sessionId ?? 'None'}`,
    `run_id:${marker.runId ?? 'None'}`,
    `status:${marker.status}`,
  ].join(', ');
}
