import type { Clock } from '../../shared/clock.js';
import type { RunStatus } from '../run/run-record.js';
import { isActiveStreamStatus, type StreamMarker } from '../stream/stream-marker.js';
import { derivePlaceholderId } from './identity.js';
import { createEntry, type TranscriptEntry } from './transcript-entry.js';

export interface StreamingOverlayOptions {
  sessionId: string;
  marker: StreamMarker | null;
  /** Status of every fetched run, to recognise markers the run log has already overtaken. */
  runStatuses: ReadonlyMap<string, RunStatus>;
  clock: Clock;
}

export interface StreamingOverlayResult {
  entries: TranscriptEntry[];
  activeStreamId: string | null;
  placeholderId: string | null;
}

export function isMarkerActive(
  marker: StreamMarker | null,
  sessionId: string,
  runStatuses: ReadonlyMap<string, RunStatus>,
): marker is StreamMarker {
  if (!marker || !isActiveStreamStatus(marker.status)) return false;
  if (marker.sessionId && marker.sessionId !== sessionId) return false;
  const runStatus = marker.runId ? runStatuses.get(marker.runId) : undefined;
  return runStatus !== 'completed' && runStatus !== 'failed';
}

/**
 * Annotate an in-flight response on a sorted transcript. The newest user
 * message takes the marker's stream id unless it already has one, and the transcript
 * ends in an assistant message marked `streaming`, synthesized when none exists.
 */
export function applyStreamingOverlay(
  sorted: readonly TranscriptEntry[],
  options: StreamingOverlayOptions,
): StreamingOverlayResult {
  const { marker, sessionId } = options;
  if (!isMarkerActive(marker, sessionId, options.runStatuses)) {
    return { entries: [...sorted], activeStreamId: null, placeholderId: null };
  }

  const entries = [...sorted];
  const streamId = marker.streamId;

  if (!entries.some((entry) => entry.streamId === streamId)) {
    // Only the latest user turn can be the one being answered
    const userIndex = entries.findLastIndex((entry) => entry.role === 'user');
    const latestUser = entries[userIndex];
    if (latestUser && !latestUser.streamId) {
      entries[userIndex] = { ...latestUser, streamId, status: 'streaming' };
    }
  }

  let assistantIndex = -1;
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i];
    if (!entry || entry.role !== 'assistant') continue;
    if (entry.streamId === streamId || (marker.runId !== null && entry.runId === marker.runId)) {
      assistantIndex = i;
      break;
    }
  }

  const current = entries[assistantIndex];
  if (current) {
    entries[assistantIndex] = { ...current, streamId, status: 'streaming' };
    return { entries, activeStreamId: streamId, placeholderId: null };
  }

  let latestMs: number | null = null;
  let lastSequence = -1;
  for (const entry of entries) {
    if (entry.timestampMs !== null && (latestMs === null || entry.timestampMs > latestMs)) latestMs = entry.timestampMs;
    lastSequence = Math.max(lastSequence, entry.sequence);
  }

  const placeholder = createEntry({
    messageId: derivePlaceholderId(sessionId, streamId),
    role: 'assistant',
    content: '',
    timestampMs: latestMs ?? options.clock.now(),
    sequence: lastSequence + 1,
    origin: 'placeholder',
    runId: marker.runId,
    teamId: marker.teamId,
    streamId,
    status: 'streaming',
  });
  entries.push(placeholder);
  return { entries, activeStreamId: streamId, placeholderId: placeholder.messageId };
}
