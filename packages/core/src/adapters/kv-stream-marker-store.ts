import {
  isActiveStreamStatus,
  parseStreamMarkerValue,
  STREAM_MARKER_KEY_PREFIX,
  type StreamMarker,
} from '../domain/stream/stream-marker.js';
import type { KeyValueStore } from '../ports/key-value-store.js';
import type { StreamMarkerStore } from '../ports/stream-marker-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('stream-markers');

/**
 * Reads the `stream_id:<id>` keyspace the orchestration side writes. Markers
 * are keyed by stream, so finding a session's stream means scanning them.
 */
export class KvStreamMarkerStore implements StreamMarkerStore {
  constructor(private readonly store: KeyValueStore) {}

  async getActiveStream(sessionId: string): Promise<StreamMarker | null> {
    const keys = await this.store.keys(STREAM_MARKER_KEY_PREFIX);
    let best: { marker: StreamMarker; ttl: number } | null = null;

    for (const key of keys) {
      const value = await this.store.get(key);
      if (value === null) continue;
      const streamId = key.slice(STREAM_MARKER_KEY_PREFIX.length);
      const marker = parseStreamMarkerValue(streamId, value);
      if (!marker) {
        log.debug(`getActiveStream: unreadable marker at ${key}`);
        continue;
      }
      if (marker.sessionId !== sessionId || !isActiveStreamStatus(marker.status)) continue;

      // The marker written last has the most time left.
      const ttl = (await this.store.ttl(key)) ?? Number.POSITIVE_INFINITY;
      if (!best || ttl > best.ttl) best = { marker, ttl };
    }

    return best?.marker ?? null;
  }
}
