import type { StreamMarker } from '../domain/stream/stream-marker.js';

export interface StreamMarkerStore {
  getActiveStream(sessionId: string): Promise<StreamMarker | null>;
}
