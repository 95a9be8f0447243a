import { v5 as uuidv5 } from 'uuid';
import type { MessageRole } from '../message/local-message.js';

export const MESSAGE_ID_NAMESPACE = 'b3e1f0a2-5c4d-4e8f-9a6b-7c2d1e0f3a4b';

export const IDENTITY_CONTENT_LENGTH = 200;
export const NO_RUN = 'no-run';
export const NO_TIMESTAMP = 'no-timestamp';

export interface MessageIdentityInput {
  sessionId: string;
  runId: string | null;
  role: MessageRole;
  content: string;
  timestamp: string | null;
}

/**
 * Content-addressed message id. Identical inputs always give the identical id;
 * content past the first 200 characters does not take part.
 */
export function deriveMessageId(input: MessageIdentityInput): string {
  const name = [
    input.sessionId,
    input.runId ?? NO_RUN,
    input.role,
    input.content.slice(0, IDENTITY_CONTENT_LENGTH),
    input.timestamp ?? NO_TIMESTAMP,
  ].join('|');
  return uuidv5(name, MESSAGE_ID_NAMESPACE);
}

export function derivePlaceholderId(sessionId: string, streamId: string): string {
  return uuidv5(`${sessionId}|stream|${streamId}`, MESSAGE_ID_NAMESPACE);
}
