import { isRecord, nonEmptyString } from '../../shared/guards.js';
import type { Attachment } from './attachment.js';

export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system', 'tool'];

export function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/** A row of the local ledger, written when the user sends a message. */
export interface LocalMessage {
  id: string;
  sessionId: string;
  userId: string;
  role: MessageRole;
  content: string;
  createdAt: string;
  agentId: string | null;
  metadata: Record<string, unknown>;
}

const RESERVED_METADATA_KEYS = new Set([
  'stream_id',
  'streamId',
  'attachments',
  'files',
  'canonical_message_id',
  'custom_fields',
]);

export function readStreamId(metadata: Record<string, unknown>): string | null {
  return nonEmptyString(metadata.stream_id) ?? nonEmptyString(metadata.streamId);
}

/** A deterministic id the ledger row was previously reconciled to, if one was stored. */
export function readCanonicalMessageId(metadata: Record<string, unknown>): string | null {
  return nonEmptyString(metadata.canonical_message_id);
}

function readSize(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function toAttachment(raw: unknown): Attachment | null {
  if (!isRecord(raw)) return null;
  const attachmentId =
    nonEmptyString(raw.attachment_id) ?? nonEmptyString(raw.attachmentId) ?? nonEmptyString(raw.id) ?? '';
  const filename = nonEmptyString(raw.filename) ?? nonEmptyString(raw.file_name) ?? nonEmptyString(raw.fileName);
  const url = nonEmptyString(raw.blob_url) ?? nonEmptyString(raw.download_url) ?? nonEmptyString(raw.url);
  if (!attachmentId && !filename && !url) return null;
  return {
    attachmentId,
    filename,
    url,
    contentType: nonEmptyString(raw.content_type) ?? nonEmptyString(raw.contentType),
    size: readSize(raw.file_size) ?? readSize(raw.size),
  };
}

export function readAttachments(metadata: Record<string, unknown>): Attachment[] {
  const source = Array.isArray(metadata.attachments)
    ? metadata.attachments
    : Array.isArray(metadata.files)
      ? metadata.files
      : [];
  const attachments: Attachment[] = [];
  for (const raw of source) {
    const attachment = toAttachment(raw);
    if (attachment) attachments.push(attachment);
  }
  return attachments;
}

/** Everything in the metadata map that is not one of the keys the engine itself interprets. */
export function readCustomFields(metadata: Record<string, unknown>): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!RESERVED_METADATA_KEYS.has(key)) fields[key] = value;
  }
  if (isRecord(metadata.custom_fields)) {
    Object.assign(fields, metadata.custom_fields);
  }
  return fields;
}
