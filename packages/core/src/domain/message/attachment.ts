export interface Attachment {
  attachmentId: string;
  filename: string | null;
  url: string | null;
  contentType?: string | null;
  size?: number | null;
}

function attachmentKey(attachment: Attachment): string {
  return attachment.attachmentId ? `id:${attachment.attachmentId.toLowerCase()}` : `url:${attachment.url ?? attachment.filename ?? ''}`;
}

/** Union of attachment lists, first occurrence wins. */
export function mergeAttachments(...lists: ReadonlyArray<readonly Attachment[]>): Attachment[] {
  const merged: Attachment[] = [];
  const seen = new Set<string>();
  for (const list of lists) {
    for (const attachment of list) {
      const key = attachmentKey(attachment);
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(attachment);
    }
  }
  return merged;
}
