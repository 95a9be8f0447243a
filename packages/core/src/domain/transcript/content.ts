// The orchestration service appends retrieval context to stored messages after this marker.
const ADDITIONAL_CONTEXT_MARKER = '\n\n<additional context>';

export const SIGNATURE_PREFIX_LENGTH = 100;

/**
 * Display form of a message: drops the trailing additional-context block,
 * right-trims lines, keeps at most one blank line in a row and trims blank
 * lines at both ends. Markdown structure is otherwise preserved.
 */
export function formatContent(raw: string | null | undefined): string {
  if (!raw) return '';

  let content = raw;
  const markerIndex = content.indexOf(ADDITIONAL_CONTEXT_MARKER);
  if (markerIndex !== -1) {
    content = content.slice(0, markerIndex).trimEnd();
  }

  const lines: string[] = [];
  let previousBlank = false;
  for (const line of content.split('\n')) {
    const stripped = line.trimEnd();
    if (!stripped) {
      if (!previousBlank) lines.push('');
      previousBlank = true;
    } else {
      lines.push(stripped);
      previousBlank = false;
    }
  }

  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n');
}

/** Comparison form: formatted, whitespace collapsed to single spaces, lowercased. */
export function normalizeContent(raw: string | null | undefined): string {
  return formatContent(raw).replace(/\s+/g, ' ').trim().toLowerCase();
}

export function contentPrefix(raw: string | null | undefined, length = SIGNATURE_PREFIX_LENGTH): string {
  return normalizeContent(raw).slice(0, length);
}

export function contentSignature(role: string, raw: string | null | undefined): string {
  return `${role}:${contentPrefix(raw)}`;
}
