import type { CanonicalMessage, RunSummary, TranscriptPage } from '@threadmerge/core';
import {
  formatAgents,
  formatAttachments,
  formatTimestamp,
  isPendingReply,
  runStatusIcon,
  speakerLabel,
} from '../ui/format.js';
import type { OutputFormatter } from './formatter.js';

function renderMessage(message: CanonicalMessage): string[] {
  const lines = [`## ${speakerLabel(message)} · ${formatTimestamp(message.timestamp)}`, ''];
  lines.push(isPendingReply(message) ? '_Responding…_' : message.content || '_(no text)_', '');
  if (message.attachments.length > 0) {
    lines.push(`**Attachments:** ${formatAttachments(message.attachments)}`, '');
  }
  if (message.agentsInvolved.length > 0) {
    lines.push(`**Agents involved:** ${formatAgents(message.agentsInvolved)}`, '');
  }
  if (message.feedback?.reaction) {
    lines.push(`**Feedback:** ${message.feedback.reaction}`, '');
  }
  return lines;
}

export class MarkdownFormatter implements OutputFormatter {
  renderPage(page: TranscriptPage): string {
    const lines = ['# Transcript', ''];
    if (page.degraded) {
      lines.push('> The run log could not be read; only ledger messages are shown.', '');
    }
    if (page.messages.length === 0) {
      lines.push('_No messages._', '');
    }
    for (const message of page.messages) {
      lines.push(...renderMessage(message));
    }
    if (page.hasMore && page.oldestMessageId) {
      lines.push(`_Earlier messages: \`--before ${page.oldestMessageId}\`_`, '');
    }
    return lines.join('\n').trimEnd();
  }

  renderRuns(summaries: readonly RunSummary[]): string {
    if (summaries.length === 0) return '_No runs._';
    const lines = ['# Runs', ''];
    for (const run of summaries) {
      const agent = run.agentName ?? run.teamName ?? run.agentId ?? 'unknown agent';
      lines.push(
        `- ${runStatusIcon(run.status)} **${run.runId}** (${agent}) · ${formatTimestamp(run.createdAt)} · ${run.messageCount} messages`,
      );
      if (run.childRunIds.length > 0) lines.push(`  - Child runs: ${run.childRunIds.join(', ')}`);
      if (run.agentsInvolved.length > 0) lines.push(`  - Agents involved: ${formatAgents(run.agentsInvolved)}`);
    }
    return lines.join('\n');
  }

  renderError(error: string): string {
    return `## Error\n\n${error}`;
  }
}
