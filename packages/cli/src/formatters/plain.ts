import type { CanonicalMessage, RunSummary, TranscriptPage } from '@threadmerge/core';
import { formatAgents, formatTimestamp, isPendingReply, runStatusIcon, speakerLabel } from '../ui/format.js';
import type { OutputFormatter } from './formatter.js';

function renderMessage(message: CanonicalMessage): string {
  const body = isPendingReply(message) ? '(responding...)' : message.content;
  const [first = '', ...rest] = body.split('\n');
  const head = `[${formatTimestamp(message.timestamp)}] ${speakerLabel(message)}: ${first}`;
  return [head, ...rest.map((line) => `    ${line}`)].join('\n');
}

export class PlainFormatter implements OutputFormatter {
  renderPage(page: TranscriptPage): string {
    const lines = page.messages.map(renderMessage);
    if (page.degraded) lines.unshift('(run log unavailable, ledger messages only)');
    if (page.hasMore && page.oldestMessageId) lines.push(`(earlier messages: --before ${page.oldestMessageId})`);
    return lines.join('\n');
  }

  renderRuns(summaries: readonly RunSummary[]): string {
    return summaries
      .map((run) => {
        const head = `${runStatusIcon(run.status)} ${run.runId}  ${formatTimestamp(run.createdAt)}  ${run.agentName ?? '-'}  ${run.messageCount} msg`;
        return run.agentsInvolved.length > 0 ? `${head}\n    agents: ${formatAgents(run.agentsInvolved)}` : head;
      })
      .join('\n');
  }

  renderError(error: string): string {
    return `Error: ${error}`;
  }
}
