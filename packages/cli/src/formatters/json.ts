import type { RunSummary, TranscriptPage } from '@threadmerge/core';
import type { OutputFormatter } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  renderPage(page: TranscriptPage): string {
    return JSON.stringify(page, null, 2);
  }

  renderRuns(summaries: readonly RunSummary[]): string {
    return JSON.stringify(summaries, null, 2);
  }

  renderError(error: string): string {
    return JSON.stringify({ error });
  }
}
