import type { RunSummary, TranscriptPage } from '@threadmerge/core';

export interface OutputFormatter {
  renderPage(page: TranscriptPage): string;
  renderRuns(summaries: readonly RunSummary[]): string;
  renderError(error: string): string;
}

export type OutputFormat = 'json' | 'md' | 'plain';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'md' || value === 'plain';
}
