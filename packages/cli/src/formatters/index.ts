import type { OutputFormat, OutputFormatter } from './formatter.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export function createFormatter(format: OutputFormat): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
  }
}

export { isOutputFormat, type OutputFormat, type OutputFormatter } from './formatter.js';
