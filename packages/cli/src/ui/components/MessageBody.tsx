import React, { useMemo } from 'react';
import { Text } from 'ink';
import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { Spinner } from './Spinner.js';

marked.use(markedTerminal());

interface MessageBodyProps {
  content: string;
  pending: boolean;
}

export function MessageBody({ content, pending }: MessageBodyProps) {
  const rendered = useMemo(() => {
    if (!content) return '';
    // marked-terminal adds a trailing newline; trim for clean layout
    return marked(content, { async: false }).trimEnd();
  }, [content]);

  if (pending) return <Spinner color="green" text="Responding…" />;
  if (!rendered) return <Text color="gray">(no text)</Text>;
  return <Text>{rendered}</Text>;
}
