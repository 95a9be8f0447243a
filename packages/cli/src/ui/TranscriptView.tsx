import React from 'react';
import { Box, Text } from 'ink';
import type { TranscriptState } from './transcript-state.js';
import { MessageLine } from './components/MessageLine.js';
import { RunSummaryList } from './components/RunSummaryList.js';
import { Spinner } from './components/Spinner.js';

interface TranscriptViewProps {
  state: TranscriptState;
  showRuns: boolean;
}

export function TranscriptView({ state, showRuns }: TranscriptViewProps) {
  const { page } = state;

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      {!page && !state.error && <Spinner text="Reconciling transcript..." />}

      {page?.degraded && (
        <Text color="yellow">The run log could not be read; only ledger messages are shown.</Text>
      )}

      {page?.hasMore && page.oldestMessageId && (
        <Text color="gray">Earlier messages: --before {page.oldestMessageId}</Text>
      )}

      {page && page.messages.length === 0 && <Text color="gray">No messages.</Text>}

      {page?.messages.map((message) => <MessageLine key={message.messageId} message={message} />)}

      {showRuns && page && <RunSummaryList summaries={page.runSummaries} />}

      {state.following && <Spinner color="yellow" text={`Following reply (poll ${state.polls})...`} />}

      {state.error && <Text color="red">Error: {state.error}</Text>}
    </Box>
  );
}
