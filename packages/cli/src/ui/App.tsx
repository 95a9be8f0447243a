import React from 'react';
import { Box, Text } from 'ink';
import type { TranscriptState } from './transcript-state.js';
import { TranscriptView } from './TranscriptView.js';

interface AppProps {
  state: TranscriptState;
  showRuns?: boolean;
}

export function App({ state, showRuns = false }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">threadmerge</Text>
        <Text color="gray"> · session {state.sessionId}</Text>
      </Box>
      <TranscriptView state={state} showRuns={showRuns} />
    </Box>
  );
}
