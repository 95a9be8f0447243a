import React from 'react';
import { Box, Text } from 'ink';
import type { RunSummary } from '@threadmerge/core';
import { formatAgents, formatTimestamp, runStatusIcon } from '../format.js';

interface RunSummaryListProps {
  summaries: RunSummary[];
}

export function RunSummaryList({ summaries }: RunSummaryListProps) {
  if (summaries.length === 0) return null;

  return (
    <Box flexDirection="column" marginY={1}>
      <Text bold color="yellow">Runs:</Text>
      {summaries.map((run) => (
        <Box key={run.runId} flexDirection="column">
          <Box>
            <Text color={run.status === 'failed' ? 'red' : run.status === 'completed' ? 'green' : 'yellow'}>
              {'  '}
              {runStatusIcon(run.status)}{' '}
            </Text>
            <Text bold>{run.agentName ?? run.teamName ?? run.runId}</Text>
            <Text color="gray">
              {' '}
              {formatTimestamp(run.createdAt)} · {run.messageCount} msg
            </Text>
          </Box>
          {run.agentsInvolved.length > 0 && <Text color="gray">      {formatAgents(run.agentsInvolved)}</Text>}
        </Box>
      ))}
    </Box>
  );
}
