import React from 'react';
import { Box, Text } from 'ink';
import type { CanonicalMessage } from '@threadmerge/core';
import { formatAgents, formatAttachments, formatTimestamp, isPendingReply, speakerLabel } from '../format.js';
import { MessageBody } from './MessageBody.js';

const ROLE_COLORS: Record<CanonicalMessage['role'], string> = {
  user: 'cyan',
  assistant: 'green',
  system: 'yellow',
  tool: 'magenta',
};

export function MessageLine({ message }: { message: CanonicalMessage }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Text bold color={ROLE_COLORS[message.role]}>{speakerLabel(message)}</Text>
        <Text color="gray"> {formatTimestamp(message.timestamp)}</Text>
        {message.status === 'streaming' ? <Text color="yellow"> (streaming)</Text> : null}
      </Box>
      <Box paddingLeft={2}>
        <MessageBody content={message.content} pending={isPendingReply(message)} />
      </Box>
      {message.attachments.length > 0 && (
        <Text color="gray">  Attachments: {formatAttachments(message.attachments)}</Text>
      )}
      {message.agentsInvolved.length > 0 && (
        <Text color="gray">  Agents: {formatAgents(message.agentsInvolved)}</Text>
      )}
      {message.feedback?.reaction ? <Text color="gray">  Feedback: {message.feedback.reaction}</Text> : null}
    </Box>
  );
}
