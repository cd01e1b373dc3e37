import React from 'react';
import { Box, Text } from 'ink';
import { Theme } from '../config/themes.js';

export type ChatRole = 'user' | 'assistant' | 'system' | 'error';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** e.g. "orchestrator, 0.42s" */
  detail?: string;
}

interface MessageListProps {
  messages: ChatMessage[];
  theme: Theme;
}

const MessageList: React.FC<MessageListProps> = ({ messages, theme }) => {
  if (messages.length === 0) {
    return (
      <Box marginBottom={1}>
        <Text color={theme.colors.secondary}>Ask me anything. Type /help for commands.</Text>
      </Box>
    );
  }

  return (
    <>
      {messages.map((msg, index) => (
        <Box key={index} marginBottom={1} flexDirection="column">
          {msg.role === 'user' && <Text color={theme.colors.text}>&gt; {msg.content}</Text>}
          {msg.role === 'assistant' && (
            <Box paddingLeft={2} flexDirection="column">
              <Text color={theme.colors.primary}>● {msg.content}</Text>
              {msg.detail && <Text color={theme.colors.secondary}>  {msg.detail}</Text>}
            </Box>
          )}
          {msg.role === 'system' && (
            <Box paddingLeft={2}>
              <Text color={theme.colors.secondary}>{msg.content}</Text>
            </Box>
          )}
          {msg.role === 'error' && (
            <Box paddingLeft={2}>
              <Text color={theme.colors.error}>✗ {msg.content}</Text>
            </Box>
          )}
        </Box>
      ))}
    </>
  );
};

export default MessageList;
