import React, { useState, useEffect } from 'react';
import { Box, Text } from 'ink';
import GlowingText from './GlowingText.js';
import { Theme } from '../config/themes.js';
import type { AssistantState } from '../orchestrator/types.js';

interface StatusIndicatorProps {
  theme: Theme;
  state: AssistantState;
  message: string;
  lastActivity?: string;
}

const STATE_ICONS: Record<AssistantState, string> = {
  idle: '○',
  listening: '◎',
  thinking: '◌',
  speaking: '◉',
  writing: '✎',
  error: '✗',
  sleeping: '☾'
};

export const formatElapsedTime = (ms: number): string => {
  const totalSeconds = Math.floor(ms / 1000);
  if (totalSeconds < 60) {
    return `${totalSeconds}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  return `${minutes}m ${totalSeconds % 60}s`;
};

const StatusIndicator: React.FC<StatusIndicatorProps> = ({ theme, state, message, lastActivity }) => {
  const [elapsed, setElapsed] = useState(0);
  const busy = state === 'thinking' || state === 'writing' || state === 'speaking';

  useEffect(() => {
    if (!busy) {
      setElapsed(0);
      return;
    }
    const startTime = Date.now();
    const interval = setInterval(() => setElapsed(Date.now() - startTime), 100);
    return () => clearInterval(interval);
  }, [busy]);

  const color = state === 'error' ? theme.colors.error : theme.colors.secondary;

  return (
    <Box flexDirection="column">
      <Box>
        <Text color={color}>{STATE_ICONS[state]} </Text>
        {busy ? <GlowingText text={message || 'Thinking...'} theme={theme} /> : <Text color={color}>{message || state}</Text>}
        {busy && (
          <>
            <Text color={theme.colors.secondary}> (</Text>
            <Text bold italic color={theme.colors.secondary}>esc</Text>
            <Text color={theme.colors.secondary}> to interrupt, {formatElapsedTime(elapsed)})</Text>
          </>
        )}
      </Box>
      {busy && lastActivity && (
        <Box paddingLeft={2}>
          <Text color={theme.colors.secondary}>{lastActivity}</Text>
        </Box>
      )}
    </Box>
  );
};

export default StatusIndicator;
