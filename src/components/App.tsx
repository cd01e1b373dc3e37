import React, { useState, useRef } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import MessageList, { ChatMessage } from './MessageList.js';
import ChatInput from './ChatInput.js';
import StatusIndicator from './StatusIndicator.js';
import { getTheme } from '../config/themes.js';
import { getPackageVersion } from '../config/version.js';
import type { ActivitySink, AssistantState } from '../orchestrator/types.js';
import type { ReasoningDispatcher } from '../services/dispatcher.js';
import { runCommand } from '../services/commands.js';
import { describeError } from '../services/errors.js';

const version = getPackageVersion();

interface AppProps {
  createDispatcher: (activity: ActivitySink) => ReasoningDispatcher;
  /** Persists a runtime setting changed through /config. */
  persistSetting?: (key: string, value: unknown) => void;
  themeName?: string;
}

const App: React.FC<AppProps> = ({ createDispatcher, persistSetting, themeName = 'default' }) => {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const terminalWidth = Math.max((stdout?.columns ?? 80) - 2, 20);
  const theme = getTheme(themeName);

  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [input, setInput] = useState('');
  const [busy, setBusy] = useState(false);
  const [status, setStatus] = useState<AssistantState>('idle');
  const [statusMessage, setStatusMessage] = useState('');
  const [lastActivity, setLastActivity] = useState('');
  const controllerRef = useRef<AbortController | null>(null);

  const [dispatcher] = useState(() =>
    createDispatcher({
      log: message => setLastActivity(message),
      setState: (state, message) => {
        setStatus(state);
        setStatusMessage(message ?? '');
      }
    })
  );

  const append = (message: ChatMessage) => setMessages(prev => [...prev, message]);

  useInput((char, key) => {
    if (key.escape && controllerRef.current) {
      controllerRef.current.abort();
    }
    if (key.ctrl && char === 'c') {
      controllerRef.current?.abort();
      exit();
    }
  });

  const ask = async (query: string) => {
    const controller = new AbortController();
    controllerRef.current = controller;
    setBusy(true);
    setLastActivity('');

    try {
      const result = await dispatcher.dispatch(query, { signal: controller.signal });
      if (result.success) {
        append({
          role: 'assistant',
          content: result.response,
          detail: `${result.method}, ${result.executionTime.toFixed(2)}s`
        });
      } else {
        append({ role: 'error', content: `${result.error} (${result.errorCode})` });
      }
    } finally {
      controllerRef.current = null;
      setBusy(false);
    }
  };

  const handleSubmit = (value: string) => {
    const text = value.trim();
    setInput('');
    if (!text || busy) return;

    const command = runCommand(text, dispatcher, {
      persist: (key, setting) => {
        try {
          persistSetting?.(key, setting);
        } catch (error) {
          append({ role: 'error', content: `Setting applied but not saved: ${describeError(error)}` });
        }
      }
    });

    if (command) {
      append({ role: 'system', content: command.output });
      if (command.exit) {
        exit();
      }
      return;
    }

    append({ role: 'user', content: text });
    void ask(text);
  };

  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text bold color={theme.colors.accent}>Hark</Text>
        <Text color={theme.colors.secondary}> v{version}, {dispatcher.getRegistry().size()} tools ready</Text>
      </Box>
      <MessageList messages={messages} theme={theme} />
      {busy && (
        <StatusIndicator
          theme={theme}
          state={status}
          message={statusMessage}
          lastActivity={lastActivity}
        />
      )}
      <ChatInput
        input={input}
        terminalWidth={terminalWidth}
        helpText={busy ? '' : '/metrics  /tools  /config  /exit'}
        theme={theme}
        disabled={busy}
        onInputChange={setInput}
        onSubmit={handleSubmit}
      />
    </Box>
  );
};

export default App;
