import React, { useState, useRef } from 'react';
import { Box, Text, useInput, useFocus, useFocusManager } from 'ink';
import TextInput from 'ink-text-input';

export interface BootConfig {
  engine: string;
  maxTokens: number;
  numThreads: number;
  multiturn: boolean;
}

interface BootScreenProps {
  initialConfig: BootConfig;
  onStart: (config: BootConfig) => void;
}

export const BootScreen: React.FC<BootScreenProps> = ({ initialConfig, onStart }) => {
  const [engine, setEngine] = useState(initialConfig.engine);
  const [maxTokens, setMaxTokens] = useState(initialConfig.maxTokens.toString());
  const [threads, setThreads] = useState(initialConfig.numThreads.toString());
  const [multiturn, setMultiturn] = useState(initialConfig.multiturn);

  // Set while a clear is in flight so TextInput's onChange doesn't undo it
  const clearingRef = useRef(false);

  const { isFocused: engineFocused } = useFocus({ autoFocus: true, id: 'engine' });
  const { isFocused: tokensFocused } = useFocus({ id: 'max-tokens' });
  const { isFocused: threadsFocused } = useFocus({ id: 'threads' });
  const { isFocused: multiturnFocused } = useFocus({ id: 'multiturn' });

  const { focusNext, focusPrevious } = useFocusManager();

  const clearFocused = () => {
    clearingRef.current = true;
    if (engineFocused) setEngine('');
    else if (tokensFocused) setMaxTokens('');
    else if (threadsFocused) setThreads('');
    setTimeout(() => { clearingRef.current = false; }, 0);
  };

  useInput((input, key) => {
    if ((key.ctrl || key.meta) && (key.backspace || key.delete)) {
      clearFocused();
      return;
    }

    // Ctrl+U on Unix terminals
    if (key.ctrl && input === 'u') {
      clearFocused();
      return;
    }

    if (multiturnFocused && input === ' ') {
      setMultiturn((on) => !on);
      return;
    }

    if (key.return) {
      handleStart();
      return;
    }

    if (key.downArrow) {
      focusNext();
      return;
    }

    if (key.upArrow) {
      focusPrevious();
    }
  });

  const handleStart = () => {
    onStart({
      engine: engine.trim() || initialConfig.engine,
      maxTokens: parseInt(maxTokens, 10) || initialConfig.maxTokens,
      numThreads: parseInt(threads, 10) || initialConfig.numThreads,
      multiturn,
    });
  };

  return (
    <Box flexDirection="column" padding={2}>
      <Box marginBottom={2} borderStyle="round" borderColor="cyan" paddingX={2}>
        <Text bold color="cyan">
          Configuration
        </Text>
      </Box>

      <Box flexDirection="column" marginBottom={1}>
        <Text bold color={engineFocused ? 'green' : 'gray'}>
          Engine (package or path):
        </Text>
        <Box marginLeft={2}>
          <TextInput
            value={engine}
            onChange={(val) => !clearingRef.current && setEngine(val)}
            placeholder="Enter engine module..."
            focus={engineFocused}
          />
        </Box>
      </Box>

      <Box flexDirection="column" marginBottom={1}>
        <Text bold color={tokensFocused ? 'green' : 'gray'}>
          Max tokens: <Text dimColor>(default {initialConfig.maxTokens})</Text>
        </Text>
        <Box marginLeft={2}>
          <TextInput
            value={maxTokens}
            onChange={(val) => !clearingRef.current && setMaxTokens(val)}
            placeholder={initialConfig.maxTokens.toString()}
            focus={tokensFocused}
          />
        </Box>
      </Box>

      <Box flexDirection="column" marginBottom={1}>
        <Text bold color={threadsFocused ? 'green' : 'gray'}>
          Threads: <Text dimColor>(default {initialConfig.numThreads})</Text>
        </Text>
        <Box marginLeft={2}>
          <TextInput
            value={threads}
            onChange={(val) => !clearingRef.current && setThreads(val)}
            placeholder={initialConfig.numThreads.toString()}
            focus={threadsFocused}
          />
        </Box>
      </Box>

      <Box marginBottom={2}>
        <Text bold color={multiturnFocused ? 'green' : 'gray'}>
          Multiturn: </Text>
        <Text>{multiturn ? '[x] keep context across turns' : '[ ] reset after every turn'}</Text>
      </Box>

      <Box marginTop={2} justifyContent="center">
        <Text dimColor>
          Tab/↑/↓ to navigate • Space toggles multiturn • Enter to start
        </Text>
      </Box>
    </Box>
  );
};
