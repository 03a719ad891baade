import React, { useState, useRef, useEffect } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import {
  Session,
  isQuitSentinel,
  type InferenceEngine,
  type SessionConfig,
  type TextSink,
  type TurnStats,
} from '../../../../src/index.js';
import { Message, type ChatMessage } from './Message.js';
import TextInput from 'ink-text-input';

interface ChatProps {
  engine: InferenceEngine;
  engineName: string;
  config: SessionConfig;
}

const appendToLast = (messages: ChatMessage[], text: string): ChatMessage[] => {
  const last = messages[messages.length - 1];
  if (!last || last.role !== 'assistant') return messages;
  return [...messages.slice(0, -1), { ...last, content: last.content + text }];
};

export const Chat: React.FC<ChatProps> = ({ engine, engineName, config }) => {
  const { exit } = useApp();
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [input, setInput] = useState('');
  const [generating, setGenerating] = useState(false);
  const [reading, setReading] = useState(false);
  const [exhausted, setExhausted] = useState(false);
  const [telemetry, setTelemetry] = useState<TurnStats | null>(null);
  const [position, setPosition] = useState(0);

  // Prompt history
  const [promptHistory, setPromptHistory] = useState<string[]>([]);
  const [historyIndex, setHistoryIndex] = useState(-1);

  const sessionRef = useRef<Session | null>(null);
  const cancelRef = useRef(false);
  if (!sessionRef.current) {
    const stdout: TextSink = {
      write: (text: string) => {
        setReading(false);
        setMessages((prev) => appendToLast(prev, text));
        return true;
      },
    };
    // Prompt progress dots go here; the spinner stands in for them
    const stderr: TextSink = { write: () => true };
    sessionRef.current = new Session({
      engine,
      // The UI draws its own prompt and stats
      config: { ...config, verbosity: 0 },
      stdout,
      stderr,
      onTurn: setTelemetry,
      shouldStop: () => cancelRef.current,
    });
  }

  useEffect(() => () => engine.dispose?.(), [engine]);

  useInput((_input, key) => {
    if (key.escape && generating) {
      cancelRef.current = true;
      return;
    }

    if (key.upArrow && promptHistory.length > 0) {
      const next = historyIndex === -1 ? promptHistory.length - 1 : Math.max(historyIndex - 1, 0);
      setHistoryIndex(next);
      setInput(promptHistory[next]);
      return;
    }

    if (key.downArrow && historyIndex !== -1) {
      if (historyIndex < promptHistory.length - 1) {
        setHistoryIndex(historyIndex + 1);
        setInput(promptHistory[historyIndex + 1]);
      } else {
        setHistoryIndex(-1);
        setInput('');
      }
    }
  });

  const handleSubmit = (value: string) => {
    const session = sessionRef.current;
    if (!session || generating || exhausted) return;
    if (isQuitSentinel(value)) {
      exit();
      return;
    }

    setInput('');
    setHistoryIndex(-1);
    setPromptHistory((prev) => [...prev, value]);
    setMessages((prev) => [
      ...prev,
      { role: 'user', content: value },
      { role: 'assistant', content: '' },
    ]);
    cancelRef.current = false;
    setGenerating(true);
    setReading(true);

    void session
      .turn(value)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        setMessages((prev) => [...prev, { role: 'notice', content: `Turn aborted: ${message}` }]);
      })
      .finally(() => {
        setGenerating(false);
        setReading(false);
        setPosition(session.state.absPos);
        if (session.exhausted) {
          setExhausted(true);
          setMessages((prev) => [
            ...prev,
            {
              role: 'notice',
              content: `max_tokens (${config.maxTokens}) exceeded. Use a larger value if desired using the --max_tokens command line flag.`,
            },
          ]);
        }
      });
  };

  return (
    <Box flexDirection="column" paddingX={1}>
      {messages.map((message, i) => (
        <Message
          key={i}
          role={message.role}
          content={message.content.trim()}
          isGenerating={generating && i === messages.length - 1}
        />
      ))}

      {reading && (
        <Text dimColor>[ Reading prompt ]</Text>
      )}

      {!exhausted && (
        <Box>
          <Text color="green" bold>
            {'> '}
          </Text>
          <TextInput
            value={input}
            onChange={setInput}
            onSubmit={handleSubmit}
            placeholder="Type your message... (%q quits)"
            focus={!generating}
          />
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>
          {engineName} • {position}/{config.maxTokens} tokens
          {config.multiturn ? ' • multiturn' : ''}
          {telemetry
            ? ` • last turn ${telemetry.tokens} tokens, ${telemetry.tokensPerSecond.toFixed(1)} tok/s`
            : ''}
          {generating ? ' • Esc to stop' : ''}
          {' • Ctrl+C to exit'}
        </Text>
      </Box>
    </Box>
  );
};
