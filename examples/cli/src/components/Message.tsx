import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

let markedConfigured = false;
function ensureMarkedConfigured() {
  if (!markedConfigured) {
    marked.use(markedTerminal());
    markedConfigured = true;
  }
}

function renderMarkdown(source: string): string {
  const out = marked.parse(source, { async: false });
  return typeof out === 'string' ? out : source;
}

export interface ChatMessage {
  role: 'user' | 'assistant' | 'notice';
  content: string;
}

interface MessageProps extends ChatMessage {
  isGenerating?: boolean;
}

export const Message: React.FC<MessageProps> = ({
  role,
  content,
  isGenerating = false,
}) => {
  const renderedContent = useMemo(() => {
    if (role !== 'assistant' || !content) return content;
    ensureMarkedConfigured();

    // While streaming, render complete lines and leave the tail raw
    if (isGenerating) {
      const lastNewlineIndex = content.lastIndexOf('\n');
      if (lastNewlineIndex === -1) return content;
      return (
        renderMarkdown(content.substring(0, lastNewlineIndex + 1)) +
        content.substring(lastNewlineIndex + 1)
      );
    }

    return renderMarkdown(content).trim();
  }, [role, content, isGenerating]);

  if (role === 'notice') {
    return (
      <Box marginBottom={1}>
        <Text color="yellow">{content}</Text>
      </Box>
    );
  }

  return (
    <Box marginBottom={1}>
      {isGenerating && !content ? (
        <>
          <Text bold color="green">
            ✨
          </Text>
          <Text color="green">
            <Spinner type="dots" />
          </Text>
        </>
      ) : (
        <Box flexDirection="row">
          <Text bold color={role === 'user' ? 'blue' : 'green'}>
            {role === 'user' ? '>  ' : '✨'}
          </Text>
          <Text>{renderedContent}</Text>
        </Box>
      )}
    </Box>
  );
};
