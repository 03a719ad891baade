import React, { useState, useEffect } from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import { createEngine, type InferenceEngine } from '../../../../src/index.js';

export interface EnginePaths {
  model?: string;
  tokenizer?: string;
  weights?: string;
}

interface EngineLoaderProps {
  engine: string;
  paths: EnginePaths;
  numThreads: number;
  onLoaded: (engine: InferenceEngine) => void;
  onError: (error: string) => void;
}

export const EngineLoader: React.FC<EngineLoaderProps> = ({
  engine,
  paths,
  numThreads,
  onLoaded,
  onError
}) => {
  const [logs, setLogs] = useState<string[]>([]);

  useEffect(() => {
    let disposed = false;

    // Loader warnings (TURNLOOP_VERBOSE=1) would tear through ink's output
    const originalWarn = console.warn;
    const captured: string[] = [];
    console.warn = (...args: unknown[]) => {
      captured.push(args.map(String).join(' '));
      setLogs([...captured]);
    };

    createEngine({ ...paths, numThreads }, { engine })
      .then((loaded) => {
        console.warn = originalWarn;
        if (disposed) loaded.dispose?.();
        else onLoaded(loaded);
      })
      .catch((err: unknown) => {
        console.warn = originalWarn;
        if (!disposed) onError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      disposed = true;
      console.warn = originalWarn;
    };
  }, [engine, paths, numThreads, onLoaded, onError]);

  return (
    <Box flexDirection="column" paddingX={2}>
      <Box marginBottom={1}>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text bold color="cyan">
          {' '}Loading engine...
        </Text>
      </Box>

      <Box marginBottom={1}>
        <Text dimColor>
          Engine: {engine} • {numThreads} threads
        </Text>
      </Box>

      {logs.length > 0 && (
        <Box flexDirection="column" marginTop={1} borderStyle="round" borderColor="gray" paddingX={1}>
          {logs.slice(-15).map((log, i) => (
            <Text key={i} dimColor>
              {log}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};
