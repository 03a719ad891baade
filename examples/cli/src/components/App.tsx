import React, { useState } from 'react';
import { Box, Text } from 'ink';
import type { InferenceEngine, SessionConfig } from '../../../../src/index.js';
import { BootScreen, type BootConfig } from './BootScreen.js';
import { EngineLoader, type EnginePaths } from './EngineLoader.js';
import { Chat } from './Chat.js';

interface AppProps {
  config: SessionConfig;
  engine: string;
  paths: EnginePaths;
}

type AppState =
  | { stage: 'boot' }
  | { stage: 'loading'; boot: BootConfig }
  | { stage: 'ready'; engine: InferenceEngine; boot: BootConfig }
  | { stage: 'error'; error: string };

export const App: React.FC<AppProps> = ({ config, engine, paths }) => {
  const [appState, setAppState] = useState<AppState>({ stage: 'boot' });

  if (appState.stage === 'boot') {
    return (
      <BootScreen
        initialConfig={{
          engine,
          maxTokens: config.maxTokens,
          numThreads: config.numThreads,
          multiturn: config.multiturn,
        }}
        onStart={(boot) => setAppState({ stage: 'loading', boot })}
      />
    );
  }

  if (appState.stage === 'loading') {
    const { boot } = appState;
    return (
      <EngineLoader
        engine={boot.engine}
        paths={paths}
        numThreads={boot.numThreads}
        onLoaded={(loaded) => setAppState({ stage: 'ready', engine: loaded, boot })}
        onError={(error) => setAppState({ stage: 'error', error })}
      />
    );
  }

  if (appState.stage === 'ready') {
    const { boot } = appState;
    // The boot screen can lower the budget below the configured generation cap
    const maxTokens = boot.maxTokens;
    return (
      <Chat
        engine={appState.engine}
        engineName={boot.engine.split('/').pop() || 'engine'}
        config={{
          ...config,
          maxTokens,
          maxGeneratedTokens: Math.min(config.maxGeneratedTokens, maxTokens),
          numThreads: boot.numThreads,
          multiturn: boot.multiturn,
        }}
      />
    );
  }

  return (
    <Box flexDirection="column" padding={2}>
      <Text bold color="red">
        Error
      </Text>
      <Text>{appState.error}</Text>
    </Box>
  );
};
