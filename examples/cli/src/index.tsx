#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import { App } from './components/App.js';
import { ConfigValidationError, parseArgs, resolveConfig } from '../../../src/index.js';

// Same flags as the chat example; the boot screen lets you edit the common ones
function readArgs() {
  const parsed = parseArgs(process.argv.slice(2));
  const config = resolveConfig(parsed.values);
  return {
    config,
    engine: parsed.values.engine ?? process.env.TURNLOOP_ENGINE ?? '',
    paths: {
      model: parsed.values.model,
      tokenizer: parsed.values.tokenizer,
      weights: parsed.values.weights,
    },
  };
}

try {
  const { config, engine, paths } = readArgs();
  render(<App config={config} engine={engine} paths={paths} />);
} catch (err) {
  if (err instanceof ConfigValidationError) {
    process.stderr.write(`${err.usage}\n${err.message}\n`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
