import * as readline from 'node:readline';
import { complete } from './Completion';
import { describeConfig, formatUsage, parseArgs, resolveConfig } from './config';
import type { ParsedArgs, SessionConfig } from './config';
import { ConfigValidationError } from './errors';
import { createEngine } from './loader';
import { Session } from './Session';
import type { InferenceEngine, SessionResult, TextSink, TurnStats } from './types';

const INSTRUCTIONS =
  '*Usage*\n' +
  '  Enter an instruction and press enter (%Q quits).\n\n' +
  '*Examples*\n' +
  '  - Summarize the plot of a heist movie in three sentences.\n' +
  '  - List five names for a bakery that only sells bread.\n' +
  '  - Explain what a closure is to a new programmer.\n';

/**
 * I/O for chat()
 *
 * @category Core
 */
export interface ChatIO {
  /** Prompt lines (default: process.stdin, line by line) */
  input?: AsyncIterable<string>;
  stdout?: TextSink;
  stderr?: TextSink;
  onTurn?: (stats: TurnStats) => void;
}

/**
 * Usage text for every flag chat() and completion() accept
 *
 * @category Core
 */
export function showHelp(): string {
  return formatUsage();
}

/**
 * Interactive chat from an argument vector
 *
 * Parses flags, validates them (printing the usage text on failure), loads
 * the engine and runs a {@link Session} until quit, end of input or budget
 * exhaustion. `--help` prints the usage text and returns null.
 *
 * @example
 * ```typescript
 * await chat(['--engine', 'my-engine', '--multiturn', '1', '--max_tokens', '4096']);
 * ```
 *
 * @category Core
 */
export async function chat(args: string[], io: ChatIO = {}): Promise<SessionResult | null> {
  const stdout = io.stdout ?? process.stdout;
  const stderr = io.stderr ?? process.stderr;

  const startup = prepare(args, stderr);
  if (startup.parsed.help) {
    stdout.write(formatUsage());
    return null;
  }

  const { config, parsed } = startup;
  const engine = await openEngine(parsed, config);
  const { input, close } = openInput(io);

  try {
    if (config.verbosity >= 1) {
      stdout.write('turnloop\n\n');
      stdout.write(describeConfig(config, config.verbosity));
      stdout.write('\n' + INSTRUCTIONS + '\n');
    }
    const session = new Session({ engine, config, stdout, stderr, onTurn: io.onTurn });
    return await session.run(input);
  } finally {
    close();
    engine.dispose?.();
  }
}

/**
 * One-shot completion from an argument vector
 *
 * @example
 * ```typescript
 * const text = await completion(['--engine', 'my-engine', '--deterministic'], 'Hello');
 * ```
 *
 * @category Core
 */
export async function completion(args: string[], prompt: string): Promise<string> {
  const { config, parsed } = prepare(args, process.stderr);
  const engine = await openEngine(parsed, config);
  try {
    return await complete(engine, prompt, config);
  } finally {
    engine.dispose?.();
  }
}

function openInput(io: ChatIO): { input: AsyncIterable<string>; close: () => void } {
  if (io.input) return { input: io.input, close: () => undefined };
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  return { input: rl, close: () => rl.close() };
}

function prepare(args: string[], stderr: TextSink): { parsed: ParsedArgs; config: SessionConfig } {
  try {
    const parsed = parseArgs(args);
    return { parsed, config: resolveConfig(parsed.help ? {} : parsed.values) };
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      stderr.write(err.usage);
      stderr.write(`\n${err.message}\n`);
    }
    throw err;
  }
}

function openEngine(parsed: ParsedArgs, config: SessionConfig): Promise<InferenceEngine> {
  const { engine, model, tokenizer, weights } = parsed.values;
  return createEngine({ model, tokenizer, weights, numThreads: config.numThreads }, { engine });
}
