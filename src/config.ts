import * as os from 'node:os';
import { z } from 'zod';
import { ConfigValidationError } from './errors';
import type { ThreadPlan } from './types';

/** Pools larger than this get their threads pinned to cores */
export const PIN_THREADS_ABOVE = 10;

const defaultThreads = (): number => Math.min(Math.max(os.availableParallelism() - 2, 1), 18);

/** '1'/'true' and '0'/'false' as they arrive from argv */
const flag = z.preprocess((value) => {
  if (value === '1' || value === 'true') return true;
  if (value === '0' || value === 'false') return false;
  return value;
}, z.boolean());

/**
 * Session configuration
 *
 * Accepts numbers/booleans from code or strings from argv.
 *
 * @category Core
 */
export const SessionConfigSchema = z
  .object({
    maxTokens: z.coerce.number().int().positive().default(3072),
    maxGeneratedTokens: z.coerce.number().int().positive().default(2048),
    temperature: z.coerce.number().nonnegative().default(1.0),
    multiturn: flag.default(false),
    deterministic: flag.default(false),
    verbosity: z.coerce.number().int().min(0).default(1),
    numThreads: z.coerce.number().int().positive().default(defaultThreads),
  })
  .superRefine((config, ctx) => {
    if (config.maxGeneratedTokens > config.maxTokens) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxGeneratedTokens'],
        message: 'Maximum number of generated tokens is larger than the maximum total tokens',
      });
    }
  });

/** @category Core */
export type SessionConfig = z.output<typeof SessionConfigSchema>;

/**
 * Command-line flags, in the order the usage text lists them
 */
const FLAGS = [
  { name: 'max_tokens', key: 'maxTokens', help: 'Maximum number of tokens in prompt + generation', fallback: '3072' },
  { name: 'max_generated_tokens', key: 'maxGeneratedTokens', help: 'Maximum number of tokens to generate per turn', fallback: '2048' },
  { name: 'temperature', key: 'temperature', help: 'Temperature for top-K sampling', fallback: '1.0' },
  { name: 'deterministic', key: 'deterministic', help: 'Make top-k sampling deterministic (0 = false, 1 = true)', fallback: '0' },
  { name: 'multiturn', key: 'multiturn', help: 'Keep context across turns (0 = reset after every turn, 1 = carry over)', fallback: '0' },
  { name: 'verbosity', key: 'verbosity', help: 'Show verbose developer information (0 = only print generation output, 1 = standard user-facing terminal ui, 2 = show developer/debug info)', fallback: '1' },
  { name: 'num_threads', key: 'numThreads', help: 'Number of threads to use', fallback: 'available cores - 2, at most 18' },
  { name: 'engine', key: 'engine', help: 'Engine module to load (or set TURNLOOP_ENGINE)', fallback: '' },
  { name: 'model', key: 'model', help: 'Model type, passed to the engine', fallback: '' },
  { name: 'tokenizer', key: 'tokenizer', help: 'Path of the tokenizer file, passed to the engine', fallback: '' },
  { name: 'weights', key: 'weights', help: 'Path of the weights file, passed to the engine', fallback: '' },
] as const;

const BOOLEAN_FLAGS = new Set<string>(['deterministic', 'multiturn']);
const BOOLEAN_VALUES = new Set<string>(['0', '1', 'true', 'false']);
const ALIASES: Record<string, string> = { compressed_weights: 'weights' };

type FlagKey = (typeof FLAGS)[number]['key'];

/**
 * Result of parseArgs()
 *
 * @category Core
 */
export interface ParsedArgs {
  /** Raw flag values keyed by config field, ready for resolveConfig() */
  values: Partial<Record<FlagKey, string>>;
  /** Whether --help / -h was given */
  help: boolean;
  /** Arguments that are not flags */
  positional: string[];
}

/**
 * Usage text listing every flag and its default
 *
 * @category Core
 */
export function formatUsage(): string {
  const lines = [
    '',
    'turnloop',
    '--------',
    '',
    'Turn-by-turn chat and completion over a pluggable inference engine.',
    '',
    'Arguments',
    '',
  ];
  for (const f of FLAGS) {
    const fallback = f.fallback ? ` (default: ${f.fallback})` : '';
    lines.push(`  --${f.name.padEnd(22)} ${f.help}${fallback}`);
  }
  lines.push('', 'Interactive mode: enter a prompt and press enter; %q or %Q quits.', '');
  return lines.join('\n');
}

/**
 * Parse `--name value` / `--name=value` flags
 *
 * Boolean flags given without a value mean true.
 *
 * @throws ConfigValidationError on unknown flags or missing values
 *
 * @category Core
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const values: Partial<Record<FlagKey, string>> = {};
  const positional: string[] = [];
  const issues: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const rawName = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const name = ALIASES[rawName] ?? rawName;
    const def = FLAGS.find((f) => f.name === name);
    if (!def) {
      issues.push(`unknown flag --${rawName}`);
      continue;
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (BOOLEAN_FLAGS.has(name)) {
      // A bare boolean leaves the next argument alone unless it is a boolean value
      value = i + 1 < argv.length && BOOLEAN_VALUES.has(argv[i + 1]) ? argv[++i] : '1';
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      value = argv[++i];
    }

    if (value === undefined) {
      issues.push(`--${rawName} requires a value`);
      continue;
    }
    values[def.key] = value;
  }

  if (issues.length > 0) throw new ConfigValidationError(issues, formatUsage());
  return { values, help, positional };
}

/**
 * Validate configuration and fill in defaults
 *
 * Unknown keys (engine, paths) are ignored here.
 *
 * @throws ConfigValidationError with the usage text attached
 *
 * @category Core
 */
export function resolveConfig(input: unknown = {}): SessionConfig {
  const result = SessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigValidationError(issues, formatUsage());
  }
  return result.data;
}

/**
 * Thread pool size and pinning request for a thread count
 *
 * @category Core
 */
export function planThreads(numThreads: number): ThreadPlan {
  return {
    nThreads: numThreads,
    pin: numThreads > PIN_THREADS_ABOVE,
    mainThreadCore: numThreads - 1,
  };
}

const row = (label: string, value: string | number | boolean): string =>
  `${label.padEnd(30)}: ${value}`;

/**
 * Configuration table shown at startup
 *
 * Nothing at verbosity 0; machine details added at 2 and above.
 *
 * @category Core
 */
export function describeConfig(config: SessionConfig, verbosity: number, now: Date = new Date()): string {
  if (verbosity < 1) return '';
  const lines = [
    row('Max tokens', config.maxTokens),
    row('Max generated tokens', config.maxGeneratedTokens),
    row('Temperature', config.temperature),
    row('Deterministic', config.deterministic),
    row('Multiturn', config.multiturn),
    row('Verbosity', config.verbosity),
    row('Number of threads', config.numThreads),
  ];
  if (verbosity >= 2) {
    lines.push(
      row('Date & Time', now.toString()),
      row('Hardware concurrency', os.availableParallelism()),
      row('Thread pinning', planThreads(config.numThreads).pin),
    );
  }
  return lines.join('\n') + '\n';
}
