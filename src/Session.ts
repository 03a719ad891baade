import { performance } from 'node:perf_hooks';
import type { SessionConfig } from './config';
import { ConversationState } from './ConversationState';
import { DecodeError, EncodeError } from './errors';
import { PromptFormatter } from './PromptFormatter';
import { TokenStreamController } from './TokenStream';
import type {
  AcceptPredicate,
  GenerationRequest,
  InferenceEngine,
  SessionResult,
  TextSink,
  TurnStats,
} from './types';

/** Lines that end an interactive session */
export const QUIT_SENTINELS: readonly string[] = ['%q', '%Q'];

/**
 * Whether a raw input line is the quit sentinel
 *
 * @category Session
 */
export const isQuitSentinel = (line: string): boolean => QUIT_SENTINELS.includes(line);

/**
 * Options for a Session
 *
 * @category Session
 */
export interface SessionOptions {
  engine: InferenceEngine;
  config: SessionConfig;
  /** Generated text, prompts and stats (default: process.stdout) */
  stdout?: TextSink;
  /** Progress and diagnostics (default: process.stderr) */
  stderr?: TextSink;
  /** Token-acceptance predicate passed to the engine (default: accept all) */
  accept?: AcceptPredicate;
  /** Turn markup (default: {@link DEFAULT_TURN_MARKERS}) */
  formatter?: PromptFormatter;
  /** Called after every completed turn */
  onTurn?: (stats: TurnStats) => void;
  /** Checked after every token; true ends the current turn early */
  shouldStop?: () => boolean;
}

const acceptAll: AcceptPredicate = () => true;

/**
 * Session - interactive multi-turn loop over one ConversationState
 *
 * Owns the state (and through it the RNG) for its whole lifetime. The engine
 * is borrowed; dispose it yourself.
 *
 * Each turn: format → tokenize (+BOS on the session's first turn) →
 * beginTurn → generate, pulled through an interactive
 * {@link TokenStreamController} → stats. The loop stops on `%q`/`%Q`, on
 * input exhaustion, or once `absPos` reaches `maxTokens`; none of these is an
 * error.
 *
 * Tokenize/detokenize failures abort only the turn: the state is rolled back
 * to where the turn started and the next line is read.
 *
 * @example
 * ```typescript
 * const rl = readline.createInterface({ input: process.stdin });
 * const session = new Session({ engine, config });
 * const { reason } = await session.run(rl);
 * ```
 *
 * @category Session
 */
export class Session {
  private _engine: InferenceEngine;
  private _config: SessionConfig;
  private _state: ConversationState;
  private _formatter: PromptFormatter;
  private _stdout: TextSink;
  private _stderr: TextSink;
  private _accept: AcceptPredicate;
  private _onTurn: ((stats: TurnStats) => void) | null;
  private _shouldStop: (() => boolean) | undefined;

  constructor(options: SessionOptions) {
    this._engine = options.engine;
    this._config = options.config;
    this._state = new ConversationState({
      multiturn: options.config.multiturn,
      deterministic: options.config.deterministic,
    });
    this._formatter = options.formatter ?? new PromptFormatter();
    this._stdout = options.stdout ?? process.stdout;
    this._stderr = options.stderr ?? process.stderr;
    this._accept = options.accept ?? acceptAll;
    this._onTurn = options.onTurn ?? null;
    this._shouldStop = options.shouldStop;
  }

  /** Conversation state (read-only use) */
  get state(): ConversationState {
    return this._state;
  }

  /** Whether the token budget is spent */
  get exhausted(): boolean {
    return this._state.absPos >= this._config.maxTokens;
  }

  /**
   * Read prompts until quit, input exhaustion or budget exhaustion
   *
   * @param input - One prompt per line (a readline.Interface works as-is)
   */
  async run(input: AsyncIterable<string>): Promise<SessionResult> {
    const { verbosity, maxTokens } = this._config;
    const lines = input[Symbol.asyncIterator]();

    try {
      while (!this.exhausted) {
        if (verbosity >= 1) this._stdout.write('> ');
        const next = await lines.next();

        if (next.done) return this._end('exhausted');
        if (isQuitSentinel(next.value)) return this._end('quit');

        try {
          await this.turn(next.value);
        } catch (err) {
          if (err instanceof EncodeError || err instanceof DecodeError) {
            this._stderr.write(`\n[turnloop] Turn aborted: ${err.message}\n`);
            continue;
          }
          throw err;
        }
      }
    } finally {
      await lines.return?.();
    }

    if (this._state.phase !== 'terminated') this._state.terminate();
    this._stdout.write(
      `max_tokens (${maxTokens}) exceeded. Use a larger value if desired using the --max_tokens command line flag.\n`
    );
    return this._result('budget');
  }

  /**
   * Run one turn for a raw prompt
   *
   * @throws EncodeError / DecodeError after rolling the turn back
   */
  async turn(prompt: string): Promise<TurnStats> {
    const { verbosity, maxTokens, maxGeneratedTokens, temperature } = this._config;
    const state = this._state;

    const formatted = this._formatter.format(prompt, state, this._engine.isInstructionTuned());
    const tokens = await this._formatter.tokenize(this._engine, formatted, state);

    const request: GenerationRequest = {
      promptTokens: tokens,
      startPos: state.absPos,
      maxTokens,
      maxGeneratedTokens,
      temperature,
      accept: this._accept,
      verbosity,
    };

    state.beginTurn(tokens.length);
    this._stderr.write('\n[ Reading prompt ] ');

    const controller = new TokenStreamController({
      engine: this._engine,
      state,
      mode: 'interactive',
      budget: maxTokens,
      stdout: this._stdout,
      stderr: this._stderr,
      verbosity,
      shouldStop: this._shouldStop,
    });

    const start = performance.now();
    try {
      await controller.consume(this._engine.generate(request, state.rng));
    } catch (err) {
      state.abortTurn();
      throw err;
    }
    const elapsedMs = performance.now() - start;
    state.finishTurn(maxTokens);

    const stats: TurnStats = {
      turn: state.turns,
      promptTokens: tokens.length,
      tokens: state.currentPos,
      totalTokens: state.absPos,
      endOfSequence: controller.sawEos,
      elapsedMs,
      tokensPerSecond: elapsedMs > 0 ? state.currentPos / (elapsedMs / 1000) : 0,
    };

    if (verbosity >= 2) {
      this._stdout.write(
        `${stats.tokens} tokens (${stats.totalTokens} total tokens)\n${stats.tokensPerSecond} tokens / sec\n`
      );
    }
    this._stdout.write('\n\n');

    if (this._onTurn) this._onTurn(stats);
    return stats;
  }

  private _end(reason: 'quit' | 'exhausted'): SessionResult {
    this._state.terminate();
    return this._result(reason);
  }

  private _result(reason: SessionResult['reason']): SessionResult {
    return { reason, turns: this._state.turns, totalTokens: this._state.absPos };
  }
}
