import type { ConversationState } from './ConversationState';
import { DecodeError, SessionStateError } from './errors';
import type { InferenceEngine, StreamEvent, StreamMode, TextSink } from './types';

/** Characters dropped from the front of the first generated token */
const LEADING_WHITESPACE = /^[ \t\n]+/;

/**
 * Options for a TokenStreamController
 *
 * @category Session
 */
export interface TokenStreamOptions {
  engine: InferenceEngine;
  state: ConversationState;
  mode: StreamMode;
  /** Token budget: stop pulling once `absPos` reaches it */
  budget: number;
  /** Generated text (interactive mode) */
  stdout?: TextSink;
  /** Progress dots (interactive mode) */
  stderr?: TextSink;
  verbosity?: number;
  /** Consumer-side stop request, checked after every token */
  shouldStop?: () => boolean;
}

/**
 * Per-token decisions for one generation call
 *
 * Every event advances the state by one position, then is classified in
 * order:
 *
 * 1. **Prompt position** (`currentPos < promptSize`): the engine is still
 *    replaying the prompt. Interactive mode prints a progress dot; collect
 *    mode buffers the id so the batched detokenize covers the prompt too.
 * 2. **EOS**: closes the turn via `state.endTurn()`, which resets a
 *    single-turn session. Returns true; the engine ends its own stream.
 * 3. **Generated token**: detokenized on its own. The first one
 *    (`currentPos == promptSize + 1`) loses its leading space/tab/newline,
 *    left over from the control markup. Interactive mode writes the text
 *    immediately; collect mode buffers the id.
 *
 * Pull-based: {@link consume} iterates the engine's event stream and stops
 * pulling as soon as {@link onToken} returns false. Events are handled one at
 * a time; calling onToken again before the previous call settles throws.
 *
 * @example Collect mode
 * ```typescript
 * const controller = new TokenStreamController({ engine, state, mode: 'collect', budget: 3072 });
 * await controller.consume(engine.generate(request, state.rng));
 * const text = await engine.detokenize(controller.collected);
 * ```
 *
 * @category Session
 */
export class TokenStreamController {
  private _engine: InferenceEngine;
  private _state: ConversationState;
  private _mode: StreamMode;
  private _budget: number;
  private _stdout: TextSink | null;
  private _stderr: TextSink | null;
  private _verbosity: number;
  private _shouldStop: (() => boolean) | null;

  private _collected: number[];
  private _leadingTrim: number;
  private _sawEos: boolean;
  private _busy: boolean;

  constructor(options: TokenStreamOptions) {
    this._engine = options.engine;
    this._state = options.state;
    this._mode = options.mode;
    this._budget = options.budget;
    this._stdout = options.stdout ?? null;
    this._stderr = options.stderr ?? null;
    this._verbosity = options.verbosity ?? 0;
    this._shouldStop = options.shouldStop ?? null;
    this._collected = [];
    this._leadingTrim = 0;
    this._sawEos = false;
    this._busy = false;
  }

  /** Buffered token ids (collect mode), EOS excluded */
  get collected(): number[] {
    return [...this._collected];
  }

  /** Characters stripped from the front of the first generated token */
  get leadingTrim(): number {
    return this._leadingTrim;
  }

  /** Whether EOS closed the turn */
  get sawEos(): boolean {
    return this._sawEos;
  }

  /**
   * Classify one event
   *
   * @returns true to keep pulling, false to stop the engine early
   * @throws DecodeError if a generated token cannot be detokenized
   */
  async onToken(event: StreamEvent): Promise<boolean> {
    if (this._busy) {
      throw new SessionStateError('TokenStreamController.onToken: re-entrant call');
    }
    if (this._state.phase !== 'inProgress') return false;

    this._busy = true;
    try {
      return await this._classify(event);
    } finally {
      this._busy = false;
    }
  }

  /**
   * Pull events until the stream ends or onToken asks to stop
   *
   * Breaking out closes the engine's iterator, which ends generation.
   */
  async consume(events: AsyncIterable<StreamEvent>): Promise<void> {
    for await (const event of events) {
      if (!(await this.onToken(event))) break;
    }
  }

  private async _classify(event: StreamEvent): Promise<boolean> {
    const state = this._state;
    state.advance();

    if (state.isReadingPrompt) {
      if (this._mode === 'interactive') {
        this._stderr?.write('.');
      } else {
        this._collected.push(event.token);
      }
      return this._keepGoing();
    }

    if (event.token === this._engine.getEosToken()) {
      state.endTurn();
      this._sawEos = true;
      if (this._mode === 'interactive' && this._verbosity >= 2) {
        this._stdout?.write('\n[ End ]\n');
      }
      return true;
    }

    let text = await this._decode(event.token);
    if (state.isFirstGenerated) {
      const stripped = text.replace(LEADING_WHITESPACE, '');
      this._leadingTrim = text.length - stripped.length;
      text = stripped;
      if (this._mode === 'interactive' && this._verbosity >= 1) {
        this._stdout?.write('\n\n');
      }
    }

    if (this._mode === 'interactive') {
      this._stdout?.write(text);
    } else {
      this._collected.push(event.token);
    }
    return this._keepGoing();
  }

  private _keepGoing(): boolean {
    if (this._state.absPos >= this._budget) return false;
    if (this._shouldStop && this._shouldStop()) return false;
    return true;
  }

  private async _decode(token: number): Promise<string> {
    try {
      return await this._engine.detokenize([token]);
    } catch (err) {
      if (err instanceof DecodeError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new DecodeError(`Failed to detokenize token ${token}: ${message}`, [token], { cause: err });
    }
  }
}
