import { SessionStateError } from './errors';
import { DETERMINISTIC_SEED, Rng } from './Rng';
import type { TurnPhase } from './types';

/**
 * Position counters and seed policy for one session
 *
 * Two counters move together while a turn is in progress: `absPos` counts
 * every token the engine has consumed since the session (or the last reset)
 * began, `currentPos` counts only the current turn. `absPos` is what the
 * engine uses as its KV write position, so it is also the `startPos` of the
 * next GenerationRequest.
 *
 * Phases:
 *
 * ```
 *   awaiting ──beginTurn──▶ inProgress ──endTurn (EOS)──▶ awaiting
 *      │                        │
 *      │                        ├──finishTurn (no EOS)──▶ awaiting | terminated
 *      │                        └──abortTurn (error)────▶ awaiting (position and RNG rolled back)
 *      └──terminate──▶ terminated
 * ```
 *
 * A reset (`absPos → 0`) only ever happens on `endTurn()` of a
 * single-turn session. With `deterministic` set, the RNG is reseeded at
 * construction and on every reset, so each independent turn samples from the
 * same sequence.
 *
 * Mutated only by Session/complete() and by TokenStreamController.
 *
 * @category Session
 */
export class ConversationState {
  readonly multiturn: boolean;
  readonly deterministic: boolean;
  readonly rng: Rng;

  private _absPos: number;
  private _currentPos: number;
  private _promptSize: number;
  private _phase: TurnPhase;
  private _turnStartAbsPos: number;
  private _turnStartRng: number;
  private _turns: number;

  constructor({ multiturn, deterministic }: { multiturn: boolean; deterministic: boolean }) {
    this.multiturn = multiturn;
    this.deterministic = deterministic;
    this.rng = new Rng(deterministic ? DETERMINISTIC_SEED : Rng.entropySeed());
    this._absPos = 0;
    this._currentPos = 0;
    this._promptSize = 0;
    this._phase = 'awaiting';
    this._turnStartAbsPos = 0;
    this._turnStartRng = this.rng.snapshot();
    this._turns = 0;
  }

  get absPos(): number {
    return this._absPos;
  }

  get currentPos(): number {
    return this._currentPos;
  }

  get promptSize(): number {
    return this._promptSize;
  }

  get phase(): TurnPhase {
    return this._phase;
  }

  /** Turns started so far, aborted ones excluded */
  get turns(): number {
    return this._turns;
  }

  /** True once the first generated token of the turn has been consumed */
  get isFirstGenerated(): boolean {
    return this._currentPos === this._promptSize + 1;
  }

  /** True while the engine is still replaying prompt positions */
  get isReadingPrompt(): boolean {
    return this._currentPos < this._promptSize;
  }

  beginTurn(promptSize: number): void {
    this._expect('awaiting', 'beginTurn');
    this._currentPos = 0;
    this._promptSize = promptSize;
    this._turnStartAbsPos = this._absPos;
    this._turnStartRng = this.rng.snapshot();
    this._phase = 'inProgress';
    this._turns++;
  }

  /** One token consumed: absolute first, then turn-local */
  advance(): void {
    this._expect('inProgress', 'advance');
    this._absPos++;
    this._currentPos++;
  }

  /** Engine signalled end-of-sequence */
  endTurn(): void {
    this._expect('inProgress', 'endTurn');
    if (!this.multiturn) this.reset();
    this._phase = 'awaiting';
  }

  /**
   * Generation call returned without EOS. Terminal once the budget is spent.
   * No-op if EOS already closed the turn.
   */
  finishTurn(budget: number): void {
    if (this._phase !== 'inProgress') return;
    this._phase = this._absPos >= budget ? 'terminated' : 'awaiting';
  }

  /**
   * Roll back a failed turn so the session can take the next prompt.
   * Position and RNG both return to where the turn started.
   */
  abortTurn(): void {
    if (this._phase !== 'inProgress') return;
    this._absPos = this._turnStartAbsPos;
    this.rng.reseed(this._turnStartRng);
    this._currentPos = 0;
    this._phase = 'awaiting';
    this._turns--;
  }

  terminate(): void {
    if (this._phase === 'inProgress') {
      throw new SessionStateError('terminate: a turn is still in progress');
    }
    this._phase = 'terminated';
  }

  /**
   * Forget the conversation: position back to zero, RNG back to its fixed
   * seed when deterministic.
   */
  reset(): void {
    this._absPos = 0;
    if (this.deterministic) this.rng.reseed(DETERMINISTIC_SEED);
  }

  private _expect(phase: TurnPhase, op: string): void {
    if (this._phase !== phase) {
      throw new SessionStateError(`${op}: expected phase '${phase}', got '${this._phase}'`);
    }
  }
}
