import type { ConversationState } from './ConversationState';
import { EncodeError } from './errors';
import type { InferenceEngine, TurnMarkers } from './types';

/**
 * Default turn markup for instruction-tuned models
 *
 * @category Session
 */
export const DEFAULT_TURN_MARKERS: TurnMarkers = {
  userStart: '<start_of_turn>user\n',
  turnEnd: '<end_of_turn>\n',
  modelStart: '<start_of_turn>model\n',
};

/**
 * PromptFormatter - text and token framing for one turn
 *
 * Centralizes: markers + tokenize + BOS-once-per-session. Pure: the same
 * prompt, state and model flag always produce the same output.
 *
 * @example
 * ```typescript
 * const formatter = new PromptFormatter();
 * const text = formatter.format('Hi', state, engine.isInstructionTuned());
 * const tokens = await formatter.tokenize(engine, text, state);
 * ```
 *
 * @category Session
 */
export class PromptFormatter {
  private _markers: TurnMarkers;

  constructor(markers: TurnMarkers = DEFAULT_TURN_MARKERS) {
    this._markers = markers;
  }

  get markers(): TurnMarkers {
    return this._markers;
  }

  /**
   * Wrap a raw prompt in turn markers
   *
   * Continuation turns (`absPos > 0`) get a leading end-of-turn marker so the
   * model sees where its previous answer stopped. Pre-trained models get the
   * raw text.
   */
  format(rawText: string, state: ConversationState, instructionTuned: boolean): string {
    if (!instructionTuned) return rawText;
    const { userStart, turnEnd, modelStart } = this._markers;
    const text = userStart + rawText + turnEnd + modelStart;
    return state.absPos > 0 ? turnEnd + text : text;
  }

  /**
   * Tokenize formatted text, prepending BOS on the first turn of a session
   *
   * @throws EncodeError if the engine rejects the text
   */
  async tokenize(engine: InferenceEngine, formatted: string, state: ConversationState): Promise<number[]> {
    let tokens: number[];
    try {
      tokens = await engine.tokenize(formatted);
    } catch (err) {
      if (err instanceof EncodeError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new EncodeError(`Failed to tokenize prompt: ${message}`, { cause: err });
    }
    return state.absPos === 0 ? [engine.getBosToken(), ...tokens] : tokens;
  }
}
