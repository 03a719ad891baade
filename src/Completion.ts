import type { SessionConfig } from './config';
import { ConversationState } from './ConversationState';
import { DecodeError } from './errors';
import { PromptFormatter } from './PromptFormatter';
import { TokenStreamController } from './TokenStream';
import type { AcceptPredicate, InferenceEngine, TrimPolicy } from './types';

/**
 * Options for complete()
 *
 * @category Session
 */
export interface CompleteOptions {
  /** How the echoed prompt is cut off the output (default: 'characters') */
  trim?: TrimPolicy;
  accept?: AcceptPredicate;
  formatter?: PromptFormatter;
  /** Checked after every token; true ends generation early */
  shouldStop?: () => boolean;
}

/**
 * One-shot completion: single prompt in, single string out
 *
 * Same primitives as {@link Session} with the turn count fixed at one: a
 * fresh single-turn ConversationState per call (so `startPos` is always 0 and
 * BOS is always inserted), and a collect-mode {@link TokenStreamController}
 * that writes nothing while the engine runs.
 *
 * The controller buffers every non-EOS id, prompt positions included. With
 * the default 'characters' policy the whole buffer is detokenized and as
 * many characters as the formatted prompt has are dropped from the front.
 * That is only exact when the tokenizer round-trips the formatted prompt
 * character for character; 'tokens' detokenizes just the ids after the
 * prompt positions instead. Either way, the leading whitespace stripped from
 * the first generated token is dropped too.
 *
 * With `deterministic` set, two calls with the same prompt return the same
 * string.
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ deterministic: true });
 * const text = await complete(engine, 'Write a haiku about rivers', config);
 * ```
 *
 * @category Session
 */
export async function complete(
  engine: InferenceEngine,
  prompt: string,
  config: SessionConfig,
  options: CompleteOptions = {}
): Promise<string> {
  const { trim = 'characters', accept = () => true } = options;
  const formatter = options.formatter ?? new PromptFormatter();
  const state = new ConversationState({ multiturn: false, deterministic: config.deterministic });

  const formatted = formatter.format(prompt, state, engine.isInstructionTuned());
  const tokens = await formatter.tokenize(engine, formatted, state);

  state.beginTurn(tokens.length);
  const controller = new TokenStreamController({
    engine,
    state,
    mode: 'collect',
    budget: config.maxTokens,
    verbosity: config.verbosity,
    shouldStop: options.shouldStop,
  });

  await controller.consume(
    engine.generate(
      {
        promptTokens: tokens,
        startPos: 0,
        maxTokens: config.maxTokens,
        maxGeneratedTokens: config.maxGeneratedTokens,
        temperature: config.temperature,
        accept,
        verbosity: config.verbosity,
      },
      state.rng
    )
  );
  state.finishTurn(config.maxTokens);

  const collected = controller.collected;
  const text =
    trim === 'tokens'
      ? await detokenize(engine, collected.slice(tokens.length))
      : (await detokenize(engine, collected)).slice(formatted.length);
  return text.slice(controller.leadingTrim);
}

async function detokenize(engine: InferenceEngine, tokens: number[]): Promise<string> {
  try {
    return await engine.detokenize(tokens);
  } catch (err) {
    if (err instanceof DecodeError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new DecodeError(`Failed to detokenize completion: ${message}`, tokens, { cause: err });
  }
}
