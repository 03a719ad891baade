/**
 * turnloop TypeScript Definitions
 *
 * Session controller for turn-by-turn text generation over a pluggable
 * inference engine.
 *
 * @categoryDescription Core
 * Entry points, engine loading, configuration and the engine contract.
 *
 * @categoryDescription Session
 * Conversation state, prompt formatting, token streaming and the two drivers
 * (interactive session and one-shot completion).
 */

import type { Rng } from './Rng';

/**
 * Phase of a ConversationState
 *
 * - 'awaiting': between turns, ready for the next prompt
 * - 'inProgress': a generation call is being consumed
 * - 'terminated': quit, input exhausted or token budget spent
 *
 * @category Session
 */
export type TurnPhase = 'awaiting' | 'inProgress' | 'terminated';

/**
 * How the TokenStreamController renders tokens
 *
 * - 'interactive': progress dots for prompt positions, text written to the
 *   output stream as each token arrives
 * - 'collect': nothing written; token ids buffered for one batched
 *   detokenize after generation returns
 *
 * @category Session
 */
export type StreamMode = 'interactive' | 'collect';

/**
 * One token emitted by the engine
 *
 * Ephemeral: the controller classifies it and lets it go.
 *
 * @category Session
 */
export interface StreamEvent {
  /** Token id */
  token: number;
  /** Engine-reported score (probability or logit) of the token */
  score: number;
}

/**
 * Predicate the engine consults before accepting a sampled token
 *
 * @category Core
 */
export type AcceptPredicate = (token: number) => boolean;

/**
 * Arguments for one generation call, built fresh per turn
 *
 * @category Core
 */
export interface GenerationRequest {
  /** Formatted prompt tokens, BOS included on the first turn of a session */
  promptTokens: number[];
  /** Absolute position the engine writes the first prompt token at */
  startPos: number;
  /** Session token budget; the engine must not run past this position */
  maxTokens: number;
  /** Per-call cap on generated (non-prompt) tokens */
  maxGeneratedTokens: number;
  /** Sampling temperature */
  temperature: number;
  /** Token-acceptance predicate; the default accepts everything */
  accept: AcceptPredicate;
  /** Caller verbosity, for engine-side diagnostics */
  verbosity: number;
}

/**
 * Text sink for session output
 *
 * `process.stdout`, `process.stderr` and any Writable satisfy it.
 *
 * @category Session
 */
export interface TextSink {
  write(text: string): unknown;
}

/**
 * Inference engine contract
 *
 * Everything numeric lives behind this interface: tokenizer, weights, KV
 * cache, sampling. turnloop only frames the conversation around it.
 *
 * **Streaming contract:** `generate()` returns a finite, non-restartable
 * async iterable. It first yields one event per prompt token (the last of
 * these is the token generation starts from), then one per generated token,
 * and ends after the EOS token or when it reaches `maxTokens` /
 * `maxGeneratedTokens`. Events are consumed from a single logical thread: the
 * consumer awaits each one before pulling the next. Breaking out of the
 * iteration (`return()`) must stop generation.
 *
 * @category Core
 */
export interface InferenceEngine {
  /**
   * Tokenize text without adding BOS
   *
   * Rejects on malformed input; callers surface that as EncodeError.
   */
  tokenize(text: string): Promise<number[]>;

  /**
   * Turn token ids back into text
   *
   * Rejects on unknown ids; callers surface that as DecodeError.
   */
  detokenize(tokens: number[]): Promise<string>;

  /**
   * Run one generation call
   *
   * @param request - Per-turn arguments
   * @param rng - Session-owned PRNG to sample from
   */
  generate(request: GenerationRequest, rng: Rng): AsyncIterable<StreamEvent>;

  /** Whether the model expects turn markers around user input */
  isInstructionTuned(): boolean;

  /** End-of-sequence token id */
  getEosToken(): number;

  /** Beginning-of-sequence token id */
  getBosToken(): number;

  /** Release engine resources */
  dispose?(): void;
}

/**
 * Thread pool plan handed to the engine
 *
 * Pinning is a performance hint only; engines on platforms without core
 * affinity ignore it.
 *
 * @category Core
 */
export interface ThreadPlan {
  /** Worker pool size */
  nThreads: number;
  /** Whether to pin the calling thread and each worker to its own core */
  pin: boolean;
  /** Core for the calling thread when pinning (last logical core of the pool) */
  mainThreadCore: number;
}

/**
 * Options for engine creation
 *
 * Paths are passed through untouched; their meaning belongs to the engine.
 *
 * @category Core
 */
export interface EngineOptions {
  /** Model identifier or type */
  model?: string;
  /** Tokenizer file */
  tokenizer?: string;
  /** Weights file */
  weights?: string;
  /** Thread pool plan */
  threads: ThreadPlan;
}

/**
 * Options for engine module resolution
 *
 * @category Core
 */
export interface LoadOptions {
  /**
   * Engine module specifier (package name or path)
   *
   * Falls back to the `TURNLOOP_ENGINE` environment variable.
   */
  engine?: string;
}

/**
 * What an engine module must export (and what loadEngine() returns)
 *
 * @category Core
 */
export interface EngineBinding {
  createEngine(options: EngineOptions): Promise<InferenceEngine>;
}

/**
 * Control markup wrapped around a user prompt for instruction-tuned models
 *
 * @category Session
 */
export interface TurnMarkers {
  /** Opens the user turn */
  userStart: string;
  /** Closes any turn */
  turnEnd: string;
  /** Opens the model turn the engine completes */
  modelStart: string;
}

/**
 * Statistics for one completed turn
 *
 * @category Session
 */
export interface TurnStats {
  /** 1-based turn index */
  turn: number;
  /** Prompt size in tokens, BOS included */
  promptTokens: number;
  /** Tokens consumed this turn (prompt + generated) */
  tokens: number;
  /** Absolute position after the turn */
  totalTokens: number;
  /** Whether the engine signalled EOS */
  endOfSequence: boolean;
  /** Wall-clock duration of the generation call */
  elapsedMs: number;
  /** tokens / elapsed seconds */
  tokensPerSecond: number;
}

/**
 * Why a session loop stopped
 *
 * @category Session
 */
export type SessionEndReason = 'quit' | 'exhausted' | 'budget';

/**
 * Result from Session.run()
 *
 * @category Session
 */
export interface SessionResult {
  reason: SessionEndReason;
  /** Turns completed */
  turns: number;
  /** Absolute position when the loop stopped */
  totalTokens: number;
}

/**
 * How complete() separates the completion from the echoed prompt
 *
 * - 'characters': detokenize everything, drop as many characters as the
 *   formatted prompt has. Exact only when tokenization preserves length.
 * - 'tokens': detokenize only the tokens after the prompt positions.
 *
 * @category Session
 */
export type TrimPolicy = 'characters' | 'tokens';
