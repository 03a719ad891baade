/**
 * turnloop - Session controller for turn-by-turn text generation
 *
 * Frames a conversation around a pluggable inference engine: position
 * tracking, turn markup, BOS handling, token echo and filtering, and the
 * reset/reseed policy that makes independent turns reproducible.
 *
 * @example
 * ```typescript
 * import { createEngine, resolveConfig, Session, complete } from 'turnloop';
 *
 * const engine = await createEngine({ numThreads: 4 }, { engine: 'my-engine' });
 *
 * // One-shot
 * const text = await complete(engine, 'Hello', resolveConfig({ deterministic: true }));
 *
 * // Interactive
 * const session = new Session({ engine, config: resolveConfig({ multiturn: true }) });
 * await session.run(readline.createInterface({ input: process.stdin }));
 *
 * // Cleanup
 * engine.dispose?.();
 * ```
 */

export { createEngine, loadEngine } from './loader';
export { chat, completion, showHelp } from './entry';
export { Session, isQuitSentinel, QUIT_SENTINELS } from './Session';
export { complete } from './Completion';
export { ConversationState } from './ConversationState';
export { PromptFormatter, DEFAULT_TURN_MARKERS } from './PromptFormatter';
export { TokenStreamController } from './TokenStream';
export { Rng, DETERMINISTIC_SEED } from './Rng';
export {
  SessionConfigSchema,
  describeConfig,
  formatUsage,
  parseArgs,
  planThreads,
  resolveConfig,
  PIN_THREADS_ABOVE,
} from './config';
export {
  TurnloopError,
  EncodeError,
  DecodeError,
  ConfigValidationError,
  EngineLoadError,
  SessionStateError,
} from './errors';
export type { SessionConfig, ParsedArgs } from './config';
export type { SessionOptions } from './Session';
export type { CompleteOptions } from './Completion';
export type { TokenStreamOptions } from './TokenStream';
export type { ChatIO } from './entry';
export type {
  AcceptPredicate,
  EngineBinding,
  EngineOptions,
  GenerationRequest,
  InferenceEngine,
  LoadOptions,
  SessionEndReason,
  SessionResult,
  StreamEvent,
  StreamMode,
  TextSink,
  ThreadPlan,
  TrimPolicy,
  TurnMarkers,
  TurnPhase,
  TurnStats,
} from './types';
