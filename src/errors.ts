/**
 * Error taxonomy
 *
 * Encode and decode failures abort the current turn only; the session rolls
 * its state back and keeps reading input. Configuration and engine-loading
 * failures are fatal at startup. Quit, input exhaustion and budget exhaustion
 * are not errors at all.
 *
 * @category Core
 */
export class TurnloopError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TurnloopError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the engine cannot tokenize a formatted prompt.
 *
 * @category Core
 */
export class EncodeError extends TurnloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

/**
 * Thrown when the engine cannot turn token ids back into text.
 *
 * @category Core
 */
export class DecodeError extends TurnloopError {
  public readonly tokens: number[];

  constructor(message: string, tokens: number[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
    this.tokens = tokens;
  }
}

/**
 * Invalid or missing configuration. Carries the usage text so callers can
 * print it before exiting.
 *
 * @category Core
 */
export class ConfigValidationError extends TurnloopError {
  public readonly issues: string[];
  public readonly usage: string;

  constructor(issues: string[], usage: string) {
    super(`Invalid args: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
    this.usage = usage;
  }
}

/**
 * No engine module could be resolved.
 *
 * @category Core
 */
export class EngineLoadError extends TurnloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineLoadError';
  }
}

/**
 * A ConversationState transition was requested from the wrong phase.
 *
 * @category Session
 */
export class SessionStateError extends TurnloopError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}
