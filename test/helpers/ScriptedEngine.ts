import type { GenerationRequest, InferenceEngine, StreamEvent } from '../../src/types';
import type { Rng } from '../../src/Rng';

export const EOS = 1;
export const BOS = 2;
/** Character tokens start after the control ids */
const OFFSET = 3;

export interface ScriptedEngineOptions {
  /** Replies used in order, cycling */
  replies?: string[];
  /** When set, replies are sampled from these characters with the session RNG */
  vocabulary?: string;
  sampleLength?: number;
  instructionTuned?: boolean;
  /** tokenize() rejects text containing this */
  failEncodeOn?: string;
  /** detokenize() rejects this character */
  failDecodeOn?: string;
  /** Characters tokenize() silently drops */
  dropChars?: string;
  /** Whether replies end with EOS (default: true) */
  emitEos?: boolean;
}

/** Characters to token ids, one id per UTF-16 unit */
export const charTokens = (text: string): number[] =>
  text.split('').map((c) => c.charCodeAt(0) + OFFSET);

/**
 * In-process engine: character tokenizer, scripted or RNG-sampled replies
 *
 * Follows the streaming contract: echoes every prompt token, then the reply,
 * then EOS, never past maxTokens / maxGeneratedTokens.
 */
export class ScriptedEngine implements InferenceEngine {
  readonly requests: GenerationRequest[] = [];
  readonly generated: number[][] = [];
  disposed = false;
  /** Set once a generate() iterator has been closed */
  closed = 0;

  private _options: ScriptedEngineOptions;
  private _calls = 0;

  constructor(options: ScriptedEngineOptions = {}) {
    this._options = options;
  }

  async tokenize(text: string): Promise<number[]> {
    const { failEncodeOn, dropChars = '' } = this._options;
    if (failEncodeOn && text.includes(failEncodeOn)) {
      throw new Error('unsupported input');
    }
    return charTokens(text.split('').filter((c) => !dropChars.includes(c)).join(''));
  }

  async detokenize(tokens: number[]): Promise<string> {
    let text = '';
    for (const token of tokens) {
      if (token < OFFSET) continue;
      const char = String.fromCharCode(token - OFFSET);
      if (char === this._options.failDecodeOn) throw new Error(`unknown token id ${token}`);
      text += char;
    }
    return text;
  }

  async *generate(request: GenerationRequest, rng: Rng): AsyncIterable<StreamEvent> {
    this.requests.push({ ...request, promptTokens: [...request.promptTokens] });
    const reply = this._nextReply(rng);
    const emitted: number[] = [];
    this.generated.push(emitted);

    let pos = request.startPos;
    try {
      for (const token of request.promptTokens) {
        if (pos >= request.maxTokens) return;
        yield { token, score: 0 };
        pos++;
      }
      let count = 0;
      for (const token of reply) {
        if (pos >= request.maxTokens || count >= request.maxGeneratedTokens) return;
        if (!request.accept(token)) break;
        emitted.push(token);
        yield { token, score: 1 };
        pos++;
        count++;
      }
      if (this._options.emitEos !== false && pos < request.maxTokens) {
        yield { token: EOS, score: 1 };
      }
    } finally {
      this.closed++;
    }
  }

  isInstructionTuned(): boolean {
    return this._options.instructionTuned ?? false;
  }

  getEosToken(): number {
    return EOS;
  }

  getBosToken(): number {
    return BOS;
  }

  dispose(): void {
    this.disposed = true;
  }

  private _nextReply(rng: Rng): number[] {
    const { vocabulary, sampleLength = 8, replies = ['ok'] } = this._options;
    const call = this._calls++;
    if (vocabulary) {
      let text = '';
      for (let i = 0; i < sampleLength; i++) text += vocabulary[rng.nextInt(vocabulary.length)];
      return charTokens(text);
    }
    return charTokens(replies[call % replies.length]);
  }
}

/** Async line source, like a readline.Interface */
export async function* lines(values: string[]): AsyncIterable<string> {
  for (const value of values) yield value;
}

/** TextSink that keeps everything written */
export class Capture {
  private _chunks: string[] = [];

  write(text: string): boolean {
    this._chunks.push(text);
    return true;
  }

  get text(): string {
    return this._chunks.join('');
  }
}
