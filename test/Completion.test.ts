import { describe, expect, it } from 'vitest';
import { complete } from '../src/Completion';
import { resolveConfig } from '../src/config';
import { EncodeError } from '../src/errors';
import { BOS, ScriptedEngine, charTokens } from './helpers/ScriptedEngine';

const config = resolveConfig({ verbosity: 0, maxTokens: 1000, maxGeneratedTokens: 100 });

describe('complete', () => {
  it('returns only the generated text', async () => {
    const engine = new ScriptedEngine({ replies: ['World'], instructionTuned: true });
    expect(await complete(engine, 'Hi', config)).toBe('World');
  });

  it('always starts at position zero with BOS', async () => {
    const engine = new ScriptedEngine({ replies: ['World'] });
    await complete(engine, 'Hi', config);
    await complete(engine, 'Hi', config);
    for (const request of engine.requests) {
      expect(request.startPos).toBe(0);
      expect(request.promptTokens).toEqual([BOS, ...charTokens('Hi')]);
    }
  });

  it('strips leading whitespace from the first generated token only', async () => {
    const engine = new ScriptedEngine({ replies: [' \tWorld'], instructionTuned: true });
    expect(await complete(engine, 'Hi', config)).toBe('\tWorld');
    expect(await complete(engine, 'Hi', config, { trim: 'tokens' })).toBe('\tWorld');
  });

  it('returns byte-identical output for repeated deterministic calls', async () => {
    const deterministic = resolveConfig({ verbosity: 0, deterministic: true });
    const engine = new ScriptedEngine({ vocabulary: 'klmnop', sampleLength: 10 });
    const first = await complete(engine, 'Tell me something', deterministic);
    const second = await complete(engine, 'Tell me something', deterministic);
    expect(first).toHaveLength(10);
    expect(second).toBe(first);
  });

  it('stops at the token budget', async () => {
    const tight = resolveConfig({ verbosity: 0, maxTokens: 6, maxGeneratedTokens: 5 });
    const engine = new ScriptedEngine({ replies: ['World'] });
    expect(await complete(engine, 'Hi', tight)).toBe('Wor');
  });

  it('cuts by character count unless asked to cut by tokens', async () => {
    // '\r' vanishes in tokenization, so the prompt is one character longer than its tokens
    const engine = new ScriptedEngine({ replies: ['World'], dropChars: '\r' });
    expect(await complete(engine, 'a\r\nb', config)).toBe('orld');
    expect(await complete(engine, 'a\r\nb', config, { trim: 'tokens' })).toBe('World');
  });

  it('passes the acceptance predicate to the engine', async () => {
    const engine = new ScriptedEngine({ replies: ['Wor!d'] });
    const stopAtBang = (token: number) => token !== charTokens('!')[0];
    expect(await complete(engine, 'Hi', config, { accept: stopAtBang })).toBe('Wor');
  });

  it('stops generating once the caller asks', async () => {
    const engine = new ScriptedEngine({ replies: ['World'] });
    let calls = 0;
    expect(await complete(engine, 'Hi', config, { shouldStop: () => calls++ >= 4 })).toBe('Wo');
  });

  it('surfaces tokenizer failures', async () => {
    const engine = new ScriptedEngine({ failEncodeOn: 'bad' });
    await expect(complete(engine, 'bad prompt', config)).rejects.toBeInstanceOf(EncodeError);
  });
});
