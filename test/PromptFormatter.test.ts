import { describe, expect, it } from 'vitest';
import { ConversationState } from '../src/ConversationState';
import { EncodeError } from '../src/errors';
import { DEFAULT_TURN_MARKERS, PromptFormatter } from '../src/PromptFormatter';
import { BOS, ScriptedEngine, charTokens } from './helpers/ScriptedEngine';

const freshState = () => new ConversationState({ multiturn: true, deterministic: false });

/** State that has already consumed one token */
const continuedState = () => {
  const state = freshState();
  state.beginTurn(1);
  state.advance();
  state.endTurn();
  return state;
};

describe('PromptFormatter.format', () => {
  const formatter = new PromptFormatter();

  it('wraps the first turn in user/model markers', () => {
    expect(formatter.format('hi', freshState(), true)).toBe(
      '<start_of_turn>user\nhi<end_of_turn>\n<start_of_turn>model\n'
    );
  });

  it('prefixes continuation turns with an end-of-turn marker', () => {
    expect(formatter.format('hi', continuedState(), true)).toBe(
      '<end_of_turn>\n<start_of_turn>user\nhi<end_of_turn>\n<start_of_turn>model\n'
    );
  });

  it('leaves pre-trained prompts untouched', () => {
    expect(formatter.format('hi', continuedState(), false)).toBe('hi');
  });

  it('uses custom markers', () => {
    const custom = new PromptFormatter({ userStart: '[U]', turnEnd: '[/]', modelStart: '[M]' });
    expect(custom.format('hi', continuedState(), true)).toBe('[/][U]hi[/][M]');
    expect(custom.markers).not.toBe(DEFAULT_TURN_MARKERS);
  });
});

describe('PromptFormatter.tokenize', () => {
  const formatter = new PromptFormatter();
  const engine = new ScriptedEngine({ failEncodeOn: 'bad' });

  it('prepends BOS at session start', async () => {
    expect(await formatter.tokenize(engine, 'hi', freshState())).toEqual([BOS, 107, 108]);
  });

  it('does not prepend BOS once the session has advanced', async () => {
    expect(await formatter.tokenize(engine, 'hi', continuedState())).toEqual(charTokens('hi'));
  });

  it('surfaces tokenizer failures as EncodeError', async () => {
    const failure = formatter.tokenize(engine, 'bad text', freshState());
    await expect(failure).rejects.toBeInstanceOf(EncodeError);
    await expect(failure).rejects.toThrow('Failed to tokenize prompt: unsupported input');
  });
});
