import { describe, expect, it } from 'vitest';
import { ConversationState } from '../src/ConversationState';
import { SessionStateError } from '../src/errors';
import { DETERMINISTIC_SEED, Rng } from '../src/Rng';

describe('ConversationState', () => {
  it('starts awaiting at position zero', () => {
    const state = new ConversationState({ multiturn: false, deterministic: false });
    expect(state.phase).toBe('awaiting');
    expect(state.absPos).toBe(0);
    expect(state.currentPos).toBe(0);
    expect(state.promptSize).toBe(0);
  });

  it('advances both counters and tracks prompt positions', () => {
    const state = new ConversationState({ multiturn: true, deterministic: false });
    state.beginTurn(4);
    state.advance();
    state.advance();
    state.advance();
    expect(state.absPos).toBe(3);
    expect(state.currentPos).toBe(3);
    expect(state.isReadingPrompt).toBe(true);
    state.advance();
    expect(state.isReadingPrompt).toBe(false);
    expect(state.isFirstGenerated).toBe(false);
    state.advance();
    expect(state.isFirstGenerated).toBe(true);
  });

  it('resets position on EOS when single-turn', () => {
    const state = new ConversationState({ multiturn: false, deterministic: false });
    state.beginTurn(2);
    state.advance();
    state.advance();
    state.endTurn();
    expect(state.absPos).toBe(0);
    expect(state.phase).toBe('awaiting');
  });

  it('keeps position on EOS when multiturn', () => {
    const state = new ConversationState({ multiturn: true, deterministic: false });
    state.beginTurn(2);
    state.advance();
    state.advance();
    state.endTurn();
    expect(state.absPos).toBe(2);

    state.beginTurn(1);
    expect(state.currentPos).toBe(0);
    state.advance();
    expect(state.absPos).toBe(3);
    expect(state.currentPos).toBe(1);
  });

  it('reseeds the RNG on reset when deterministic', () => {
    const expected = new Rng(DETERMINISTIC_SEED).next();
    const state = new ConversationState({ multiturn: false, deterministic: true });
    expect(state.rng.next()).toBe(expected);
    state.rng.next();

    state.beginTurn(1);
    state.advance();
    state.endTurn();
    expect(state.rng.next()).toBe(expected);
  });

  it('terminates when a turn ends at the budget', () => {
    const state = new ConversationState({ multiturn: true, deterministic: false });
    state.beginTurn(3);
    state.advance();
    state.advance();
    state.finishTurn(2);
    expect(state.phase).toBe('terminated');
  });

  it('returns to awaiting when a turn ends under the budget', () => {
    const state = new ConversationState({ multiturn: true, deterministic: false });
    state.beginTurn(3);
    state.advance();
    state.finishTurn(10);
    expect(state.phase).toBe('awaiting');
    expect(state.absPos).toBe(1);
  });

  it('rolls an aborted turn back to where it started', () => {
    const state = new ConversationState({ multiturn: true, deterministic: false });
    state.beginTurn(1);
    state.advance();
    state.endTurn();

    state.beginTurn(5);
    state.advance();
    state.advance();
    state.abortTurn();
    expect(state.absPos).toBe(1);
    expect(state.phase).toBe('awaiting');
    expect(state.turns).toBe(1);
  });

  it('restores the RNG an aborted turn started from', () => {
    const state = new ConversationState({ multiturn: true, deterministic: false });
    const reference = new Rng(state.rng.snapshot());
    state.beginTurn(2);
    state.rng.next();
    state.rng.next();
    state.abortTurn();
    expect(state.rng.next()).toBe(reference.next());
  });

  it('keeps position and RNG when a single-turn turn ends without EOS', () => {
    const state = new ConversationState({ multiturn: false, deterministic: true });
    const reference = new Rng(DETERMINISTIC_SEED);
    state.beginTurn(2);
    state.advance();
    state.advance();
    state.advance();
    state.rng.next();
    reference.next();
    state.finishTurn(100);
    expect(state.absPos).toBe(3);
    expect(state.phase).toBe('awaiting');
    expect(state.rng.next()).toBe(reference.next());
  });

  it('rejects transitions from the wrong phase', () => {
    const state = new ConversationState({ multiturn: false, deterministic: false });
    expect(() => state.advance()).toThrow(SessionStateError);
    expect(() => state.endTurn()).toThrow(SessionStateError);
    state.beginTurn(1);
    expect(() => state.beginTurn(1)).toThrow(SessionStateError);
    expect(() => state.terminate()).toThrow(SessionStateError);
  });

  it('terminates from awaiting', () => {
    const state = new ConversationState({ multiturn: false, deterministic: false });
    state.terminate();
    expect(state.phase).toBe('terminated');
    expect(() => state.beginTurn(1)).toThrow(SessionStateError);
  });
});

describe('Rng', () => {
  it('repeats its sequence after reseeding', () => {
    const rng = new Rng(7);
    const first = [rng.next(), rng.next(), rng.next()];
    rng.reseed(7);
    expect([rng.next(), rng.next(), rng.next()]).toEqual(first);
  });

  it('stays within bounds', () => {
    const rng = new Rng(DETERMINISTIC_SEED);
    for (let i = 0; i < 100; i++) {
      const value = rng.nextInt(6);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(6);
    }
  });
});
