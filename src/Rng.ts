/** Seed used whenever a deterministic session starts or resets */
export const DETERMINISTIC_SEED = 42;

/**
 * Seedable PRNG handed to the engine for sampling
 *
 * mulberry32: 32-bit state, period 2^32. Two instances reseeded with the same
 * value produce the same sequence, which is all determinism needs here.
 *
 * @category Session
 */
export class Rng {
  private _state: number;

  constructor(seed: number = Rng.entropySeed()) {
    this._state = seed >>> 0;
  }

  /** Restart the sequence from `seed` */
  reseed(seed: number): void {
    this._state = seed >>> 0;
  }

  /** Current state; reseed() with it to resume from here */
  snapshot(): number {
    return this._state;
  }

  /** Next float in [0, 1) */
  next(): number {
    this._state = (this._state + 0x6d2b79f5) >>> 0;
    let t = this._state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Next integer in [0, bound) */
  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }

  static entropySeed(): number {
    return Math.floor(Math.random() * 4294967296);
  }
}
