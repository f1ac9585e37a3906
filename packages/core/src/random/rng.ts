/**
 * Seeded PRNG (xorshift128+) for reproducible random samples.
 */

import { InvalidParameterError } from '../errors';

export const MAX_SEED = 0xffffffff;

/** A fresh seed when none is given */
export function randomSeed(): number {
  return Math.floor(Math.random() * (MAX_SEED + 1));
}

export function validateSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new InvalidParameterError('seed', `seed must be an integer in [0, ${MAX_SEED}], got ${seed}`, {
      seed,
    });
  }
}

export class SeededRandom {
  private s0: number;
  private s1: number;
  private spare: number | undefined;

  constructor(readonly seed: number) {
    validateSeed(seed);
    this.s0 = seed;
    this.s1 = seed ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.nextUniform();
  }

  /** A number in [0, 1) */
  nextUniform(): number {
    let s1 = this.s0;
    const s0 = this.s1;
    this.s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this.s1 = s1;
    return ((this.s0 + this.s1) >>> 0) / 0x100000000;
  }

  /** Standard normal draw (polar Box-Muller) */
  nextNormal(): number {
    if (this.spare !== undefined) {
      const spare = this.spare;
      this.spare = undefined;
      return spare;
    }
    let u: number;
    let v: number;
    let s: number;
    do {
      u = this.nextUniform() * 2 - 1;
      v = this.nextUniform() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const mul = Math.sqrt((-2 * Math.log(s)) / s);
    this.spare = v * mul;
    return u * mul;
  }

  /** `count` uniform draws */
  uniform(count: number): Float64Array {
    return Float64Array.from({ length: count }, () => this.nextUniform());
  }

  /** `count` standard normal draws */
  normal(count: number): Float64Array {
    return Float64Array.from({ length: count }, () => this.nextNormal());
  }
}
