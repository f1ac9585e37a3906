import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '../errors';
import { MAX_SEED, SeededRandom, randomSeed } from './rng';

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    expect(Array.from(new SeededRandom(7).uniform(5))).toEqual(Array.from(new SeededRandom(7).uniform(5)));
    expect(Array.from(new SeededRandom(7).normal(5))).toEqual(Array.from(new SeededRandom(7).normal(5)));
  });

  it('differs between seeds', () => {
    expect(Array.from(new SeededRandom(1).uniform(5))).not.toEqual(
      Array.from(new SeededRandom(2).uniform(5)),
    );
  });

  it('draws uniform values in [0, 1)', () => {
    const draws = new SeededRandom(123).uniform(10000);
    let total = 0;
    for (const value of draws) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
      total += value;
    }
    expect(total / draws.length).toBeCloseTo(0.5, 1);
  });

  it('draws standard normal values', () => {
    const draws = new SeededRandom(99).normal(10000);
    let total = 0;
    let squares = 0;
    for (const value of draws) {
      total += value;
      squares += value * value;
    }
    const mean = total / draws.length;
    expect(mean).toBeCloseTo(0, 1);
    expect(squares / draws.length - mean * mean).toBeCloseTo(1, 1);
  });

  it('accepts the full seed range', () => {
    expect(new SeededRandom(0).uniform(3)).toHaveLength(3);
    expect(new SeededRandom(MAX_SEED).uniform(3)).toHaveLength(3);
    const seed = randomSeed();
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(MAX_SEED);
  });

  it('rejects seeds outside the integer range', () => {
    expect(() => new SeededRandom(-1)).toThrow(InvalidParameterError);
    expect(() => new SeededRandom(1.5)).toThrow(InvalidParameterError);
    expect(() => new SeededRandom(MAX_SEED + 1)).toThrow(
      "Invalid parameter 'seed': seed must be an integer in [0, 4294967295], got 4294967296",
    );
  });
});
