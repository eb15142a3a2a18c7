import { describe, it, expect } from 'vitest';
import { createRng, uniformChoice, weightedChoice } from './random.js';

const fixed = (value: number) => () => value;

describe('createRng', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createRng('test-seed');
    const b = createRng('test-seed');
    const seqA = Array.from({ length: 16 }, () => a());
    const seqB = Array.from({ length: 16 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it('returns values in [0, 1)', () => {
    const rng = createRng('range');
    for (let i = 0; i < 500; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    const a = createRng('seed-alpha');
    const b = createRng('seed-beta');
    const seqA = Array.from({ length: 8 }, () => a());
    const seqB = Array.from({ length: 8 }, () => b());
    expect(seqA).not.toEqual(seqB);
  });
});

describe('weightedChoice', () => {
  const items = ['a', 'b', 'c'];
  const weights = [1, 2, 1];

  it('walks cumulative weights', () => {
    expect(weightedChoice(items, weights, fixed(0))).toBe('a');
    expect(weightedChoice(items, weights, fixed(0.25))).toBe('b');
    expect(weightedChoice(items, weights, fixed(0.74))).toBe('b');
    expect(weightedChoice(items, weights, fixed(0.75))).toBe('c');
    expect(weightedChoice(items, weights, fixed(0.999))).toBe('c');
  });

  it('rejects empty or mismatched input', () => {
    expect(() => weightedChoice([], [], fixed(0))).toThrow(RangeError);
    expect(() => weightedChoice(items, [1, 2], fixed(0))).toThrow(RangeError);
  });
});

describe('uniformChoice', () => {
  it('indexes by rng() * length', () => {
    expect(uniformChoice(['a', 'b', 'c', 'd'], fixed(0.5))).toBe('c');
    expect(uniformChoice(['a', 'b', 'c', 'd'], fixed(0))).toBe('a');
  });
});
