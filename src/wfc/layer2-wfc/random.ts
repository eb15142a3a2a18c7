import Alea from 'alea';

/** Uniform source in [0, 1) */
export type Rng = () => number;

export function createRng(seed: string): Rng {
  const prng = Alea(seed);
  return () => prng();
}

export function uniformChoice<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) throw new RangeError('Cannot choose from an empty list');
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}

/**
 * Pick one item with probability proportional to its weight.
 * Walks the cumulative weights until they pass rng() * total.
 */
export function weightedChoice<T>(items: readonly T[], weights: readonly number[], rng: Rng): T {
  if (items.length === 0) throw new RangeError('Cannot choose from an empty list');
  if (items.length !== weights.length) {
    throw new RangeError(`Got ${weights.length} weights for ${items.length} items`);
  }
  const total = weights.reduce((s, w) => s + w, 0);
  const target = rng() * total;
  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) return items[i];
  }
  return items[items.length - 1];
}
