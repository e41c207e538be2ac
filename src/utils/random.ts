/**
 * Random Sources
 *
 * The probabilistic drop draws from an injected source so simulation runs
 * can be replayed exactly.
 */

import type { RandomSource } from '../types/index.js';

/**
 * Non-deterministic source backed by Math.random.
 */
export const defaultRandomSource: RandomSource = () => Math.random();

/**
 * Seeded mulberry32 generator yielding values in [0, 1).
 *
 * @example
 * ```typescript
 * const random = createRandomSource(42);
 * random(); // same sequence on every run
 * ```
 */
export function createRandomSource(seed: number): RandomSource {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Source that replays a fixed sequence, cycling when exhausted.
 */
export function sequenceRandomSource(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('Sequence random source needs at least one value');
  }

  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value ?? 0;
  };
}
