/**
 * RED Drop Decision
 *
 * Three regions of the average queue size relative to a threshold pair:
 *
 *   average <  min            -> admit
 *   min <= average < max      -> drop with probability p_a
 *   average >= max            -> forced drop
 *
 * In the middle region the base probability grows linearly,
 *
 *   p_b = maxP * (average - min) / (max - min)
 *
 * and is corrected by the number of packets admitted since the last drop,
 *
 *   p_a = p_b / (1 - count * p_b)
 *
 * which spaces drops roughly uniformly instead of geometrically. Once
 * count * p_b reaches 1 the next packet is dropped with certainty.
 */

import { ConfigurationError, InvariantViolationError, assertNonNegative } from '../api/errors.js';
import type { DropState, RandomSource, ThresholdPair, Verdict } from '../types/index.js';
import { clamp } from '../utils/math-helpers.js';

/**
 * Fresh drop-spacing state.
 */
export function createDropState(): DropState {
  return { countSinceLastDrop: 0 };
}

/**
 * Reject a max probability outside (0, 1].
 */
export function assertMaxProbability(maxProbability: number): void {
  if (!(maxProbability > 0 && maxProbability <= 1)) {
    throw new ConfigurationError(`Max probability must lie in (0, 1], got ${maxProbability}`, { maxProbability });
  }
}

/**
 * Reject a threshold pair that is negative or inverted.
 */
export function assertThresholdPair(pair: ThresholdPair): void {
  if (!(pair.minThreshold >= 0 && pair.minThreshold <= pair.maxThreshold && Number.isFinite(pair.maxThreshold))) {
    throw new ConfigurationError(
      `Invalid threshold pair: expected 0 <= min (${pair.minThreshold}) <= max (${pair.maxThreshold})`,
      { ...pair }
    );
  }
}

/**
 * Linear base probability p_b for an average inside [min, max).
 */
export function baseDropProbability(average: number, pair: ThresholdPair, maxProbability: number): number {
  return (maxProbability * (average - pair.minThreshold)) / (pair.maxThreshold - pair.minThreshold);
}

/**
 * Count-corrected probability p_a, clamped to [0, 1].
 */
export function correctedDropProbability(baseProbability: number, countSinceLastDrop: number): number {
  const denominator = 1 - countSinceLastDrop * baseProbability;
  if (denominator <= 0) {
    return 1;
  }
  return clamp(baseProbability / denominator, 0, 1);
}

/**
 * Decide the fate of one packet and update the drop-spacing state in place.
 *
 * @param average - Smoothed queue size, same unit as the thresholds
 * @param pair - Thresholds of the packet's class
 * @param maxProbability - Drop probability reached at the max threshold
 * @param state - Shared drop-spacing state, mutated
 * @param random - Uniform source in [0, 1); drawn only in the probabilistic region
 */
export function decide(
  average: number,
  pair: ThresholdPair,
  maxProbability: number,
  state: DropState,
  random: RandomSource
): Verdict {
  assertNonNegative('average queue size', average);

  if (average < pair.minThreshold) {
    return 'admit';
  }

  // With min == max the probabilistic region is empty and this branch takes over.
  if (average >= pair.maxThreshold) {
    state.countSinceLastDrop = 0;
    return 'forced_drop';
  }

  const probability = correctedDropProbability(
    baseDropProbability(average, pair, maxProbability),
    state.countSinceLastDrop
  );
  if (Number.isNaN(probability) || probability < 0 || probability > 1) {
    throw new InvariantViolationError('drop probability', probability, 'within [0, 1]');
  }

  if (random() < probability) {
    state.countSinceLastDrop = 0;
    return 'probabilistic_drop';
  }

  state.countSinceLastDrop += 1;
  return 'admit';
}
