/**
 * RED Drop Decision Tests
 *
 * Region boundaries, count-corrected probability and drop spacing.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  assertMaxProbability,
  assertThresholdPair,
  baseDropProbability,
  correctedDropProbability,
  createDropState,
  decide,
} from '../../../src/aqm/drop-decision.js';
import { ConfigurationError, InvariantViolationError } from '../../../src/api/errors.js';
import { createRandomSource } from '../../../src/utils/random.js';
import type { ThresholdPair } from '../../../src/types/index.js';

const pair: ThresholdPair = { minThreshold: 200, maxThreshold: 400 };

describe('decide', () => {
  describe('below the min threshold', () => {
    it.each([0, 50, 199.999])('admits at average %d without drawing', (average) => {
      const random = vi.fn(() => 0);
      const state = { countSinceLastDrop: 3 };

      expect(decide(average, pair, 0.5, state, random)).toBe('admit');
      expect(random).not.toHaveBeenCalled();
      expect(state.countSinceLastDrop).toBe(3);
    });
  });

  describe('at or above the max threshold', () => {
    it.each([400, 401, 5000])('forces a drop at average %d and resets the count', (average) => {
      const random = vi.fn(() => 0.99);
      const state = { countSinceLastDrop: 7 };

      expect(decide(average, pair, 0.5, state, random)).toBe('forced_drop');
      expect(random).not.toHaveBeenCalled();
      expect(state.countSinceLastDrop).toBe(0);
    });

    it('treats a collapsed threshold pair as forced drop from the min threshold up', () => {
      const collapsed = { minThreshold: 300, maxThreshold: 300 };
      const state = createDropState();

      expect(decide(299, collapsed, 0.5, state, () => 0)).toBe('admit');
      expect(decide(300, collapsed, 0.5, state, () => 0.99)).toBe('forced_drop');
    });
  });

  describe('probabilistic region', () => {
    it('drops when the draw falls below p_a and resets the count', () => {
      const state = createDropState();

      // p_b = 0.5 * (300 - 200) / 200 = 0.25, count 0 -> p_a = 0.25
      expect(decide(300, pair, 0.5, state, () => 0.2)).toBe('probabilistic_drop');
      expect(state.countSinceLastDrop).toBe(0);
    });

    it('admits when the draw is at or above p_a and increments the count', () => {
      const state = createDropState();

      expect(decide(300, pair, 0.5, state, () => 0.25)).toBe('admit');
      // count 1 -> p_a = 0.25 / 0.75
      expect(decide(300, pair, 0.5, state, () => 0.5)).toBe('admit');
      expect(state.countSinceLastDrop).toBe(2);
    });

    it('raises the probability with the count since the last drop', () => {
      const state = { countSinceLastDrop: 2 };

      // p_a = 0.25 / (1 - 2 * 0.25) = 0.5
      expect(decide(300, pair, 0.5, state, () => 0.49)).toBe('probabilistic_drop');
    });

    it('drops with certainty once count * p_b reaches 1', () => {
      const state = { countSinceLastDrop: 4 };

      expect(decide(300, pair, 0.5, state, () => 0.999999)).toBe('probabilistic_drop');
      expect(state.countSinceLastDrop).toBe(0);
    });

    it('draws exactly once per decision', () => {
      const random = vi.fn(() => 0.9);

      decide(250, pair, 0.5, createDropState(), random);

      expect(random).toHaveBeenCalledTimes(1);
    });

    it('never admits above an average that was dropped for a fixed draw', () => {
      const verdicts: string[] = [];
      for (let average = 200; average < 400; average += 5) {
        verdicts.push(decide(average, pair, 0.5, createDropState(), () => 0.3));
      }

      const firstDrop = verdicts.indexOf('probabilistic_drop');
      expect(firstDrop).toBeGreaterThan(0);
      expect(verdicts.slice(firstDrop).every((verdict) => verdict === 'probabilistic_drop')).toBe(true);
      expect(verdicts.slice(0, firstDrop).every((verdict) => verdict === 'admit')).toBe(true);
    });

    it('spaces drops uniformly over at most 1/p_b arrivals', () => {
      const random = createRandomSource(7);
      const state = createDropState();
      // p_b = 0.5 * (240 - 200) / 200 = 0.1
      const gaps: number[] = [];
      let admits = 0;

      for (let i = 0; i < 200_000; i++) {
        if (decide(240, pair, 0.5, state, random) === 'admit') {
          admits += 1;
        } else {
          gaps.push(admits);
          admits = 0;
        }
      }

      const mean = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
      // Gaps are uniform over 0..9 admits: mean (1/p_b - 1) / 2
      expect(Math.abs(mean - 4.5)).toBeLessThan(0.15);
      expect(gaps.reduce((max, gap) => Math.max(max, gap), 0)).toBeLessThanOrEqual(9);
      // One drop per (1/p_b + 1) / 2 = 5.5 arrivals
      expect(gaps.length / 200_000).toBeGreaterThan(0.17);
      expect(gaps.length / 200_000).toBeLessThan(0.19);
    });
  });

  it('rejects a negative or NaN average', () => {
    expect(() => decide(-1, pair, 0.5, createDropState(), () => 0)).toThrow(InvariantViolationError);
    expect(() => decide(Number.NaN, pair, 0.5, createDropState(), () => 0)).toThrow(InvariantViolationError);
  });
});

describe('drop probability', () => {
  it('grows linearly between the thresholds', () => {
    expect(baseDropProbability(200, pair, 0.5)).toBe(0);
    expect(baseDropProbability(300, pair, 0.5)).toBe(0.25);
    expect(baseDropProbability(350, pair, 0.5)).toBe(0.375);
  });

  it('is non-decreasing in the average', () => {
    let previous = -1;
    for (let average = 200; average < 400; average += 1) {
      const probability = correctedDropProbability(baseDropProbability(average, pair, 0.1), 3);
      expect(probability).toBeGreaterThanOrEqual(previous);
      previous = probability;
    }
  });

  it('applies the count correction and clamps to 1', () => {
    expect(correctedDropProbability(0.25, 0)).toBe(0.25);
    expect(correctedDropProbability(0.25, 2)).toBe(0.5);
    expect(correctedDropProbability(0.25, 3)).toBe(1);
    expect(correctedDropProbability(0.25, 10)).toBe(1);
  });
});

describe('configuration checks', () => {
  it('accepts max probabilities in (0, 1]', () => {
    expect(() => assertMaxProbability(1)).not.toThrow();
    expect(() => assertMaxProbability(0.02)).not.toThrow();
  });

  it.each([0, -0.1, 1.5, Number.NaN])('rejects max probability %d', (maxProbability) => {
    expect(() => assertMaxProbability(maxProbability)).toThrow(ConfigurationError);
  });

  it('rejects inverted or negative threshold pairs', () => {
    expect(() => assertThresholdPair({ minThreshold: 5, maxThreshold: 4 })).toThrow(ConfigurationError);
    expect(() => assertThresholdPair({ minThreshold: -1, maxThreshold: 4 })).toThrow(ConfigurationError);
    expect(() => assertThresholdPair({ minThreshold: 4, maxThreshold: 4 })).not.toThrow();
  });
});
