/**
 * CongestionController Tests
 *
 * One average update per arrival, shared drop state and counters.
 */

import { describe, it, expect, vi } from 'vitest';
import { CongestionController } from '../../../src/aqm/congestion-controller.js';
import { ConfigurationError } from '../../../src/api/errors.js';

const createController = (random: () => number = () => 0.99): CongestionController =>
  new CongestionController({
    maxProbability: 1,
    weightFactor: 1,
    smallPacketTime: 1,
    thresholds: { minThreshold: 2, maxThreshold: 6 },
    random,
  });

describe('CongestionController', () => {
  it('walks through the three regions as the average rises', () => {
    const controller = createController();

    // average 2: at the min threshold, p_b = 0
    expect(controller.decide(4, 0)).toBe('admit');
    expect(controller.countSinceLastDrop).toBe(1);

    // average 5: p_b = 0.75, count 1 -> p_a clamps to 1
    expect(controller.decide(8, 1)).toBe('probabilistic_drop');
    expect(controller.countSinceLastDrop).toBe(0);

    // average 8.5 >= 6
    expect(controller.decide(12, 2)).toBe('forced_drop');

    expect(controller.getStats()).toEqual({
      arrivals: 3,
      admitted: 1,
      probabilisticDrops: 1,
      forcedDrops: 1,
      average: 8.5,
      countSinceLastDrop: 0,
    });
  });

  it('decays the average after an idle period before deciding', () => {
    const controller = createController();
    controller.decide(4, 0);
    controller.decide(8, 1);
    controller.decide(12, 2);

    controller.markIdle(2);
    expect(controller.snapshot().idleStart).toBe(2);

    // 3 idle cycles: 8.5 * 0.5^3
    expect(controller.decide(0, 5)).toBe('admit');
    expect(controller.average).toBe(1.0625);
    expect(controller.snapshot().idleStart).toBeNull();
  });

  it('uses the thresholds passed per call over the configured pair', () => {
    const controller = createController();

    expect(controller.decide(40, 0, { minThreshold: 100, maxThreshold: 200 })).toBe('admit');
    expect(controller.average).toBe(20);
  });

  it('shares one average across calls with different thresholds', () => {
    const controller = createController();
    const low = { minThreshold: 2, maxThreshold: 4 };
    const high = { minThreshold: 8, maxThreshold: 16 };

    controller.decide(6, 0, high);
    // average 1.5 + 3.5 = 5 under `low` -> forced
    expect(controller.decide(7, 1, low)).toBe('forced_drop');
    expect(controller.average).toBe(5);
  });

  it('draws only in the probabilistic region', () => {
    const random = vi.fn(() => 0.5);
    const controller = createController(random);

    controller.decide(2, 0); // average 1
    controller.decide(20, 1); // average 10.5

    expect(random).not.toHaveBeenCalled();
  });

  it('requires a threshold pair', () => {
    const controller = new CongestionController({ maxProbability: 0.1, weightFactor: 6, smallPacketTime: 1 });

    expect(() => controller.decide(1, 0)).toThrow(ConfigurationError);

    controller.setThresholds({ minThreshold: 5, maxThreshold: 10 });
    expect(controller.decide(1, 0)).toBe('admit');
  });

  it('rejects invalid configuration', () => {
    expect(
      () => new CongestionController({ maxProbability: 0, weightFactor: 6, smallPacketTime: 1 })
    ).toThrow(ConfigurationError);
    expect(
      () =>
        new CongestionController({
          maxProbability: 0.1,
          weightFactor: 6,
          smallPacketTime: 1,
          thresholds: { minThreshold: 10, maxThreshold: 5 },
        })
    ).toThrow(ConfigurationError);
    expect(() => createController().setThresholds({ minThreshold: -1, maxThreshold: 5 })).toThrow(
      ConfigurationError
    );
  });
});
