/**
 * RED Congestion Controller
 *
 * Owns the single average estimator and drop-spacing state of one queue
 * and turns an arrival into a verdict. The thresholds are passed per call,
 * so one controller can serve several priority classes without any class
 * seeing a different occupancy history.
 */

import type { Logger } from 'pino';
import { ConfigurationError } from '../api/errors.js';
import type {
  AverageSnapshot,
  CongestionStats,
  DropState,
  RandomSource,
  ThresholdPair,
  Verdict,
} from '../types/index.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { defaultRandomSource } from '../utils/random.js';
import { AverageEstimator } from './average-estimator.js';
import { assertMaxProbability, assertThresholdPair, createDropState, decide } from './drop-decision.js';

export interface CongestionControllerConfig {
  maxProbability: number;
  weightFactor: number;
  smallPacketTime: number;
  /** Thresholds used when `decide` is called without a pair (plain RED) */
  thresholds?: ThresholdPair;
  random?: RandomSource;
  logger?: Logger;
}

export class CongestionController {
  private readonly estimator: AverageEstimator;
  private readonly dropState: DropState = createDropState();
  private readonly maxProbability: number;
  private readonly random: RandomSource;
  private readonly logger?: Logger;
  private thresholds?: ThresholdPair;

  private arrivals = 0;
  private admitted = 0;
  private probabilisticDrops = 0;
  private forcedDrops = 0;

  constructor(config: CongestionControllerConfig) {
    assertMaxProbability(config.maxProbability);
    if (config.thresholds) {
      assertThresholdPair(config.thresholds);
    }

    this.maxProbability = config.maxProbability;
    this.estimator = new AverageEstimator({
      weightFactor: config.weightFactor,
      smallPacketTime: config.smallPacketTime,
    });
    this.random = config.random ?? defaultRandomSource;
    this.logger = config.logger;
    this.thresholds = config.thresholds;
  }

  /**
   * Replace the default thresholds used by plain RED calls.
   */
  setThresholds(pair: ThresholdPair): void {
    assertThresholdPair(pair);
    this.thresholds = pair;
  }

  /**
   * Update the average exactly once for this arrival, then decide.
   *
   * @param occupancy - Occupancy before the arriving packet is added
   * @param now - Simulated arrival time
   * @param thresholds - Thresholds for this packet; defaults to the configured pair
   */
  decide(occupancy: number, now: number, thresholds: ThresholdPair | undefined = this.thresholds): Verdict {
    if (!thresholds) {
      throw new ConfigurationError('No threshold pair configured for this controller');
    }
    const pair = thresholds;

    const average = this.estimator.update(occupancy, now);
    const verdict = decide(average, pair, this.maxProbability, this.dropState, this.random);
    this.record(verdict);

    lazyLog(
      this.logger,
      'trace',
      () => ({
        occupancy,
        average,
        minThreshold: pair.minThreshold,
        maxThreshold: pair.maxThreshold,
        count: this.dropState.countSinceLastDrop,
        verdict,
      }),
      'RED decision'
    );

    return verdict;
  }

  /**
   * The queue drained at `at`; the next arrival applies idle decay.
   */
  markIdle(at: number): void {
    this.estimator.markIdle(at);
  }

  /**
   * A packet was dropped outside the RED decision; restart drop spacing.
   */
  resetDropSpacing(): void {
    this.dropState.countSinceLastDrop = 0;
  }

  get average(): number {
    return this.estimator.value;
  }

  get countSinceLastDrop(): number {
    return this.dropState.countSinceLastDrop;
  }

  snapshot(): AverageSnapshot {
    return this.estimator.snapshot();
  }

  getStats(): CongestionStats {
    return {
      arrivals: this.arrivals,
      admitted: this.admitted,
      probabilisticDrops: this.probabilisticDrops,
      forcedDrops: this.forcedDrops,
      average: this.estimator.value,
      countSinceLastDrop: this.dropState.countSinceLastDrop,
    };
  }

  private record(verdict: Verdict): void {
    this.arrivals += 1;
    switch (verdict) {
      case 'admit':
        this.admitted += 1;
        break;
      case 'probabilistic_drop':
        this.probabilisticDrops += 1;
        break;
      case 'forced_drop':
        this.forcedDrops += 1;
        break;
    }
  }
}
