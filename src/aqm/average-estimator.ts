/**
 * Average Queue Size Estimator
 *
 * Exponentially weighted moving average of queue occupancy:
 *
 *   average <- average * (1 - 2^-n) + sample * 2^-n
 *
 * While the queue sits empty the average is not sampled. On the first
 * arrival after an idle period it is decayed as if m small packets had been
 * served in the meantime, average <- average * (1 - 2^-n)^m, so a queue that
 * drained long ago does not look congested.
 */

import { ConfigurationError, InvariantViolationError, assertNonNegative } from '../api/errors.js';
import type { AverageSnapshot } from '../types/index.js';
import { retentionFactor } from '../utils/math-helpers.js';

export interface AverageEstimatorOptions {
  /** Exponent n of the EWMA weight 2^-n */
  weightFactor: number;
  /** Clock units needed to transmit one small packet; sizes the idle decay step */
  smallPacketTime: number;
  /** Starting average; 0 for a new port */
  initialAverage?: number;
}

export class AverageEstimator {
  private readonly weightFactor: number;
  private readonly weight: number;
  private readonly retention: number;
  private readonly smallPacketTime: number;
  private average: number;
  private idleStart: number | null = null;

  constructor(options: AverageEstimatorOptions) {
    if (!Number.isInteger(options.weightFactor) || options.weightFactor < 1) {
      throw new ConfigurationError(`Weight factor must be a positive integer, got ${options.weightFactor}`, {
        weightFactor: options.weightFactor,
      });
    }
    if (!(options.smallPacketTime > 0) || !Number.isFinite(options.smallPacketTime)) {
      throw new ConfigurationError(`Small packet time must be a positive number, got ${options.smallPacketTime}`, {
        smallPacketTime: options.smallPacketTime,
      });
    }

    this.weightFactor = options.weightFactor;
    this.weight = Math.pow(2, -options.weightFactor);
    this.retention = retentionFactor(options.weightFactor);
    this.smallPacketTime = options.smallPacketTime;
    this.average = options.initialAverage ?? 0;
    assertNonNegative('initial average', this.average);
  }

  get value(): number {
    return this.average;
  }

  get isIdle(): boolean {
    return this.idleStart !== null;
  }

  /**
   * Busy regime: fold one occupancy sample into the average.
   */
  sample(occupancy: number): number {
    assertNonNegative('queue occupancy', occupancy);
    return this.commit(this.average * this.retention + occupancy * this.weight);
  }

  /**
   * Idle regime: decay the average by `cycles` virtual service cycles.
   */
  decay(cycles: number): number {
    if (!Number.isInteger(cycles) || cycles < 1) {
      throw new InvariantViolationError('idle cycles', cycles, 'a positive integer');
    }
    return this.commit(this.average * Math.pow(this.retention, cycles));
  }

  /**
   * Record that the queue became empty at `at`. Repeated calls keep the
   * earliest start.
   */
  markIdle(at: number): void {
    assertNonNegative('idle start', at);
    if (this.idleStart === null) {
      this.idleStart = at;
    }
  }

  /**
   * Number of small-packet transmissions that fit into an idle interval,
   * floored, at least 1.
   */
  idleCycles(idleDuration: number): number {
    assertNonNegative('idle duration', idleDuration);
    return Math.max(1, Math.floor(idleDuration / this.smallPacketTime));
  }

  /**
   * Update on a packet arrival, picking the regime.
   *
   * @param occupancy - Occupancy sampled before the arriving packet is added
   * @param now - Current simulated time
   */
  update(occupancy: number, now: number): number {
    if (this.idleStart === null) {
      return this.sample(occupancy);
    }

    const cycles = this.idleCycles(now - this.idleStart);
    this.idleStart = null;
    return this.decay(cycles);
  }

  snapshot(): AverageSnapshot {
    return {
      average: this.average,
      weightFactor: this.weightFactor,
      idleStart: this.idleStart,
    };
  }

  private commit(next: number): number {
    assertNonNegative('average queue size', next);
    this.average = next;
    return next;
  }
}
