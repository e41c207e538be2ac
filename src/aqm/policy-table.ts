/**
 * WRED Policy Table
 *
 * Maps each priority class to a (min, max) threshold pair. Thresholds are
 * kept as fractions of the queue limit and only become absolute occupancy
 * values once bound to a port's capacity.
 *
 * Default derivation: the max threshold is shared by every class and the
 * min thresholds are spaced evenly from half the max threshold upward, so
 * class 0 starts dropping earliest.
 */

import { ConfigurationError, UnknownPriorityClassError } from '../api/errors.js';
import type { PriorityClass, ThresholdPair, ThresholdPolicy } from '../types/index.js';

interface StoredPolicy {
  /** Fraction of the queue limit, 0..1 */
  minThreshold: number;
  /** Fraction of the queue limit, 0..1 */
  maxThreshold: number;
  minThresholdPct: number;
  maxThresholdPct: number;
}

/**
 * Policy table with thresholds resolved to absolute occupancy units.
 */
export interface BoundPolicyTable {
  readonly capacity: number;
  readonly size: number;
  lookup(priorityClass: PriorityClass): ThresholdPair;
  has(priorityClass: PriorityClass): boolean;
}

export class PolicyTable {
  private readonly policies = new Map<PriorityClass, StoredPolicy>();

  /**
   * Derive one policy per class, evenly spaced between half the max
   * threshold and the max threshold (integer percentages).
   *
   * With more classes than percentage points in that span the step is 0
   * and several classes share a min threshold.
   */
  static build(numPriorities: number, maxThreshold: number): PolicyTable {
    if (!Number.isInteger(numPriorities) || numPriorities <= 0) {
      throw new ConfigurationError(`Number of priorities must be a positive integer, got ${numPriorities}`, {
        numPriorities,
      });
    }
    if (!Number.isInteger(maxThreshold) || maxThreshold < 0 || maxThreshold > 100) {
      throw new ConfigurationError(`Max threshold must be an integer in [0, 100], got ${maxThreshold}`, {
        maxThreshold,
      });
    }

    const table = new PolicyTable();
    const baseMin = Math.floor(maxThreshold / 2);
    const step = Math.floor((maxThreshold - baseMin) / numPriorities);

    for (let priorityClass = 0; priorityClass < numPriorities; priorityClass++) {
      table.addPolicy(priorityClass, baseMin + priorityClass * step, maxThreshold);
    }

    return table;
  }

  /**
   * Install or replace the policy of one class (percentages of the queue limit).
   */
  addPolicy(priorityClass: PriorityClass, minThresholdPct: number, maxThresholdPct: number): void {
    if (!Number.isInteger(priorityClass) || priorityClass < 0) {
      throw new ConfigurationError(`Priority class must be a non-negative integer, got ${priorityClass}`, {
        priorityClass,
      });
    }
    if (!(minThresholdPct >= 0 && minThresholdPct <= maxThresholdPct && maxThresholdPct <= 100)) {
      throw new ConfigurationError(
        `Invalid threshold setting for class ${priorityClass}: expected 0 <= min (${minThresholdPct}) <= max (${maxThresholdPct}) <= 100`,
        { priorityClass, minThresholdPct, maxThresholdPct }
      );
    }

    this.policies.set(priorityClass, {
      minThreshold: minThresholdPct / 100,
      maxThreshold: maxThresholdPct / 100,
      minThresholdPct,
      maxThresholdPct,
    });
  }

  /**
   * Thresholds of a class as fractions of the queue limit.
   */
  lookup(priorityClass: PriorityClass): ThresholdPair {
    const policy = this.policies.get(priorityClass);
    if (!policy) {
      throw new UnknownPriorityClassError(priorityClass);
    }
    return { minThreshold: policy.minThreshold, maxThreshold: policy.maxThreshold };
  }

  has(priorityClass: PriorityClass): boolean {
    return this.policies.has(priorityClass);
  }

  get size(): number {
    return this.policies.size;
  }

  classes(): PriorityClass[] {
    return [...this.policies.keys()].sort((a, b) => a - b);
  }

  /**
   * Percentage view of every class, ordered by class.
   */
  describe(): ThresholdPolicy[] {
    return this.classes().map((priorityClass) => {
      const policy = this.policies.get(priorityClass);
      return {
        priorityClass,
        minThresholdPct: policy?.minThresholdPct ?? 0,
        maxThresholdPct: policy?.maxThresholdPct ?? 0,
      };
    });
  }

  /**
   * Resolve every class against a queue limit. The result is a snapshot;
   * later addPolicy calls do not affect it.
   */
  bind(capacity: number): BoundPolicyTable {
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new ConfigurationError(`Queue capacity must be a positive number, got ${capacity}`, { capacity });
    }

    const resolved = new Map<PriorityClass, ThresholdPair>();
    for (const [priorityClass, policy] of this.policies) {
      resolved.set(
        priorityClass,
        Object.freeze({
          minThreshold: (policy.minThresholdPct * capacity) / 100,
          maxThreshold: (policy.maxThresholdPct * capacity) / 100,
        })
      );
    }

    return Object.freeze({
      capacity,
      size: resolved.size,
      lookup(priorityClass: PriorityClass): ThresholdPair {
        const pair = resolved.get(priorityClass);
        if (!pair) {
          throw new UnknownPriorityClassError(priorityClass);
        }
        return pair;
      },
      has(priorityClass: PriorityClass): boolean {
        return resolved.has(priorityClass);
      },
    });
  }
}
