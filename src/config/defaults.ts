/**
 * Default Configuration Constants
 *
 * All WRED tuning defaults centralized here.
 */

import type { QueueUnit } from '../types/index.js';

/**
 * WRED Policy Defaults
 */
export const WRED = {
  /** Number of priority classes */
  NUM_PRIORITIES: 8,

  /** Max threshold as a percentage of the queue limit */
  MAX_THRESHOLD: 40,

  /** Drop probability at the max threshold (mark probability denominator 10) */
  MAX_PROBABILITY: 0.1,
} as const;

/**
 * EWMA weight factor n, average <- average * (1 - 2^-n) + sample * 2^-n
 */
export const WEIGHT_FACTOR: Readonly<Record<QueueUnit, number>> = {
  packets: 6,
  bytes: 9,
};

/**
 * Output Port Defaults
 */
export const PORT = {
  UNIT: 'packets',

  /** Queue limit in the configured unit */
  QUEUE_LIMIT: 64,

  /** Clock units needed to transmit one small packet (idle decay step) */
  SMALL_PACKET_TIME: 1,
} as const;

/**
 * Resolve the weight factor for a unit when none is configured.
 */
export function defaultWeightFactor(unit: QueueUnit): number {
  return WEIGHT_FACTOR[unit];
}
