/**
 * Active Queue Management Types
 *
 * Shared type definitions for the RED/WRED decision engine and the
 * output port that drives it.
 */

/**
 * Unit in which queue occupancy, capacity and thresholds are measured.
 */
export type QueueUnit = 'packets' | 'bytes';

/**
 * Outcome of an admission decision.
 *
 * Drops are ordinary results, not failures.
 */
export type Verdict = 'admit' | 'probabilistic_drop' | 'forced_drop';

/**
 * Reason a port discarded a packet.
 *
 * `queue_full` is the hard tail drop applied when an admitted packet
 * does not fit under the queue limit.
 */
export type DropReason = Exclude<Verdict, 'admit'> | 'queue_full';

/**
 * Flow identifier. Traffic generators use either numeric or string ids.
 */
export type FlowId = number | string;

/**
 * Priority class, 0..numPriorities-1.
 */
export type PriorityClass = number;

/**
 * The fields of a packet the AQM core reads.
 */
export interface Packet {
  flowId: FlowId;
  /** Packet size in bytes; only consulted in byte mode */
  size: number;
  /** Optional simulator-assigned id, carried through events untouched */
  packetId?: number | string;
}

/**
 * Minimum/maximum occupancy bounding the probabilistic-drop region.
 *
 * Invariant: 0 <= minThreshold <= maxThreshold.
 */
export interface ThresholdPair {
  minThreshold: number;
  maxThreshold: number;
}

/**
 * Threshold policy of one priority class, in percent of the queue limit.
 */
export interface ThresholdPolicy {
  priorityClass: PriorityClass;
  minThresholdPct: number;
  maxThresholdPct: number;
}

/**
 * Mapping from flow id to priority class.
 */
export type PriorityAssignment = ReadonlyMap<FlowId, PriorityClass>;

/**
 * Uniform random source in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Simulation clock. The core never reads wall-clock time.
 */
export type Clock = () => number;

/**
 * Drop-spacing state shared by all priority classes of one port.
 */
export interface DropState {
  /** Packets admitted in the probabilistic region since the last drop */
  countSinceLastDrop: number;
}

/**
 * Read-only view of the estimator state.
 */
export interface AverageSnapshot {
  average: number;
  weightFactor: number;
  idleStart: number | null;
}

/**
 * What the WRED layer needs to know about the queue it guards.
 */
export interface QueueObserver {
  readonly unit: QueueUnit;
  /** Queue limit in `unit` */
  readonly capacity: number;
  /** Current occupancy in `unit`, sampled before the arriving packet is added */
  currentOccupancy(): number;
}

/**
 * Decision counters kept by the congestion controller.
 */
export interface CongestionStats {
  arrivals: number;
  admitted: number;
  probabilisticDrops: number;
  forcedDrops: number;
  average: number;
  countSinceLastDrop: number;
}

/**
 * Port-level statistics.
 */
export interface WredPortStats {
  packetsReceived: number;
  packetsDropped: number;
  dropsByFlow: Record<string, number>;
  dropsByReason: Record<DropReason, number>;
  /** Queue length in packets */
  length: number;
  /** Bytes currently queued */
  byteSize: number;
  /** Occupancy in the configured unit */
  occupancy: number;
  average: number;
}
