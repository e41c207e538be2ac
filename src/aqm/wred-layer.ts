/**
 * Weighted RED Layer
 *
 * Resolves the priority class of each arriving packet, looks up that
 * class's threshold pair, and runs the shared RED controller against it.
 *
 * All classes share one average and one drop-spacing state: congestion is
 * a property of the queue, only the tolerance differs per class. Lower
 * classes therefore enter the probabilistic region first.
 *
 * The priority assignment is checked against the policy table when the
 * layer is built, so a bad class can never surface at packet time.
 */

import type { Logger } from 'pino';
import {
  ConfigurationError,
  UnassignedFlowError,
  UnknownPriorityClassError,
  fromZodError,
} from '../api/errors.js';
import { PORT, WRED, defaultWeightFactor } from '../config/defaults.js';
import { WredOptionsSchema } from '../types/schemas/config.js';
import type {
  Clock,
  CongestionStats,
  FlowId,
  Packet,
  PriorityAssignment,
  PriorityClass,
  QueueObserver,
  RandomSource,
  ThresholdPair,
  Verdict,
} from '../types/index.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { CongestionController } from './congestion-controller.js';
import { PolicyTable } from './policy-table.js';
import type { BoundPolicyTable } from './policy-table.js';

/**
 * Priority assignment as accepted from callers: a Map or a plain
 * `{ flowId: class }` object (as read from YAML).
 */
export type PriorityAssignmentInput = PriorityAssignment | Readonly<Record<string, number>>;

/**
 * Verdict for one arrival together with the class it was judged under.
 */
export interface ArrivalDecision {
  verdict: Verdict;
  priorityClass: PriorityClass;
}

export interface WredLayerConfig {
  /** Flow id -> priority class */
  priorities: PriorityAssignmentInput;
  /** Queue being guarded; supplies capacity and occupancy samples */
  queue: QueueObserver;
  /** Simulation clock */
  now: Clock;
  /** Drop probability at the max threshold, (0, 1] */
  maxProbability?: number;
  /** Number of priority classes (default 8) */
  numPriorities?: number;
  /** Max threshold, percent of the queue limit (default 40) */
  maxThreshold?: number;
  /** EWMA exponent (default 6 for packets, 9 for bytes) */
  weightFactor?: number;
  /** Clock units per small-packet transmission (default 1) */
  smallPacketTime?: number;
  /** Custom policy table; replaces the derived one */
  policyTable?: PolicyTable;
  random?: RandomSource;
  logger?: Logger;
}

export class WredLayer {
  private readonly policies: BoundPolicyTable;
  private readonly assignment: ReadonlyMap<string, PriorityClass>;
  private readonly controller: CongestionController;
  private readonly queue: QueueObserver;
  private readonly now: Clock;
  private readonly logger?: Logger;

  constructor(config: WredLayerConfig) {
    const parsed = WredOptionsSchema.safeParse({
      numPriorities: config.numPriorities ?? WRED.NUM_PRIORITIES,
      maxThreshold: config.maxThreshold ?? WRED.MAX_THRESHOLD,
      maxProbability: config.maxProbability ?? WRED.MAX_PROBABILITY,
      weightFactor: config.weightFactor ?? defaultWeightFactor(config.queue.unit),
      smallPacketTime: config.smallPacketTime ?? PORT.SMALL_PACKET_TIME,
    });
    if (!parsed.success) {
      throw fromZodError(parsed.error, 'Invalid WRED options');
    }
    const options = parsed.data;

    const table = config.policyTable ?? PolicyTable.build(options.numPriorities, options.maxThreshold);
    this.policies = table.bind(config.queue.capacity);
    this.assignment = validateAssignment(config.priorities, this.policies);
    this.queue = config.queue;
    this.now = config.now;
    this.logger = config.logger;
    this.controller = new CongestionController({
      maxProbability: options.maxProbability,
      weightFactor: options.weightFactor,
      smallPacketTime: options.smallPacketTime,
      random: config.random,
      logger: config.logger,
    });

    this.logger?.info(
      {
        unit: config.queue.unit,
        capacity: config.queue.capacity,
        maxProbability: options.maxProbability,
        weightFactor: options.weightFactor,
        policies: table.describe(),
        flows: this.assignment.size,
      },
      '[WredLayer] Initialized'
    );
  }

  /**
   * Decide the fate of an arriving packet.
   *
   * The occupancy is read from the queue before the packet is added.
   */
  onPacketArrival(packet: Packet): Verdict {
    return this.classify(packet).verdict;
  }

  /**
   * Like `onPacketArrival`, also reporting the resolved priority class.
   * The flow is looked up once, before any state changes, so an unassigned
   * flow leaves the average and the drop spacing untouched.
   */
  classify(packet: Packet): ArrivalDecision {
    const priorityClass = this.priorityOf(packet.flowId);
    const pair = this.policies.lookup(priorityClass);
    const occupancy = this.queue.currentOccupancy();
    const verdict = this.controller.decide(occupancy, this.now(), pair);

    if (verdict !== 'admit') {
      lazyLog(
        this.logger,
        'debug',
        () => ({
          flowId: packet.flowId,
          priorityClass,
          occupancy,
          average: this.controller.average,
          minThreshold: pair.minThreshold,
          maxThreshold: pair.maxThreshold,
          verdict,
        }),
        '[WredLayer] Packet dropped'
      );
    }

    return { verdict, priorityClass };
  }

  /**
   * An admitted packet was discarded downstream (tail drop). It counts as
   * a drop for spacing purposes.
   */
  onTailDrop(): void {
    this.controller.resetDropSpacing();
  }

  /**
   * The queue became empty. Defaults to the current simulated time.
   */
  onQueueIdle(at: number = this.now()): void {
    this.controller.markIdle(at);
  }

  /**
   * Priority class of a flow.
   */
  priorityOf(flowId: FlowId): PriorityClass {
    const priorityClass = this.assignment.get(String(flowId));
    if (priorityClass === undefined) {
      throw new UnassignedFlowError(flowId);
    }
    return priorityClass;
  }

  /**
   * Absolute thresholds of a class.
   */
  thresholdsFor(priorityClass: PriorityClass): ThresholdPair {
    return this.policies.lookup(priorityClass);
  }

  get average(): number {
    return this.controller.average;
  }

  getStats(): CongestionStats {
    return this.controller.getStats();
  }
}

/**
 * Normalize the assignment to string keys and check every class against
 * the policy table.
 */
function validateAssignment(
  priorities: PriorityAssignmentInput,
  policies: BoundPolicyTable
): ReadonlyMap<string, PriorityClass> {
  const entries = toEntries(priorities);
  const assignment = new Map<string, PriorityClass>();

  for (const [flowId, priorityClass] of entries) {
    if (!Number.isInteger(priorityClass) || priorityClass < 0) {
      throw new ConfigurationError(
        `Priority class of flow ${String(flowId)} must be a non-negative integer, got ${String(priorityClass)}`,
        { flowId, priorityClass }
      );
    }
    if (!policies.has(priorityClass)) {
      throw new UnknownPriorityClassError(priorityClass, flowId);
    }
    assignment.set(String(flowId), priorityClass);
  }

  return assignment;
}

function toEntries(priorities: PriorityAssignmentInput): Array<[FlowId, number]> {
  if (priorities instanceof Map) {
    return [...priorities.entries()];
  }
  if (typeof priorities !== 'object' || priorities === null || Array.isArray(priorities)) {
    throw new ConfigurationError('Priorities must be a mapping of flow id to priority class');
  }
  return Object.entries(priorities);
}
