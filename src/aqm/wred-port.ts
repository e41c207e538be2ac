/**
 * WRED Output Port
 *
 * A FIFO output buffer, limited in packets or bytes, whose admissions are
 * decided by a WRED layer. The port never advances time: the simulation
 * scheduler calls `put` on every arrival and `dequeue` whenever the link
 * can transmit the head packet.
 *
 * An admitted packet that does not fit under the queue limit is still tail
 * dropped; the average lags the instantaneous occupancy, so WRED alone
 * cannot keep the buffer from overflowing during bursts.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { AqmError, ConfigurationError, assertNonNegative } from '../api/errors.js';
import { PORT } from '../config/defaults.js';
import { toWredPortOptions } from '../config/loader.js';
import type { Config, PortDependencies } from '../config/loader.js';
import type {
  Clock,
  CongestionStats,
  DropReason,
  Packet,
  PriorityClass,
  QueueObserver,
  QueueUnit,
  Verdict,
  WredPortStats,
} from '../types/index.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { WredLayer } from './wred-layer.js';
import type { WredLayerConfig } from './wred-layer.js';

export interface WredPortConfig extends Omit<WredLayerConfig, 'queue'> {
  /** Queue limit in `unit` */
  queueLimit: number;
  /** Occupancy unit (default packets) */
  unit?: QueueUnit;
  /** Optional element id, carried into logs */
  elementId?: number | string;
}

/**
 * Outcome of `put`.
 */
export interface PortArrival {
  verdict: Verdict;
  enqueued: boolean;
  priorityClass: PriorityClass;
  /** Present when the packet was discarded */
  reason?: DropReason;
}

export interface WredPortEvents {
  verdict: (packet: Packet, verdict: Verdict, priorityClass: PriorityClass) => void;
  enqueue: (packet: Packet) => void;
  drop: (packet: Packet, reason: DropReason) => void;
  dequeue: (packet: Packet) => void;
  idle: (at: number) => void;
}

export class WredPort extends EventEmitter<WredPortEvents> implements QueueObserver {
  public readonly unit: QueueUnit;
  public readonly capacity: number;
  public readonly elementId?: number | string;

  private readonly layer: WredLayer;
  private readonly now: Clock;
  private readonly logger?: Logger;
  private readonly buffer: Packet[] = [];
  private bytes = 0;

  private packetsReceived = 0;
  private packetsDropped = 0;
  private readonly dropsByFlow = new Map<string, number>();
  private readonly dropsByReason: Record<DropReason, number> = {
    probabilistic_drop: 0,
    forced_drop: 0,
    queue_full: 0,
  };

  constructor(config: WredPortConfig) {
    super();

    if (!Number.isInteger(config.queueLimit) || config.queueLimit <= 0) {
      throw new ConfigurationError(`Queue limit must be a positive integer, got ${config.queueLimit}`, {
        queueLimit: config.queueLimit,
      });
    }

    this.unit = config.unit ?? PORT.UNIT;
    this.capacity = config.queueLimit;
    this.elementId = config.elementId;
    this.now = config.now;
    this.logger = config.logger?.child({ elementId: config.elementId });

    this.layer = new WredLayer({
      priorities: config.priorities,
      now: config.now,
      maxProbability: config.maxProbability,
      numPriorities: config.numPriorities,
      maxThreshold: config.maxThreshold,
      weightFactor: config.weightFactor,
      smallPacketTime: config.smallPacketTime,
      policyTable: config.policyTable,
      random: config.random,
      logger: this.logger,
      queue: this,
    });
  }

  /**
   * Occupancy in the configured unit.
   */
  currentOccupancy(): number {
    return this.unit === 'bytes' ? this.bytes : this.buffer.length;
  }

  /**
   * Offer an arriving packet to the port.
   *
   * A packet that passes WRED but does not fit is tail dropped, and the
   * shared drop-spacing count restarts as for any other drop. A packet of
   * an unassigned flow throws before any counter or state changes.
   */
  put(packet: Packet): PortArrival {
    if (this.unit === 'bytes') {
      assertNonNegative('packet size', packet.size);
    }

    const { verdict, priorityClass } = this.layer.classify(packet);
    this.packetsReceived += 1;
    this.emit('verdict', packet, verdict, priorityClass);

    if (verdict !== 'admit') {
      this.discard(packet, verdict);
      return { verdict, enqueued: false, priorityClass, reason: verdict };
    }

    if (!this.fits(packet)) {
      this.layer.onTailDrop();
      this.discard(packet, 'queue_full');
      return { verdict, enqueued: false, priorityClass, reason: 'queue_full' };
    }

    this.buffer.push(packet);
    this.bytes += packet.size;
    this.emit('enqueue', packet);
    return { verdict, enqueued: true, priorityClass };
  }

  /**
   * Remove the head packet for transmission. Marks the queue idle when it
   * drains.
   */
  dequeue(): Packet | undefined {
    const packet = this.buffer.shift();
    if (!packet) {
      return undefined;
    }

    this.bytes -= packet.size;
    this.emit('dequeue', packet);

    if (this.buffer.length === 0) {
      const at = this.now();
      this.layer.onQueueIdle(at);
      this.emit('idle', at);
    }

    return packet;
  }

  peek(): Packet | undefined {
    return this.buffer[0];
  }

  get length(): number {
    return this.buffer.length;
  }

  get byteSize(): number {
    return this.bytes;
  }

  get average(): number {
    return this.layer.average;
  }

  get wred(): WredLayer {
    return this.layer;
  }

  getCongestionStats(): CongestionStats {
    return this.layer.getStats();
  }

  getStats(): WredPortStats {
    return {
      packetsReceived: this.packetsReceived,
      packetsDropped: this.packetsDropped,
      dropsByFlow: Object.fromEntries(this.dropsByFlow),
      dropsByReason: { ...this.dropsByReason },
      length: this.buffer.length,
      byteSize: this.bytes,
      occupancy: this.currentOccupancy(),
      average: this.layer.average,
    };
  }

  private fits(packet: Packet): boolean {
    if (this.unit === 'bytes') {
      return this.bytes + packet.size <= this.capacity;
    }
    return this.buffer.length + 1 <= this.capacity;
  }

  private discard(packet: Packet, reason: DropReason): void {
    this.packetsDropped += 1;
    this.dropsByReason[reason] += 1;
    const flowKey = String(packet.flowId);
    this.dropsByFlow.set(flowKey, (this.dropsByFlow.get(flowKey) ?? 0) + 1);

    lazyLog(
      this.logger,
      'debug',
      () => ({ flowId: packet.flowId, packetId: packet.packetId, reason, length: this.buffer.length }),
      '[WredPort] Packet discarded'
    );
    this.emit('drop', packet, reason);
  }
}

/**
 * Build a WRED port from validated configuration.
 */
export function createWredPort(config: Config, dependencies: PortDependencies): WredPort {
  const options = toWredPortOptions(config, dependencies);
  try {
    return new WredPort(options);
  } catch (error) {
    if (error instanceof AqmError) {
      options.logger?.error({ err: error.toObject() }, '[WredPort] Invalid configuration');
    }
    throw error;
  }
}
